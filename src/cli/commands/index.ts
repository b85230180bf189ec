export { executeServeCommand } from './serve.js';
