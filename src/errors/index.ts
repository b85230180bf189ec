export type {
  ActorCrashedError,
  ActorError,
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  ListenFailedError,
  ShutdownFailedError,
  UnexpectedError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
