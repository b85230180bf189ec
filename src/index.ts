/**
 * Public API of metrics-gateway.
 *
 * The CLI (`cli.ts`) is the usual entry point; these exports let the run
 * group and its actors be embedded or tested without the process wiring.
 */

export type { Actor, ActorResult } from './runtime/actor.js';
export { RunGroup, RunGroupStateError, type RunOutcome } from './runtime/run-group.js';
export { Channel, type Received } from './runtime/channel.js';
export { SignalWatcher, DEFAULT_SHUTDOWN_SIGNALS } from './runtime/signal-watcher.js';
export { ExitCoordinator, type DeferredCleanup } from './runtime/exit-coordinator.js';
export type { ProcessSignals, ShutdownSignal, Unsubscribe } from './runtime/ports/process-signals.js';
export type { ExitCode, ProcessTerminator } from './runtime/ports/process-terminator.js';
export { toNumericExitCode } from './runtime/ports/process-terminator.js';
export { NodeProcessSignals } from './runtime/adapters/node-process-signals.js';
export { InMemoryProcessSignals } from './runtime/adapters/in-memory-process-signals.js';
export { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
export { ThrowingProcessTerminator, TerminationRequested } from './runtime/adapters/throwing-process-terminator.js';

export { GatewayServer, type ServerState, type ShutdownReport } from './infrastructure/http/gateway-server.js';
export { createGatewayApp, METRICS_API_PREFIX, type GatewayAppOptions } from './infrastructure/http/gateway-app.js';

export {
  loadConfig,
  createValidatedConfig,
  DEFAULT_FLAGS,
  type AppConfig,
  type ValidatedConfig,
  type ListenAddress,
  type GracePeriodMs,
  type EndpointUrl,
} from './config/app-config.js';

export { createAppContainer, type ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

export * from './errors/index.js';
