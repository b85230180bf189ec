import 'reflect-metadata';
import { container as rootContainer, type DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals, ShutdownSignal } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { InMemoryProcessSignals } from '../runtime/adapters/in-memory-process-signals.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import { DEFAULT_SHUTDOWN_SIGNALS, SignalWatcher } from '../runtime/signal-watcher.js';
import { ExitCoordinator } from '../runtime/exit-coordinator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { createRootLogger, PinoLoggerFactory, type ILoggerFactory, type Logger } from '../core/logging/index.js';
import { createGatewayApp } from '../infrastructure/http/gateway-app.js';
import { GatewayServer } from '../infrastructure/http/gateway-server.js';

// ═══════════════════════════════════════════════════════════════════════════
// OPTIONS
// ═══════════════════════════════════════════════════════════════════════════

export interface ContainerInitOptions {
  readonly config: ValidatedConfig;
  readonly runtimeMode?: RuntimeMode;
  /** Replaces the configured root logger; tests pass one writing to a capture stream. */
  readonly rootLogger?: Logger;
  /** Replaces the mode-derived signal source. */
  readonly processSignals?: ProcessSignals;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(c: DependencyContainer, config: ValidatedConfig): void {
  c.register<ValidatedConfig>(DI.Config.App, { useValue: config });
  c.register(DI.Config.DebugName, { useValue: config.logging.name });
  c.register(DI.Config.ListenAddress, { useValue: config.server.listen });
  c.register(DI.Config.GracePeriodMs, { useValue: config.server.gracePeriodMs });
}

function registerLogging(c: DependencyContainer, config: ValidatedConfig, rootLogger?: Logger): void {
  const root = rootLogger ?? createRootLogger(config.logging);
  c.register<ILoggerFactory>(DI.Logging.Factory, { useValue: new PinoLoggerFactory(root) });
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

export function detectRuntimeMode(): RuntimeMode {
  // Single source of truth for runtime inference.
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

export function toProcessLifecyclePolicy(mode: RuntimeMode): ProcessLifecyclePolicy {
  switch (mode.kind) {
    case 'test':
      return { kind: 'no_signal_handlers' };
    case 'cli':
    case 'production':
      return { kind: 'install_signal_handlers' };
    default:
      return assertNever(mode);
  }
}

function registerRuntime(c: DependencyContainer, mode: RuntimeMode, signalsOverride?: ProcessSignals): void {
  const policy = toProcessLifecyclePolicy(mode);

  const signals: ProcessSignals =
    signalsOverride ??
    (policy.kind === 'no_signal_handlers' ? new InMemoryProcessSignals() : new NodeProcessSignals());
  c.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });
  c.register<readonly ShutdownSignal[]>(DI.Runtime.ShutdownSignals, { useValue: DEFAULT_SHUTDOWN_SIGNALS });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  c.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });

  c.registerSingleton<ExitCoordinator>(DI.Runtime.ExitCoordinator, ExitCoordinator);
}

// ═══════════════════════════════════════════════════════════════════════════
// HTTP + ACTORS
// ═══════════════════════════════════════════════════════════════════════════

function registerHttp(c: DependencyContainer, config: ValidatedConfig): void {
  const loggerFactory = c.resolve<ILoggerFactory>(DI.Logging.Factory);
  c.register(DI.Http.Handler, {
    useValue: createGatewayApp({ loggerFactory, upstreams: config.upstreams }),
  });
}

function registerActors(c: DependencyContainer): void {
  c.registerSingleton<SignalWatcher>(DI.Actors.SignalWatcher, SignalWatcher);
  c.registerSingleton<GatewayServer>(DI.Actors.GatewayServer, GatewayServer);
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Build the application container as a child of `parent`.
 *
 * Everything process-wide (signal source, terminator, logger root) is
 * constructed here once and handed to the actors; nothing reaches for globals.
 */
export function createAppContainer(
  options: ContainerInitOptions,
  parent: DependencyContainer = rootContainer
): DependencyContainer {
  const c = parent.createChildContainer();
  const mode = options.runtimeMode ?? detectRuntimeMode();

  registerConfig(c, options.config);
  registerLogging(c, options.config, options.rootLogger);
  registerRuntime(c, mode, options.processSignals);
  registerHttp(c, options.config);
  registerActors(c);

  return c;
}
