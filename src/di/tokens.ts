/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, organized by domain.
 *
 * ADDING A NEW SERVICE:
 * 1. Add a token here under the appropriate namespace
 * 2. Mark the class @injectable() and @inject(DI.YourToken) each constructor parameter
 * 3. Register it in container.ts
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** Component logger factory (children of one pino root) */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // ACTORS (members of the run group)
  // ═══════════════════════════════════════════════════════════════════
  Actors: {
    /** OS shutdown signal watcher */
    SignalWatcher: Symbol('Actors.SignalWatcher'),
    /** HTTP gateway server */
    GatewayServer: Symbol('Actors.GatewayServer'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // HTTP
  // ═══════════════════════════════════════════════════════════════════
  Http: {
    /** Request handler served by the gateway (express application) */
    Handler: Symbol('Http.Handler'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Process signal registration port */
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    /** Signals that end the signal watcher */
    ShutdownSignals: Symbol('Runtime.ShutdownSignals'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
    /** Maps a run outcome to the process exit */
    ExitCoordinator: Symbol('Runtime.ExitCoordinator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). Prefer this over individual tokens. */
    App: Symbol('Config.App'),
    /** Name prefixed to the final failure line */
    DebugName: Symbol('Config.DebugName'),
    /** Address the gateway listens on */
    ListenAddress: Symbol('Config.ListenAddress'),
    /** Grace deadline for draining in-flight requests */
    GracePeriodMs: Symbol('Config.GracePeriodMs'),
  },
} as const;
