import type { DependencyContainer } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import { describeListenAddress } from '../../config/app-config.js';
import type { ILoggerFactory } from '../../core/logging/index.js';
import { RunGroup, type RunOutcome } from '../../runtime/run-group.js';
import type { SignalWatcher } from '../../runtime/signal-watcher.js';
import type { GatewayServer } from '../../infrastructure/http/gateway-server.js';

/**
 * Run the gateway until the first actor finishes: a shutdown signal, or the
 * server stopping on its own (bind failure, fatal socket error).
 *
 * Returns the group outcome; exiting is left to the caller.
 */
export async function executeServeCommand(c: DependencyContainer): Promise<RunOutcome> {
  const config = c.resolve<ValidatedConfig>(DI.Config.App);
  const loggerFactory = c.resolve<ILoggerFactory>(DI.Logging.Factory);

  const group = new RunGroup(loggerFactory.create('run-group'))
    .add(c.resolve<SignalWatcher>(DI.Actors.SignalWatcher))
    .add(c.resolve<GatewayServer>(DI.Actors.GatewayServer));

  loggerFactory.root.info(
    {
      listen: describeListenAddress(config.server.listen),
      gracePeriodMs: config.server.gracePeriodMs,
      queryUpstream: config.upstreams.query.origin,
      writeUpstream: config.upstreams.write.origin,
    },
    `starting ${config.logging.name}`
  );

  return group.run();
}
