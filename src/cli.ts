#!/usr/bin/env node
/**
 * metrics-gateway - Composition Root
 *
 * 1. Parses flags into a validated config (or exits 1)
 * 2. Builds the container once for the whole process
 * 3. Runs the actor group and hands its outcome to the exit coordinator
 *
 * No business logic lives here.
 */

import 'reflect-metadata';
import { Command } from 'commander';

import { createAppContainer } from './di/container.js';
import { DI } from './di/tokens.js';
import { DEFAULT_FLAGS, loadConfig } from './config/app-config.js';
import { getBootstrapLogger, PinoLoggerFactory, type ILoggerFactory, type Logger } from './core/logging/index.js';
import { Err } from './errors/factories.js';
import { ExitCoordinator } from './runtime/exit-coordinator.js';
import { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
import { toRawFlags } from './cli/flags.js';
import { executeServeCommand } from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('metrics-gateway')
  .description('HTTP gateway in front of a metrics query and write backend')
  .version('0.1.0')
  .option('--listen <address>', 'The address on which the gateway listens.', DEFAULT_FLAGS.listen)
  .option('--grace-period <duration>', 'How long in-flight requests may drain after shutdown starts.', DEFAULT_FLAGS.gracePeriod)
  .option('--debug.name <name>', 'The name attached to every log line.', DEFAULT_FLAGS.debugName)
  .option('--log.level <level>', "The log filtering level. Options: 'error', 'warn', 'info', 'debug'.", DEFAULT_FLAGS.logLevel)
  .option('--log.format <format>', "The log format to use. Options: 'json', 'pretty'.", DEFAULT_FLAGS.logFormat)
  .option('--metrics.query.endpoint <url>', 'The endpoint against which to query for metrics.')
  .option('--metrics.write.endpoint <url>', 'The endpoint against which to make write requests for metrics.')
  .action(async () => {
    await serve(program.opts());
  });

// ═══════════════════════════════════════════════════════════════════════════
// SERVE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Coordinator for failures before the container exists.
 */
function createBootstrapExitCoordinator(): ExitCoordinator {
  return new ExitCoordinator(
    new NodeProcessTerminator(),
    new PinoLoggerFactory(getBootstrapLogger()),
    DEFAULT_FLAGS.debugName
  );
}

function flushLogger(logger: Logger): Promise<void> {
  return new Promise((resolve, reject) => {
    logger.flush((error) => (error ? reject(error) : resolve()));
  });
}

async function serve(options: Readonly<Record<string, unknown>>): Promise<never> {
  const configResult = loadConfig(toRawFlags(options));
  if (configResult.isErr()) {
    return createBootstrapExitCoordinator().fail(configResult.error);
  }

  const c = createAppContainer({ config: configResult.value, runtimeMode: { kind: 'cli' } });
  const coordinator = c.resolve<ExitCoordinator>(DI.Runtime.ExitCoordinator);
  const root = c.resolve<ILoggerFactory>(DI.Logging.Factory).root;
  coordinator.defer(() => flushLogger(root));

  const outcome = await executeServeCommand(c);
  return coordinator.exit(outcome);
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

try {
  await program.parseAsync();
} catch (error) {
  await createBootstrapExitCoordinator().fail(Err.unexpected('Unhandled failure in metrics-gateway', error));
}
