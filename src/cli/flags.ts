import type { RawFlags } from '../config/app-config.js';

/**
 * Commander keeps dotted flag names verbatim (`--log.level` -> `log.level`)
 * and camel-cases dashed ones (`--grace-period` -> `gracePeriod`). This maps
 * both onto the config schema keys.
 */
const OPTION_TO_FLAG: Readonly<Record<string, string>> = {
  listen: 'listen',
  gracePeriod: 'gracePeriod',
  'debug.name': 'debugName',
  'log.level': 'logLevel',
  'log.format': 'logFormat',
  'metrics.query.endpoint': 'metricsQueryEndpoint',
  'metrics.write.endpoint': 'metricsWriteEndpoint',
};

export function toRawFlags(options: Readonly<Record<string, unknown>>): RawFlags {
  const flags: Record<string, unknown> = {};
  for (const [option, key] of Object.entries(OPTION_TO_FLAG)) {
    if (options[option] !== undefined) {
      flags[key] = options[option];
    }
  }
  return flags;
}
