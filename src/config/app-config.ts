/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for the flag surface
 * - Zod validates at the boundary and returns typed, branded data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogFormat, LogLevel } from '../core/logging/index.js';
import { parseDuration } from './duration.js';
import { formatHostPort, parseHostPort, type HostPort } from './listen-address.js';

// =============================================================================
// Branded primitives (prove parsing happened)
// =============================================================================

export type ListenAddress = Brand<HostPort, 'ListenAddress'>;
export type GracePeriodMs = Brand<number, 'GracePeriodMs'>;
export type EndpointUrl = Brand<URL, 'EndpointUrl'>;

export interface AppConfig {
  readonly server: {
    readonly listen: ListenAddress;
    readonly gracePeriodMs: GracePeriodMs;
  };
  readonly logging: {
    /** Logger name; also the subject of the final failure line */
    readonly name: string;
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
  readonly upstreams: {
    readonly query: EndpointUrl;
    readonly write: EndpointUrl;
  };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

/**
 * Raw flag values as the CLI parser hands them over.
 */
export type RawFlags = Readonly<Record<string, unknown>>;

export const DEFAULT_FLAGS = {
  listen: ':8080',
  gracePeriod: '5s',
  debugName: 'metrics-gateway',
  logLevel: 'info',
  logFormat: 'json',
} as const;

/** Schema keys → the flag a user actually typed, for error messages. */
const FLAG_NAMES: Readonly<Record<string, string>> = {
  listen: '--listen',
  gracePeriod: '--grace-period',
  debugName: '--debug.name',
  logLevel: '--log.level',
  logFormat: '--log.format',
  metricsQueryEndpoint: '--metrics.query.endpoint',
  metricsWriteEndpoint: '--metrics.write.endpoint',
};

// =============================================================================
// Schema
// =============================================================================

const endpoint = z
  .string({ required_error: 'is required' })
  .min(1, 'is required')
  .transform((value, ctx) => {
    let url: URL;
    try {
      url = new URL(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not an absolute URL` });
      return z.NEVER;
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unsupported scheme "${url.protocol}" (expected http or https)` });
      return z.NEVER;
    }
    return url;
  });

const FlagsSchema = z.object({
  listen: z
    .string()
    .default(DEFAULT_FLAGS.listen)
    .transform((value, ctx) => {
      const parsed = parseHostPort(value);
      if (parsed.isErr()) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
        return z.NEVER;
      }
      return parsed.value;
    }),

  gracePeriod: z
    .string()
    .default(DEFAULT_FLAGS.gracePeriod)
    .transform((value, ctx) => {
      const parsed = parseDuration(value);
      if (parsed.isErr()) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
        return z.NEVER;
      }
      return parsed.value;
    }),

  debugName: z.string().min(1, 'cannot be empty').default(DEFAULT_FLAGS.debugName),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default(DEFAULT_FLAGS.logLevel),
  logFormat: z.enum(['json', 'pretty']).default(DEFAULT_FLAGS.logFormat),

  metricsQueryEndpoint: endpoint,
  metricsWriteEndpoint: endpoint,
});

type ParsedFlags = z.infer<typeof FlagsSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(flags: RawFlags): LoadConfigResult {
  const parsed = FlagsSchema.safeParse(flags);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data)));
}

/**
 * Tests and local construction only: brands a config without flag parsing.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

export function describeListenAddress(address: ListenAddress): string {
  return formatHostPort(address);
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(flags: ParsedFlags): AppConfig {
  return {
    server: {
      listen: flags.listen as ListenAddress,
      gracePeriodMs: flags.gracePeriod as GracePeriodMs,
    },
    logging: {
      name: flags.debugName,
      level: flags.logLevel,
      format: flags.logFormat,
    },
    upstreams: {
      query: flags.metricsQueryEndpoint as EndpointUrl,
      write: flags.metricsWriteEndpoint as EndpointUrl,
    },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => {
    const [head, ...rest] = issue.path;
    const flag = typeof head === 'string' ? FLAG_NAMES[head] ?? head : '(root)';
    return {
      path: rest.length ? `${flag}.${rest.join('.')}` : flag,
      message: issue.message,
    };
  });
}
