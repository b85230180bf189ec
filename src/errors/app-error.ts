import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

// ============================================================================
// Actor errors: the only values that can travel through a run group outcome
// ============================================================================

export type ListenFailedError = Readonly<{
  readonly _tag: 'ListenFailed';
  readonly address: string;
  /** errno code reported by the socket layer (EADDRINUSE, EACCES, ...) */
  readonly code: string | null;
  readonly message: string;
  readonly cause: unknown;
}>;

export type ShutdownFailedError = Readonly<{
  readonly _tag: 'ShutdownFailed';
  readonly actor: string;
  readonly message: string;
  readonly cause: unknown;
}>;

export type ActorCrashedError = Readonly<{
  readonly _tag: 'ActorCrashed';
  readonly actor: string;
  readonly message: string;
  readonly cause: unknown;
}>;

export type ActorError = ListenFailedError | ShutdownFailedError | ActorCrashedError;

export type AppError = ConfigInvalidError | UnexpectedError | ActorError;

/**
 * Branded marker for a config that went through `loadConfig`.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
