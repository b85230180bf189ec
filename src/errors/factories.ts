import type {
  ActorCrashedError,
  AppError,
  ConfigInvalidError,
  ConfigIssue,
  ListenFailedError,
  ShutdownFailedError,
  UnexpectedError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),

  listenFailed: (address: string, cause: unknown): ListenFailedError => {
    const code = errnoCode(cause);
    return {
      _tag: 'ListenFailed',
      address,
      code,
      message: code ? `Failed to listen on ${address} (${code})` : `Failed to listen on ${address}`,
      cause,
    };
  },

  shutdownFailed: (actor: string, cause: unknown): ShutdownFailedError => ({
    _tag: 'ShutdownFailed',
    actor,
    message: `Shutdown of ${actor} failed`,
    cause,
  }),

  actorCrashed: (actor: string, cause: unknown): ActorCrashedError => ({
    _tag: 'ActorCrashed',
    actor,
    message: `Actor ${actor} crashed`,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;

function errnoCode(cause: unknown): string | null {
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return null;
}
