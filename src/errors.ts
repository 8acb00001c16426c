/**
 * Error taxonomy shared by the detector, guard and dispatcher.
 */

export class TransientRemoteError extends Error {
  readonly kind = 'transient_remote' as const;

  constructor(message: string, readonly retryAfterMs?: number) {
    super(message);
    this.name = 'TransientRemoteError';
  }
}

/** Forbidden or not-found for one strategy or channel; degrades only that signal for one poll. */
export class PermissionError extends Error {
  readonly kind = 'permission' as const;

  constructor(message: string, readonly status: 'forbidden' | 'not_found') {
    super(message);
    this.name = 'PermissionError';
  }
}

export class DataValidityError extends Error {
  readonly kind = 'data_validity' as const;

  constructor(message: string) {
    super(message);
    this.name = 'DataValidityError';
  }
}

export class PersistenceError extends Error {
  readonly kind = 'persistence' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PersistenceError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
