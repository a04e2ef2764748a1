/**
 * LoaderError - the single error type raised while loading OBJ/MTL data
 */

/**
 * What went wrong:
 * - `invalid-file`: malformed command, bad or out-of-range index, unreadable number
 * - `io`: the file could not be opened or read
 * - `out-of-memory`: a buffer could not grow
 * - `unsupported-command`: an OBJ command outside the recognized set
 */
export type LoaderErrorKind = 'invalid-file' | 'io' | 'out-of-memory' | 'unsupported-command';

export interface LoaderErrorOptions {
  line?: number;
  cause?: unknown;
}

export class LoaderError extends Error {
  readonly kind: LoaderErrorKind;
  /** 1-based line the error was detected on, when known */
  readonly line: number | null;

  constructor(kind: LoaderErrorKind, message: string, options: LoaderErrorOptions = {}) {
    const suffix = options.line !== undefined ? ` (line ${options.line})` : '';
    super(`${message}${suffix}`, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'LoaderError';
    this.kind = kind;
    this.line = options.line ?? null;
  }
}

/**
 * Result of a load/parse call: the value, or the first error that aborted it
 */
export type LoadResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: LoaderError };

/**
 * Runs `fn`, turning a LoaderError (or a failed typed-array allocation) into a failed result.
 * Anything else is a bug and is rethrown.
 */
export function captureLoad<T>(fn: () => T): LoadResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    if (error instanceof LoaderError) {
      return { ok: false, error };
    }
    if (error instanceof RangeError) {
      return { ok: false, error: new LoaderError('out-of-memory', 'allocation failed', { cause: error }) };
    }
    throw error;
  }
}
