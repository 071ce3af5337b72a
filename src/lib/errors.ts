/**
 * Error taxonomy
 * Every failure the CLI reports to the user is one of these. Anything else
 * reaching the dispatcher is a bug and gets logged with its stack.
 */

export type ReiseErrorCode =
  | 'NOT_FOUND'
  | 'COLLISION'
  | 'INVALID_SYNTAX'
  | 'OUT_OF_RANGE'
  | 'REMOTE_ERROR'
  | 'PERSISTENCE_ERROR';

export abstract class ReiseError extends Error {
  abstract readonly code: ReiseErrorCode;
  /** Optional follow-up line shown under the message */
  public readonly hint?: string;

  constructor(message: string, options: { cause?: unknown; hint?: string } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.hint = options.hint;
  }
}

/** A name or index did not resolve to a cache entry */
export class NotFoundError extends ReiseError {
  readonly code = 'NOT_FOUND';
  public readonly token: string;

  constructor(token: string, suggestion?: string) {
    super(`'${token}' not found in cache`, {
      hint: suggestion === undefined ? undefined : `Did you mean '${suggestion}'?`,
    });
    this.token = token;
  }
}

/** The target display key is already taken */
export class CollisionError extends ReiseError {
  readonly code = 'COLLISION';
  public readonly key: string;

  constructor(key: string, existing?: string) {
    super(
      existing && existing !== key
        ? `'${key}' clashes with existing entry '${existing}'`
        : `'${key}' already exists`
    );
    this.key = key;
  }
}

export class InvalidSyntaxError extends ReiseError {
  readonly code = 'INVALID_SYNTAX';
}

/** A numeric token pointed past the end of the cache */
export class OutOfRangeError extends ReiseError {
  readonly code = 'OUT_OF_RANGE';
  public readonly index: number;
  public readonly size: number;

  constructor(index: number, size: number) {
    super(
      size === 0
        ? `Index ${index} out of range (cache is empty)`
        : `Index ${index} out of range (0-${size - 1})`
    );
    this.index = index;
    this.size = size;
  }
}

/** Search or departure request failed, or came back unusable */
export class RemoteError extends ReiseError {
  readonly code = 'REMOTE_ERROR';
  public readonly status?: number;

  constructor(message: string, options: { cause?: unknown; status?: number } = {}) {
    super(message, { cause: options.cause });
    this.status = options.status;
  }
}

/** The cache document could not be written */
export class PersistenceError extends ReiseError {
  readonly code = 'PERSISTENCE_ERROR';
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not write cache to ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.path = path;
  }
}

export function isReiseError(error: unknown): error is ReiseError {
  return error instanceof ReiseError;
}
