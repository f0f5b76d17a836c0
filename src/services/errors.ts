/**
 * Engine Errors
 *
 * Typed failures raised by the engine and its collaborators. Every error
 * carries a `kind` so callers can switch on it instead of on classes.
 */

import type { EntityClass } from '../types/index.js';

export type EngineErrorKind =
  | 'auth_expired'
  | 'rate_limited'
  | 'network'
  | 'not_found'
  | 'corrupt_store'
  | 'store_write'
  | 'stream_resolution'
  | 'playback_launch'
  | 'stall_timeout'
  | 'cancelled'
  | 'sync_failed';

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============================================================
// Remote Client failures
// ============================================================

/** The session is no longer valid; the user has to sign in again. */
export class AuthExpiredError extends EngineError {
  readonly kind = 'auth_expired';
}

export class RateLimitedError extends EngineError {
  readonly kind = 'rate_limited';

  constructor(message: string, readonly retryAfterMs?: number) {
    super(message);
  }
}

export class NetworkError extends EngineError {
  readonly kind = 'network';

  constructor(message: string, readonly timedOut = false, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class NotFoundError extends EngineError {
  readonly kind = 'not_found';
}

export type RemoteError = AuthExpiredError | RateLimitedError | NetworkError | NotFoundError;

// ============================================================
// Engine failures
// ============================================================

/** Persisted catalog state could not be read back. */
export class CorruptStoreError extends EngineError {
  readonly kind = 'corrupt_store';
}

/** Synced changes could not be written to local storage. */
export class StoreWriteError extends EngineError {
  readonly kind = 'store_write';

  constructor(readonly entityClass: EntityClass, cause: unknown) {
    super(`Could not save ${entityClass} locally: ${errorMessage(cause)}`, { cause });
  }
}

export class CancelledError extends EngineError {
  readonly kind = 'cancelled';
}

export class SyncFailedError extends EngineError {
  readonly kind = 'sync_failed';

  constructor(readonly entityClass: EntityClass, readonly reason: RemoteError) {
    super(`Sync of ${entityClass} failed: ${reason.message}`, { cause: reason });
  }
}

/** A stream URL could not be obtained, or came back already expired. */
export class StreamResolutionError extends EngineError {
  readonly kind = 'stream_resolution';

  constructor(
    readonly trackId: string,
    readonly reason: RemoteError | 'token_expired',
  ) {
    super(
      reason === 'token_expired'
        ? `Stream URL for ${trackId} has expired`
        : `Could not resolve stream for ${trackId}: ${reason.message}`,
      { cause: reason === 'token_expired' ? undefined : reason },
    );
  }
}

export class PlaybackLaunchError extends EngineError {
  readonly kind: 'playback_launch' | 'stall_timeout' = 'playback_launch';
}

/** Treated like a launch failure: the track cannot continue. */
export class StallTimeoutError extends PlaybackLaunchError {
  readonly kind = 'stall_timeout';
}

// ============================================================
// Helpers
// ============================================================

export function isRemoteError(error: unknown): error is RemoteError {
  return (
    error instanceof AuthExpiredError ||
    error instanceof RateLimitedError ||
    error instanceof NetworkError ||
    error instanceof NotFoundError
  );
}

/**
 * Normalize anything a Remote Client throws into the remote taxonomy.
 * Unknown failures are treated as network errors.
 */
export function toRemoteError(error: unknown): RemoteError {
  if (isRemoteError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(message, false, { cause: error });
}

/**
 * Map an HTTP-style status code to a remote error, for Remote Client
 * implementations that talk to a web API.
 */
export function remoteErrorFromStatus(
  status: number,
  message: string,
  retryAfterSeconds?: number,
): RemoteError {
  switch (status) {
    case 401:
    case 403:
      return new AuthExpiredError(message);
    case 404:
      return new NotFoundError(message);
    case 429:
      return new RateLimitedError(
        message,
        retryAfterSeconds !== undefined ? retryAfterSeconds * 1000 : undefined,
      );
    default:
      return new NetworkError(message);
  }
}

/** Transient failures worth retrying with backoff. */
export function isRetryable(error: unknown): boolean {
  const reason = error instanceof SyncFailedError ? error.reason : error;
  return reason instanceof NetworkError || reason instanceof RateLimitedError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
