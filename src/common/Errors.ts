/**
 * Custom error types for the storage engine.
 *
 * Replay-time anomalies (short reads, oversized lengths, bad UTF-8 in a
 * trailing record) are not errors: they end the usable log. Everything
 * below reaches the caller.
 */

export type StorageErrorKind =
  | 'Storage'
  | 'InvalidArgument'
  | 'IOFailure'
  | 'CorruptRecord'
  | 'InvalidEncoding';

export class StorageError extends Error {
  readonly kind: StorageErrorKind = 'Storage';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Empty key, non-text payload or an oversized key/value. Never touches disk. */
export class InvalidArgumentError extends StorageError {
  override readonly kind = 'InvalidArgument';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class IOFailureError extends StorageError {
  override readonly kind = 'IOFailure';

  constructor(message: string, cause?: unknown) {
    super(cause instanceof Error ? `${message}: ${cause.message}` : message, { cause });
    this.name = 'IOFailureError';
  }
}

/** The bytes at an indexed address no longer form the record the index expects. */
export class CorruptRecordError extends StorageError {
  override readonly kind = 'CorruptRecord';
  readonly offset: number;

  constructor(offset: number, reason: string) {
    super(`Corrupt record at offset ${offset}: ${reason}`);
    this.name = 'CorruptRecordError';
    this.offset = offset;
  }
}

export class InvalidEncodingError extends StorageError {
  override readonly kind = 'InvalidEncoding';
  readonly offset: number;

  constructor(offset: number) {
    super(`Value at offset ${offset} is not valid UTF-8`);
    this.name = 'InvalidEncodingError';
    this.offset = offset;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
