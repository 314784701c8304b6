export type ReconcileErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'STORE_UNAVAILABLE'
  | 'DUPLICATE_KEY'
  | 'INVALID_STATE';

export class ReconcileError extends Error {
  constructor(
    readonly code: ReconcileErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The observation source could not be reached or returned bad data. */
export class SourceUnavailableError extends ReconcileError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SOURCE_UNAVAILABLE', message, options);
  }
}

/** The persistence layer failed mid-pass; staged writes are rolled back. */
export class StoreUnavailableError extends ReconcileError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', message, options);
  }
}

/**
 * An insert hit an existing natural key. The resolver always looks a key up
 * before inserting, so this only surfaces when that contract is broken.
 */
export class DuplicateKeyError extends ReconcileError {
  constructor(
    readonly entity: string,
    readonly key: string,
    options?: { cause?: unknown },
  ) {
    super('DUPLICATE_KEY', `Duplicate ${entity} key: ${key}`, options);
  }
}

export class InvalidReconcilerStateError extends ReconcileError {
  constructor(message: string) {
    super('INVALID_STATE', message);
  }
}

export function errToMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
