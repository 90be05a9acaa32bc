export type StoreOperation =
  | 'initDb'
  | 'add'
  | 'remove'
  | 'get'
  | 'listAll'
  | 'count'
  | 'updateSignature'
  | 'updateLastModified'
  | 'updateSize'
  | 'updateStat'
  | 'updatePath'
  | 'setScore'
  | 'updateGrade'
  | 'close';

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly operation: StoreOperation,
    public readonly path?: string
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

export class NotFoundError extends StoreError {
  constructor(operation: StoreOperation, path: string) {
    super(`No record for ${path}`, operation, path);
    this.name = 'NotFoundError';
  }
}

export class DuplicateKeyError extends StoreError {
  constructor(operation: StoreOperation, path: string) {
    super(`A record already exists for ${path}`, operation, path);
    this.name = 'DuplicateKeyError';
  }
}

/** Backend failure (I/O, locking, corrupt database). Wraps the driver error. */
export class StorageError extends StoreError {
  constructor(operation: StoreOperation, cause: unknown, path?: string) {
    super(`Storage failure during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`, operation, path);
    this.name = 'StorageError';
    this.cause = cause;
  }
}

export class StoreBuildError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreBuildError';
  }
}
