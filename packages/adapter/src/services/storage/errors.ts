import { S3ServiceException } from '@aws-sdk/client-s3';

export type StorageErrorCode =
  | 'InvalidArgument'
  | 'BucketNameEmpty'
  | 'BucketNameTopLevel'
  | 'BucketInvalid'
  | 'BucketDoesNotExist'
  | 'ObjectMissing'
  | 'ObjectAlreadyExists'
  | 'ObjectAlreadyExistsAsDirectory'
  | 'ObjectOnGlacier'
  | 'PathInsufficientPermission'
  | 'UnexpectedShortWrite'
  | 'OpaqueBackendError';

export class StorageError extends Error {
  readonly code: StorageErrorCode;

  readonly cause?: unknown;

  constructor(message: string, code: StorageErrorCode, cause?: unknown) {
    super(message);
    this.name = 'StorageError';
    this.code = code;
    this.cause = cause;
  }
}

export class InvalidArgumentError extends StorageError {
  constructor(message = 'Invalid argument', cause?: unknown) {
    super(message, 'InvalidArgument', cause);
  }
}

export class BucketNameEmptyError extends StorageError {
  constructor() {
    super('Bucket name cannot be empty', 'BucketNameEmpty');
  }
}

export class BucketNameTopLevelError extends StorageError {
  constructor() {
    super('Buckets can only be created at the top level', 'BucketNameTopLevel');
  }
}

export class BucketInvalidError extends StorageError {
  constructor(
    readonly bucket: string,
    reason = `Bucket name '${bucket}' is not valid`
  ) {
    super(reason, 'BucketInvalid');
  }
}

export class BucketDoesNotExistError extends StorageError {
  constructor(readonly bucket: string) {
    super(`Bucket '${bucket}' does not exist`, 'BucketDoesNotExist');
  }
}

export class ObjectMissingError extends StorageError {
  constructor(cause?: unknown) {
    super('Object does not exist', 'ObjectMissing', cause);
  }
}

export class ObjectAlreadyExistsError extends StorageError {
  constructor(readonly object: string) {
    super(`Object '${object}' already exists`, 'ObjectAlreadyExists');
  }
}

export class ObjectAlreadyExistsAsDirectoryError extends StorageError {
  constructor(readonly object: string) {
    super(`Object '${object}' already exists as a directory`, 'ObjectAlreadyExistsAsDirectory');
  }
}

export class ObjectOnGlacierError extends StorageError {
  constructor(readonly key: string) {
    super(`Object '${key}' is archived and must be restored before it can be read`, 'ObjectOnGlacier');
  }
}

export class PathInsufficientPermissionError extends StorageError {
  constructor(readonly path: string) {
    super(`Insufficient permissions to access '${path}'`, 'PathInsufficientPermission');
  }
}

export class UnexpectedShortWriteError extends StorageError {
  constructor(
    readonly expected: number,
    readonly written: number,
    cause?: unknown
  ) {
    super(`Wrote ${written} of ${expected} bytes before the upload stream ended`, 'UnexpectedShortWrite', cause);
  }
}

export class OpaqueBackendError extends StorageError {
  constructor(
    message: string,
    readonly backendCode: string | undefined,
    cause: unknown
  ) {
    super(message, 'OpaqueBackendError', cause);
  }
}

export const isStorageError = (error: unknown, code?: StorageErrorCode): error is StorageError => {
  return error instanceof StorageError && (code === undefined || error.code === code);
};

export type TranslatedOperation = 'get' | 'put' | 'copy' | 'remove' | 'stat' | 'list' | 'other';

export interface TranslationContext {
  operation: TranslatedOperation;
  bucket: string;
  object: string;
  path: string;
  /** Declared size of an upload. */
  expectedSize?: number;
  /** Bytes handed to the backend before the upload failed. */
  writtenSize?: number;
}

const PREMATURE_CLOSE_CODES = new Set(['ERR_STREAM_PREMATURE_CLOSE', 'UnexpectedEOF']);

/**
 * Reads the backend's error code: the exception name for SDK service errors,
 * `Code`/`code` for anything else that carries one.
 */
export const backendErrorCode = (error: unknown): string | undefined => {
  if (error instanceof S3ServiceException) {
    return error.name;
  }

  if (typeof error !== 'object' || error === null) {
    return undefined;
  }

  for (const key of ['Code', 'code', 'name'] as const) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === 'string' && value.length > 0 && value !== 'Error') {
      return value;
    }
  }
  return undefined;
};

const describeError = (error: unknown): string => {
  if (error instanceof Error && error.message.length > 0) {
    return error.message;
  }
  return String(error);
};

/**
 * Maps any failure raised by a backend call to a domain error. Errors that are
 * already domain errors are returned unchanged.
 */
export const translateError = (error: unknown, context: TranslationContext): StorageError => {
  if (error instanceof StorageError) {
    return error;
  }

  const code = backendErrorCode(error);

  if (context.operation === 'put') {
    if (code !== undefined && PREMATURE_CLOSE_CODES.has(code)) {
      return new UnexpectedShortWriteError(context.expectedSize ?? 0, context.writtenSize ?? 0, error);
    }
    if (code === 'MethodNotAllowed') {
      return new ObjectAlreadyExistsError(context.object);
    }
    if (code === 'XMinioObjectExistsAsDirectory') {
      return new ObjectAlreadyExistsAsDirectoryError(context.object);
    }
  }

  switch (code) {
    case 'AccessDenied':
      return new PathInsufficientPermissionError(context.path);
    case 'NoSuchBucket':
      return new BucketDoesNotExistError(context.bucket);
    case 'InvalidBucketName':
      return new BucketInvalidError(context.bucket);
    case 'NoSuchKey':
    case 'InvalidArgument':
      return new ObjectMissingError(error);
    default:
      return new OpaqueBackendError(describeError(error), code, error);
  }
};
