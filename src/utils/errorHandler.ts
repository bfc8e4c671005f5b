import type { ProtocolError } from '../types/protocol.js';

/**
 * Custom error classes for different error types
 */

export class ProtocolDecodeError extends Error {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'ProtocolDecodeError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class LocalIOError extends Error {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'LocalIOError';
  }
}

export class RemoteTransferError extends Error {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'RemoteTransferError';
  }
}

export class ResponseEncodeError extends Error {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'ResponseEncodeError';
  }
}

/**
 * Error codes reported to the peer in `error.code`
 */
export const ErrorCodes = {
  CONFIGURATION: 1,
  VALIDATION: 2,
  LOCAL_IO: 3,
  REMOTE_TRANSFER: 4,
  UNKNOWN: 5,
} as const;

interface ErrorDetails {
  name?: string;
  code?: string;
  message?: string;
  statusCode?: number;
}

/**
 * Pulls the fields we branch on out of an SDK, errno or plain error
 */
export function errorDetails(error: unknown): ErrorDetails {
  if (typeof error !== 'object' || error === null) {
    return typeof error === 'string' ? { message: error } : {};
  }

  const details: ErrorDetails = {};
  if ('name' in error && typeof error.name === 'string') {
    details.name = error.name;
  }
  if ('code' in error && typeof error.code === 'string') {
    details.code = error.code;
  }
  if ('message' in error && typeof error.message === 'string') {
    details.message = error.message;
  }
  if ('$metadata' in error && typeof error.$metadata === 'object' && error.$metadata !== null) {
    const metadata = error.$metadata;
    if ('httpStatusCode' in metadata && typeof metadata.httpStatusCode === 'number') {
      details.statusCode = metadata.httpStatusCode;
    }
  }
  return details;
}

export class ErrorHandler {
  /**
   * Handles S3 errors (missing object or bucket, access denied, throttling)
   */
  static handleS3Error(error: unknown, bucket?: string, key?: string): RemoteTransferError {
    if (error instanceof RemoteTransferError) {
      return error;
    }

    const { name, code, message, statusCode } = errorDetails(error);
    const bucketName = bucket || 'specified bucket';

    if (name === 'NoSuchKey') {
      return new RemoteTransferError(`Object '${key}' does not exist in bucket '${bucketName}'`, error);
    }

    if (name === 'NoSuchBucket') {
      return new RemoteTransferError(`S3 bucket '${bucketName}' does not exist`, error);
    }

    if (name === 'NotFound' || statusCode === 404) {
      return key
        ? new RemoteTransferError(`Object '${key}' not found in bucket '${bucketName}'`, error)
        : new RemoteTransferError(`S3 bucket '${bucketName}' does not exist`, error);
    }

    if (name === 'AccessDenied') {
      return new RemoteTransferError(`Access denied to bucket '${bucketName}'`, error);
    }

    if (name === 'Forbidden' || statusCode === 403) {
      return new RemoteTransferError(`Insufficient permissions for bucket '${bucketName}'`, error);
    }

    if (name === 'InvalidAccessKeyId' || name === 'SignatureDoesNotMatch') {
      return new RemoteTransferError('S3 rejected the configured credentials', error);
    }

    if (name === 'EntityTooLarge') {
      return new RemoteTransferError('Object size exceeds S3 limits', error);
    }

    if (name === 'EntityTooSmall') {
      return new RemoteTransferError('Multipart upload part is below the S3 minimum size', error);
    }

    if (code === 'NetworkingError' || name === 'NetworkingError') {
      return new RemoteTransferError('S3 transfer failed: network error', error);
    }

    if (code === 'ECONNREFUSED' || code === 'ENOTFOUND') {
      return new RemoteTransferError(`Unable to reach S3 endpoint: ${message || code}`, error);
    }

    if (name === 'RequestTimeout' || name === 'TimeoutError') {
      return new RemoteTransferError('S3 request timed out', error);
    }

    if (name === 'ServiceUnavailable' || statusCode === 503) {
      return new RemoteTransferError('S3 service temporarily unavailable', error);
    }

    if (name === 'InternalError' || statusCode === 500) {
      return new RemoteTransferError('S3 internal server error', error);
    }

    if (name === 'SlowDown' || name === 'ThrottlingException' || name === 'RequestLimitExceeded') {
      return new RemoteTransferError('S3 request throttled', error);
    }

    if (name === 'NoSuchUpload') {
      return new RemoteTransferError('Multipart upload does not exist or was aborted', error);
    }

    if (name === 'InvalidPart' || name === 'InvalidPartOrder') {
      return new RemoteTransferError('Invalid multipart upload part list', error);
    }

    return new RemoteTransferError(`S3 operation failed: ${message || 'Unknown error'}`, error);
  }

  /**
   * Handles errors from the local object cache
   */
  static handleFileSystemError(error: unknown, path: string, action: string): LocalIOError {
    if (error instanceof LocalIOError) {
      return error;
    }

    const { code, message } = errorDetails(error);

    if (code === 'ENOENT') {
      return new LocalIOError(`Cannot ${action} ${path}: no such file or directory`, error);
    }

    if (code === 'EACCES' || code === 'EPERM') {
      return new LocalIOError(`Cannot ${action} ${path}: permission denied`, error);
    }

    if (code === 'EISDIR') {
      return new LocalIOError(`Cannot ${action} ${path}: path is a directory`, error);
    }

    if (code === 'ENOSPC') {
      return new LocalIOError(`Cannot ${action} ${path}: no space left on device`, error);
    }

    if (code === 'EMFILE') {
      return new LocalIOError(`Cannot ${action} ${path}: too many open files`, error);
    }

    return new LocalIOError(`Cannot ${action} ${path}: ${message || 'Unknown error'}`, error);
  }

  /**
   * Formats error for a protocol `error` field
   */
  static formatErrorResponse(error: unknown): ProtocolError {
    let code: number = ErrorCodes.UNKNOWN;

    if (error instanceof ConfigurationError) {
      code = ErrorCodes.CONFIGURATION;
    } else if (error instanceof ValidationError) {
      code = ErrorCodes.VALIDATION;
    } else if (error instanceof LocalIOError) {
      code = ErrorCodes.LOCAL_IO;
    } else if (error instanceof RemoteTransferError) {
      code = ErrorCodes.REMOTE_TRANSFER;
    }

    return {
      code,
      message: formatErrorMessage(error),
    };
  }
}

/**
 * Formats error message for the diagnostic log and the peer
 */
export function formatErrorMessage(error: unknown): string {
  if (!error) {
    return 'Unknown error occurred';
  }

  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return String(error);
}
