import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  ErrorHandler,
  LocalIOError,
  RemoteTransferError,
  ValidationError,
  errorDetails,
  formatErrorMessage,
} from './errorHandler.js';

function sdkError(name: string, httpStatusCode?: number): Error {
  const error = new Error(`${name} from service`);
  error.name = name;
  return Object.assign(error, { $metadata: { httpStatusCode } });
}

function errnoError(code: string): Error {
  return Object.assign(new Error(`${code}: failed`), { code });
}

describe('ErrorHandler', () => {
  describe('errorDetails', () => {
    it('should read name, code, message and HTTP status', () => {
      const error = Object.assign(sdkError('SlowDown', 503), { code: 'SlowDown' });
      expect(errorDetails(error)).toEqual({
        name: 'SlowDown',
        code: 'SlowDown',
        message: 'SlowDown from service',
        statusCode: 503,
      });
    });

    it('should handle strings and non-objects', () => {
      expect(errorDetails('plain failure')).toEqual({ message: 'plain failure' });
      expect(errorDetails(42)).toEqual({});
      expect(errorDetails(null)).toEqual({});
    });
  });

  describe('handleS3Error', () => {
    it('should describe a missing object', () => {
      const error = ErrorHandler.handleS3Error(sdkError('NoSuchKey', 404), 'lfs-objects', 'abcd');
      expect(error).toBeInstanceOf(RemoteTransferError);
      expect(error.message).toBe("Object 'abcd' does not exist in bucket 'lfs-objects'");
    });

    it('should describe a missing bucket', () => {
      expect(ErrorHandler.handleS3Error(sdkError('NoSuchBucket', 404), 'lfs-objects').message).toBe(
        "S3 bucket 'lfs-objects' does not exist"
      );
    });

    it('should map bare HTTP statuses', () => {
      expect(ErrorHandler.handleS3Error(sdkError('Unknown', 403), 'lfs-objects').message).toBe(
        "Insufficient permissions for bucket 'lfs-objects'"
      );
      expect(ErrorHandler.handleS3Error(sdkError('Unknown', 503)).message).toBe('S3 service temporarily unavailable');
      expect(ErrorHandler.handleS3Error(sdkError('Unknown', 500)).message).toBe('S3 internal server error');
    });

    it('should map throttling and credential errors', () => {
      expect(ErrorHandler.handleS3Error(sdkError('SlowDown')).message).toBe('S3 request throttled');
      expect(ErrorHandler.handleS3Error(sdkError('InvalidAccessKeyId')).message).toBe(
        'S3 rejected the configured credentials'
      );
    });

    it('should report unreachable endpoints', () => {
      expect(ErrorHandler.handleS3Error(errnoError('ECONNREFUSED')).message).toBe(
        'Unable to reach S3 endpoint: ECONNREFUSED: failed'
      );
    });

    it('should keep errors that were already mapped', () => {
      const original = new RemoteTransferError('already mapped');
      expect(ErrorHandler.handleS3Error(original)).toBe(original);
    });

    it('should fall back to a generic message', () => {
      expect(ErrorHandler.handleS3Error(new Error('socket hang up')).message).toBe('S3 operation failed: socket hang up');
    });
  });

  describe('handleFileSystemError', () => {
    it.each([
      ['ENOENT', 'Cannot open /tmp/x: no such file or directory'],
      ['EACCES', 'Cannot open /tmp/x: permission denied'],
      ['EISDIR', 'Cannot open /tmp/x: path is a directory'],
      ['ENOSPC', 'Cannot open /tmp/x: no space left on device'],
      ['EMFILE', 'Cannot open /tmp/x: too many open files'],
    ])('should describe %s', (code, message) => {
      const error = ErrorHandler.handleFileSystemError(errnoError(code), '/tmp/x', 'open');
      expect(error).toBeInstanceOf(LocalIOError);
      expect(error.message).toBe(message);
    });
  });

  describe('formatErrorResponse', () => {
    it('should assign a protocol code per error type', () => {
      expect(ErrorHandler.formatErrorResponse(new ConfigurationError('no bucket'))).toEqual({
        code: 1,
        message: 'no bucket',
      });
      expect(ErrorHandler.formatErrorResponse(new ValidationError('bad oid')).code).toBe(2);
      expect(ErrorHandler.formatErrorResponse(new LocalIOError('missing')).code).toBe(3);
      expect(ErrorHandler.formatErrorResponse(new RemoteTransferError('denied')).code).toBe(4);
      expect(ErrorHandler.formatErrorResponse(new Error('other')).code).toBe(5);
    });
  });

  describe('formatErrorMessage', () => {
    it('should format any thrown value', () => {
      expect(formatErrorMessage(new Error('boom'))).toBe('boom');
      expect(formatErrorMessage('text')).toBe('text');
      expect(formatErrorMessage(undefined)).toBe('Unknown error occurred');
      expect(formatErrorMessage(7)).toBe('7');
    });
  });
});
