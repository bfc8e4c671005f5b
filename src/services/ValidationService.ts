import type { ValidationResult } from '../types/validation.js';
import { ValidationError } from '../utils/errorHandler.js';

export class ValidationService {
  /**
   * Validates an LFS object id before it is turned into a path or key.
   *
   * Rules:
   * - At least 4 characters, so the two shard directories exist
   * - Hexadecimal digits only (git-lfs uses SHA-256 ids)
   */
  static validateOid(oid: string | undefined): ValidationResult {
    if (!oid) {
      return {
        isValid: false,
        error: 'Object id is required',
      };
    }

    if (oid.length < 4) {
      return {
        isValid: false,
        error: `Object id "${oid}" is too short`,
      };
    }

    if (!/^[0-9a-fA-F]+$/.test(oid)) {
      return {
        isValid: false,
        error: `Object id "${oid}" must contain hexadecimal digits only`,
      };
    }

    return { isValid: true };
  }

  /**
   * Validates the storage endpoint URL
   */
  static validateEndpoint(endpoint: string): ValidationResult {
    let url: URL;
    try {
      url = new URL(endpoint);
    } catch {
      return {
        isValid: false,
        error: `Invalid endpoint URL "${endpoint}"`,
      };
    }

    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      return {
        isValid: false,
        error: 'Endpoint URL must use HTTP or HTTPS',
      };
    }

    return { isValid: true };
  }

  /**
   * Validates S3 bucket name according to AWS naming conventions.
   * Other S3-compatible stores accept wider names, so callers only warn.
   *
   * Rules:
   * - Must be between 3 and 63 characters long
   * - Can consist only of lowercase letters, numbers, dots (.), and hyphens (-)
   * - Must begin and end with a letter or number
   * - Must not contain two adjacent periods
   * - Must not be formatted as an IP address (e.g., 192.168.5.4)
   */
  static validateBucketName(bucketName: string): ValidationResult {
    if (bucketName.length < 3 || bucketName.length > 63) {
      return {
        isValid: false,
        error: 'Bucket name must be between 3 and 63 characters long',
      };
    }

    if (!/^[a-z0-9.-]+$/.test(bucketName)) {
      return {
        isValid: false,
        error: 'Bucket name can only contain lowercase letters, numbers, dots, and hyphens',
      };
    }

    if (!/^[a-z0-9].*[a-z0-9]$/.test(bucketName)) {
      return {
        isValid: false,
        error: 'Bucket name must begin and end with a letter or number',
      };
    }

    if (bucketName.includes('..')) {
      return {
        isValid: false,
        error: 'Bucket name must not contain two adjacent periods',
      };
    }

    if (/^(\d{1,3}\.){3}\d{1,3}$/.test(bucketName)) {
      return {
        isValid: false,
        error: 'Bucket name must not be formatted as an IP address',
      };
    }

    return { isValid: true };
  }

  static toError(result: ValidationResult): ValidationError {
    return new ValidationError(result.error || 'Validation failed');
  }
}
