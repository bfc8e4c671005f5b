import type { AgentConfig, ConfigResolution } from '../types/config.js';
import { ConfigurationError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';
import { ValidationService } from './ValidationService.js';

const MIB = 1024 * 1024;

/**
 * Builds the agent configuration from environment variables
 */
export class ConfigService {
  static readonly REQUIRED_VARIABLES = ['AWS_S3_ENDPOINT', 'S3_BUCKET'] as const;

  static readonly DEFAULT_REGION = 'us-east-1';
  static readonly DEFAULT_OBJECTS_DIR = '.git/lfs/objects';

  static readonly DEFAULT_PART_SIZE_MB = 5;
  static readonly MIN_PART_SIZE_MB = 5; // S3 minimum for every part but the last
  static readonly MAX_PART_SIZE_MB = 512; // each in-flight part is held in memory

  static readonly DEFAULT_UPLOAD_CONCURRENCY = 4;
  static readonly DEFAULT_DOWNLOAD_CONCURRENCY = 1;
  static readonly MIN_CONCURRENCY = 1;
  static readonly MAX_CONCURRENCY = 16;

  /**
   * Resolves the configuration without throwing, so a missing variable
   * can be reported on `init` instead of at process start
   */
  static resolve(env: NodeJS.ProcessEnv = process.env): ConfigResolution {
    try {
      return { ok: true, config: ConfigService.load(env) };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  /**
   * Parses and validates the configuration.
   * Throws ConfigurationError when a required variable is missing or empty.
   */
  static load(env: NodeJS.ProcessEnv = process.env): AgentConfig {
    ConfigService.checkRequired(env);

    const endpoint = env.AWS_S3_ENDPOINT || '';
    const bucket = env.S3_BUCKET || '';

    const endpointValidation = ValidationService.validateEndpoint(endpoint);
    if (!endpointValidation.isValid) {
      throw new ConfigurationError(endpointValidation.error || 'Invalid AWS_S3_ENDPOINT');
    }

    const bucketValidation = ValidationService.validateBucketName(bucket);
    if (!bucketValidation.isValid) {
      logger.warn(`S3_BUCKET "${bucket}" may be rejected by AWS: ${bucketValidation.error}`);
    }

    const profile = env.AWS_PROFILE || undefined;
    const accessKeyId = env.AWS_ACCESS_KEY_ID;
    const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;

    return {
      endpoint,
      bucket,
      region: env.AWS_REGION || ConfigService.DEFAULT_REGION,
      // Profile wins if it's defined
      profile,
      credentials:
        !profile && accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
      forcePathStyle: ConfigService.parseBoolean(env.S3_USEPATHSTYLE, false),
      partSize:
        ConfigService.parseBoundedInt(
          'S3_PART_SIZE_MB',
          env.S3_PART_SIZE_MB,
          ConfigService.DEFAULT_PART_SIZE_MB,
          ConfigService.MIN_PART_SIZE_MB,
          ConfigService.MAX_PART_SIZE_MB
        ) * MIB,
      uploadConcurrency: ConfigService.parseBoundedInt(
        'S3_UPLOAD_CONCURRENCY',
        env.S3_UPLOAD_CONCURRENCY,
        ConfigService.DEFAULT_UPLOAD_CONCURRENCY,
        ConfigService.MIN_CONCURRENCY,
        ConfigService.MAX_CONCURRENCY
      ),
      downloadConcurrency: ConfigService.parseBoundedInt(
        'S3_DOWNLOAD_CONCURRENCY',
        env.S3_DOWNLOAD_CONCURRENCY,
        ConfigService.DEFAULT_DOWNLOAD_CONCURRENCY,
        ConfigService.MIN_CONCURRENCY,
        ConfigService.MAX_CONCURRENCY
      ),
      reportTransferErrors: ConfigService.parseBoolean(env.S3_REPORT_TRANSFER_ERRORS, true),
      objectsDir: env.LFS_OBJECTS_DIR || ConfigService.DEFAULT_OBJECTS_DIR,
    };
  }

  static checkRequired(env: NodeJS.ProcessEnv): void {
    for (const name of ConfigService.REQUIRED_VARIABLES) {
      if (!env[name]) {
        throw new ConfigurationError(`environment variable ${name} not defined`);
      }
    }
  }

  /**
   * Accepts 1/0, t/f and true/false in any case; anything else yields the fallback
   */
  static parseBoolean(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined) {
      return fallback;
    }
    switch (value.trim().toLowerCase()) {
      case '1':
      case 't':
      case 'true':
        return true;
      case '0':
      case 'f':
      case 'false':
        return false;
      default:
        return fallback;
    }
  }

  /**
   * Parses an integer setting, clamping it into [min, max].
   * Non-numeric values fall back to the default with a warning.
   */
  static parseBoundedInt(
    name: string,
    value: string | undefined,
    fallback: number,
    min: number,
    max: number
  ): number {
    if (!value) {
      return fallback;
    }

    const parsedValue = parseInt(value, 10);
    if (isNaN(parsedValue)) {
      logger.warn(`Invalid ${name} value "${value}", using default ${fallback}`);
      return fallback;
    }
    if (parsedValue < min) {
      logger.warn(`${name} value ${parsedValue} is below minimum ${min}, using minimum`);
      return min;
    }
    if (parsedValue > max) {
      logger.warn(`${name} value ${parsedValue} exceeds maximum ${max}, using maximum`);
      return max;
    }
    return parsedValue;
  }
}
