import {
  S3Client,
  S3ClientConfig,
  PutObjectCommand,
  GetObjectCommand,
  CreateMultipartUploadCommand,
  UploadPartCommand,
  CompleteMultipartUploadCommand,
  AbortMultipartUploadCommand,
  CompletedPart,
} from '@aws-sdk/client-s3';
import { Readable } from 'stream';
import type { AgentConfig } from '../types/config.js';
import { ErrorHandler, RemoteTransferError, errorDetails } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

export interface ObjectRange {
  body: Readable;
  contentLength: number;
  totalSize: number;
}

/**
 * Object-store calls the transfer manager relies on
 */
export interface S3Operations {
  putObject(key: string, data: Buffer): Promise<void>;
  createMultipartUpload(key: string): Promise<string>;
  uploadPart(key: string, uploadId: string, partNumber: number, data: Buffer): Promise<string>;
  completeUpload(key: string, uploadId: string, parts: CompletedPart[]): Promise<string>;
  abortUpload(key: string, uploadId: string): Promise<void>;
  /**
   * Fetches bytes [start, end] inclusive. Resolves to null when the
   * object is empty and no range can be served.
   */
  getObjectRange(key: string, start: number, end: number): Promise<ObjectRange | null>;
}

/**
 * Builds the SDK client options. A named profile wins over static keys.
 */
export function buildClientConfig(config: AgentConfig): S3ClientConfig {
  const clientConfig: S3ClientConfig = {
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    requestHandler: {
      requestTimeout: 300000, // 5 minutes for individual requests
      connectionTimeout: 60000, // 1 minute to establish connection
    },
    // The SDK's own retry strategy is the only retry layer
    maxAttempts: 5,
  };

  if (config.profile) {
    clientConfig.profile = config.profile;
  } else if (config.credentials) {
    clientConfig.credentials = {
      accessKeyId: config.credentials.accessKeyId,
      secretAccessKey: config.credentials.secretAccessKey,
    };
  }

  return clientConfig;
}

/**
 * Parses the total object size out of `bytes 0-5242879/12345678`
 */
export function parseContentRangeTotal(contentRange: string | undefined): number | undefined {
  if (!contentRange) {
    return undefined;
  }
  const match = /^bytes\s+(?:\d+-\d+|\*)\/(\d+)$/i.exec(contentRange.trim());
  return match ? parseInt(match[1], 10) : undefined;
}

/**
 * Service for handling S3 operations against the configured bucket
 */
export class S3Service implements S3Operations {
  private readonly s3Client: S3Client;
  private readonly bucket: string;

  constructor(config: AgentConfig, client?: S3Client) {
    this.bucket = config.bucket;
    this.s3Client = client ?? new S3Client(buildClientConfig(config));
  }

  async putObject(key: string, data: Buffer): Promise<void> {
    try {
      await this.s3Client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: data,
          ContentLength: data.length,
          ContentType: 'application/octet-stream',
        })
      );
    } catch (error) {
      throw ErrorHandler.handleS3Error(error, this.bucket, key);
    }
  }

  /**
   * Creates a multipart upload
   * Returns the upload ID
   */
  async createMultipartUpload(key: string): Promise<string> {
    try {
      const response = await this.s3Client.send(
        new CreateMultipartUploadCommand({
          Bucket: this.bucket,
          Key: key,
          ContentType: 'application/octet-stream',
        })
      );

      if (!response.UploadId) {
        throw new RemoteTransferError('Failed to create multipart upload: No upload ID returned');
      }

      return response.UploadId;
    } catch (error) {
      throw ErrorHandler.handleS3Error(error, this.bucket, key);
    }
  }

  /**
   * Uploads a single part of a multipart upload
   * Returns the ETag for the uploaded part
   */
  async uploadPart(key: string, uploadId: string, partNumber: number, data: Buffer): Promise<string> {
    const startTime = Date.now();
    try {
      const response = await this.s3Client.send(
        new UploadPartCommand({
          Bucket: this.bucket,
          Key: key,
          UploadId: uploadId,
          PartNumber: partNumber,
          Body: data,
          ContentLength: data.length,
        })
      );

      const duration = ((Date.now() - startTime) / 1000).toFixed(2);
      logger.log(`Part ${partNumber} of ${key} uploaded in ${duration}s (${(data.length / 1024 / 1024).toFixed(2)} MB)`);

      if (!response.ETag) {
        throw new RemoteTransferError(`Failed to upload part ${partNumber}: No ETag returned`);
      }

      return response.ETag;
    } catch (error) {
      const duration = ((Date.now() - startTime) / 1000).toFixed(2);
      const { name, statusCode } = errorDetails(error);
      logger.error(`Failed to upload part ${partNumber} after ${duration}s`, { name, statusCode });
      throw ErrorHandler.handleS3Error(error, this.bucket, key);
    }
  }

  /**
   * Completes a multipart upload
   * Returns the S3 location URL
   */
  async completeUpload(key: string, uploadId: string, parts: CompletedPart[]): Promise<string> {
    try {
      // S3 requires parts in ascending order; concurrent uploads finish out of order
      const sortedParts = [...parts].sort((a, b) => (a.PartNumber || 0) - (b.PartNumber || 0));

      await this.s3Client.send(
        new CompleteMultipartUploadCommand({
          Bucket: this.bucket,
          Key: key,
          UploadId: uploadId,
          MultipartUpload: {
            Parts: sortedParts,
          },
        })
      );

      return `s3://${this.bucket}/${key}`;
    } catch (error) {
      throw ErrorHandler.handleS3Error(error, this.bucket, key);
    }
  }

  /**
   * Aborts a multipart upload after a failure.
   * Never throws; failures are only logged.
   */
  async abortUpload(key: string, uploadId: string): Promise<void> {
    try {
      await this.s3Client.send(
        new AbortMultipartUploadCommand({
          Bucket: this.bucket,
          Key: key,
          UploadId: uploadId,
        })
      );
      logger.log(`Aborted multipart upload ${uploadId} for ${this.bucket}/${key}`);
    } catch (error) {
      const { name, message } = errorDetails(error);
      logger.error(`Failed to abort multipart upload ${uploadId}: ${message || name || 'Unknown error'}`);
    }
  }

  async getObjectRange(key: string, start: number, end: number): Promise<ObjectRange | null> {
    try {
      const response = await this.s3Client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Range: `bytes=${start}-${end}`,
        })
      );

      const body = response.Body;
      if (!(body instanceof Readable)) {
        throw new RemoteTransferError(`Unexpected response body for ${key}`);
      }

      const contentLength = response.ContentLength ?? 0;
      return {
        body,
        contentLength,
        // Servers that ignore Range send the whole object without Content-Range
        totalSize: parseContentRangeTotal(response.ContentRange) ?? contentLength,
      };
    } catch (error) {
      if (start === 0 && errorDetails(error).name === 'InvalidRange') {
        return null;
      }
      throw ErrorHandler.handleS3Error(error, this.bucket, key);
    }
  }
}
