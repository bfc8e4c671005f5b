import type { Readable } from 'stream';
import type { CompletedPart } from '@aws-sdk/client-s3';
import type { RandomAccessWriter } from './ProgressTracker.js';
import type { S3Operations } from './S3Service.js';
import {
  ErrorHandler,
  LocalIOError,
  RemoteTransferError,
  ResponseEncodeError,
  ValidationError,
} from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

export interface UploadResult {
  key: string;
  location: string;
  bytesTransferred: number;
  parts: number;
}

export interface DownloadResult {
  key: string;
  bytesTransferred: number;
  parts: number;
}

/**
 * Storage seam used by the transfer operations. Whatever parallelism an
 * implementation uses internally, each call is one unit of work.
 */
export interface ObjectStorage {
  upload(key: string, body: Readable): Promise<UploadResult>;
  download(key: string, writer: RandomAccessWriter): Promise<DownloadResult>;
}

export interface TransferManagerOptions {
  partSize: number;
  uploadConcurrency: number;
  downloadConcurrency: number;
}

/**
 * Keeps our own error types intact and maps everything else to S3 errors
 */
function toTransferError(error: unknown, key: string): Error {
  if (
    error instanceof RemoteTransferError ||
    error instanceof LocalIOError ||
    error instanceof ResponseEncodeError ||
    error instanceof ValidationError
  ) {
    return error;
  }
  return ErrorHandler.handleS3Error(error, undefined, key);
}

async function* chunksOf(stream: Readable): AsyncGenerator<Uint8Array> {
  for await (const chunk of stream) {
    yield chunk instanceof Uint8Array ? chunk : Buffer.from(String(chunk));
  }
}

/**
 * Multipart transfer manager: parts of `partSize` bytes, uploaded or
 * fetched by a bounded number of concurrent requests
 */
export class S3TransferManager implements ObjectStorage {
  private readonly partSize: number;
  private readonly uploadConcurrency: number;
  private readonly downloadConcurrency: number;

  constructor(
    private readonly s3: S3Operations,
    options: TransferManagerOptions
  ) {
    this.partSize = options.partSize;
    this.uploadConcurrency = Math.max(1, options.uploadConcurrency);
    this.downloadConcurrency = Math.max(1, options.downloadConcurrency);
  }

  /**
   * Streams the body to S3. Bodies that fit in one part go up with a
   * single PutObject; larger ones use a multipart upload, which is
   * aborted if anything fails.
   */
  async upload(key: string, body: Readable): Promise<UploadResult> {
    const parts: CompletedPart[] = [];
    const pendingUploads = new Set<Promise<void>>();
    let uploadId: string | undefined;
    let failure: unknown;
    let partNumber = 1;
    let buffer = Buffer.allocUnsafe(this.partSize);
    let bufferOffset = 0;
    let bytesTransferred = 0;

    const dispatchPart = async (data: Buffer): Promise<void> => {
      if (!uploadId) {
        uploadId = await this.s3.createMultipartUpload(key);
        logger.log(`Started multipart upload ${uploadId} for ${key} (${this.partSize} byte parts)`);
      }

      const currentPartNumber = partNumber++;
      const task: Promise<void> = this.s3
        .uploadPart(key, uploadId, currentPartNumber, data)
        .then(
          (etag) => {
            parts.push({ PartNumber: currentPartNumber, ETag: etag });
          },
          (error: unknown) => {
            if (!failure) {
              failure = error;
            }
          }
        )
        .finally(() => {
          pendingUploads.delete(task);
        });
      pendingUploads.add(task);

      // Stop reading while every upload slot is busy
      while (pendingUploads.size >= this.uploadConcurrency) {
        await Promise.race(pendingUploads);
      }
      if (failure) {
        throw failure;
      }
    };

    try {
      for await (const chunk of chunksOf(body)) {
        let chunkOffset = 0;
        while (chunkOffset < chunk.length) {
          const bytesToCopy = Math.min(this.partSize - bufferOffset, chunk.length - chunkOffset);
          buffer.set(chunk.subarray(chunkOffset, chunkOffset + bytesToCopy), bufferOffset);
          bufferOffset += bytesToCopy;
          chunkOffset += bytesToCopy;
          bytesTransferred += bytesToCopy;

          if (bufferOffset === this.partSize) {
            const partData = buffer;
            buffer = Buffer.allocUnsafe(this.partSize);
            bufferOffset = 0;
            await dispatchPart(partData);
          }
        }
      }

      if (!uploadId) {
        await this.s3.putObject(key, buffer.subarray(0, bufferOffset));
        return { key, location: key, bytesTransferred, parts: 1 };
      }

      if (bufferOffset > 0) {
        await dispatchPart(buffer.subarray(0, bufferOffset));
      }
      await Promise.all(pendingUploads);
      if (failure) {
        throw failure;
      }

      const location = await this.s3.completeUpload(key, uploadId, parts);
      logger.log(`Completed multipart upload of ${key}: ${parts.length} parts, ${bytesTransferred} bytes`);
      return { key, location, bytesTransferred, parts: parts.length };
    } catch (error) {
      body.destroy();
      if (uploadId) {
        await Promise.allSettled(pendingUploads);
        await this.s3.abortUpload(key, uploadId);
      }
      throw toTransferError(error, key);
    }
  }

  /**
   * Fetches the object in ranged parts and writes each at its offset.
   * The first request also tells us the object size.
   */
  async download(key: string, writer: RandomAccessWriter): Promise<DownloadResult> {
    try {
      const first = await this.s3.getObjectRange(key, 0, this.partSize - 1);
      if (!first) {
        return { key, bytesTransferred: 0, parts: 0 };
      }

      const totalSize = first.totalSize;
      let bytesTransferred = await this.writeRange(first.body, writer, 0, first.contentLength);

      const ranges: Array<[number, number]> = [];
      for (let start = bytesTransferred; start < totalSize; start += this.partSize) {
        ranges.push([start, Math.min(start + this.partSize, totalSize) - 1]);
      }

      let nextRange = 0;
      let failed = false;
      const worker = async (): Promise<void> => {
        while (!failed && nextRange < ranges.length) {
          const [start, end] = ranges[nextRange++];
          try {
            const range = await this.s3.getObjectRange(key, start, end);
            if (!range) {
              throw new RemoteTransferError(`Object ${key} shrank during download`);
            }
            const written = await this.writeRange(range.body, writer, start, end - start + 1);
            bytesTransferred += written;
          } catch (error) {
            failed = true;
            throw error;
          }
        }
      };

      const workers = Math.min(this.downloadConcurrency, ranges.length);
      // Let every worker settle so no write lands after the caller closes the file
      const outcomes = await Promise.allSettled(Array.from({ length: workers }, () => worker()));
      for (const outcome of outcomes) {
        if (outcome.status === 'rejected') {
          throw outcome.reason;
        }
      }

      if (bytesTransferred !== totalSize) {
        throw new RemoteTransferError(
          `Incomplete download of ${key}: ${bytesTransferred} of ${totalSize} bytes transferred`
        );
      }

      return { key, bytesTransferred, parts: ranges.length + 1 };
    } catch (error) {
      throw toTransferError(error, key);
    }
  }

  private async writeRange(
    body: Readable,
    writer: RandomAccessWriter,
    start: number,
    expectedLength: number
  ): Promise<number> {
    let offset = start;
    try {
      for await (const chunk of chunksOf(body)) {
        let chunkOffset = 0;
        while (chunkOffset < chunk.length) {
          const written = await writer.writeAt(chunk.subarray(chunkOffset), offset);
          if (written <= 0) {
            throw new LocalIOError(`Write at offset ${offset} made no progress`);
          }
          chunkOffset += written;
          offset += written;
        }
      }
    } finally {
      body.destroy();
    }

    const received = offset - start;
    if (received !== expectedLength) {
      throw new RemoteTransferError(
        `Range starting at ${start} returned ${received} of ${expectedLength} bytes`
      );
    }
    return received;
  }
}
