import type { ResponseSink } from '../types/protocol.js';
import type { DownloadResult, ObjectStorage } from './S3TransferManager.js';
import { LocalObjectStore } from './LocalObjectStore.js';
import { ProgressTracker } from './ProgressTracker.js';
import { ErrorHandler, formatErrorMessage } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

export interface TransferServiceOptions {
  /** Send an error-bearing `complete` when a transfer fails */
  reportTransferErrors: boolean;
}

export type TransferOutcome =
  | { success: true; bytesTransferred: number; path?: string }
  | { success: false; error: Error };

/**
 * Runs one download or upload between the local object cache and the
 * object store, reporting progress and the final result to the peer
 */
export class TransferService {
  constructor(
    private readonly storage: ObjectStorage,
    private readonly objects: LocalObjectStore,
    private readonly options: TransferServiceOptions
  ) {}

  async download(oid: string, size: number | undefined, sink: ResponseSink): Promise<TransferOutcome> {
    let outcome: TransferOutcome;
    try {
      const file = await this.objects.create(oid);
      const tracker = new ProgressTracker(oid, sink);
      let result: DownloadResult;
      try {
        result = await this.storage.download(oid, tracker.writer(file));
        await file.commit();
      } catch (error) {
        // No partial object may stay at the cache path
        await this.quietly(file.discard(), `remove partial download ${file.path}`);
        throw error;
      }

      logger.log(`Downloaded ${oid}: ${result.bytesTransferred} bytes in ${result.parts} parts`);
      this.checkSize(oid, size, result.bytesTransferred);
      outcome = { success: true, bytesTransferred: result.bytesTransferred, path: file.path };
    } catch (error) {
      outcome = { success: false, error: error instanceof Error ? error : new Error(String(error)) };
      logger.error(`Error downloading ${oid}: ${formatErrorMessage(error)}`);
    }

    await this.finish(oid, outcome, sink);
    return outcome;
  }

  async upload(oid: string, size: number | undefined, sink: ResponseSink): Promise<TransferOutcome> {
    let outcome: TransferOutcome;
    try {
      // Open before touching the store: a missing object never reaches S3
      const file = await this.objects.openForRead(oid);
      const tracker = new ProgressTracker(oid, sink);
      const body = tracker.reader();
      file.stream.on('error', (error) => {
        body.destroy(ErrorHandler.handleFileSystemError(error, file.path, 'read'));
      });
      file.stream.pipe(body);

      try {
        this.checkSize(oid, size, file.size);
        const result = await this.storage.upload(oid, body);
        logger.log(`Uploaded ${oid}: ${result.bytesTransferred} bytes in ${result.parts} parts`);
        outcome = { success: true, bytesTransferred: result.bytesTransferred };
      } finally {
        await this.quietly(file.close(), `close ${file.path}`);
      }
    } catch (error) {
      outcome = { success: false, error: error instanceof Error ? error : new Error(String(error)) };
      logger.error(`Error uploading ${oid}: ${formatErrorMessage(error)}`);
    }

    await this.finish(oid, outcome, sink);
    return outcome;
  }

  /**
   * Sends the terminal `complete` line for a transfer. Failures are only
   * reported when enabled; encode errors are logged and dropped.
   */
  private async finish(oid: string, outcome: TransferOutcome, sink: ResponseSink): Promise<void> {
    if (!outcome.success && !this.options.reportTransferErrors) {
      return;
    }

    try {
      if (outcome.success) {
        await sink.send({ event: 'complete', oid, path: outcome.path });
      } else {
        await sink.send({ event: 'complete', oid, error: ErrorHandler.formatErrorResponse(outcome.error) });
      }
    } catch (error) {
      logger.error(`Unable to send completion message for ${oid}: ${formatErrorMessage(error)}`);
    }
  }

  private checkSize(oid: string, expected: number | undefined, actual: number): void {
    if (expected !== undefined && expected !== actual) {
      logger.warn(`Size mismatch for ${oid}: request says ${expected} bytes, found ${actual}`);
    }
  }

  private async quietly(action: Promise<void>, description: string): Promise<void> {
    try {
      await action;
    } catch (error) {
      logger.warn(`Failed to ${description}: ${formatErrorMessage(error)}`);
    }
  }
}
