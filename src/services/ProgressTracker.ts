import { Transform, TransformCallback } from 'stream';
import type { ResponseSink } from '../types/protocol.js';
import { formatErrorMessage } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

/**
 * Destination that accepts chunks at absolute offsets, so parts of an
 * object can land in any order
 */
export interface RandomAccessWriter {
  writeAt(chunk: Uint8Array, offset: number): Promise<number>;
}

/**
 * Counts the bytes of one transfer and reports each chunk to the peer as
 * a `progress` line. The only state is the running total.
 */
export class ProgressTracker {
  private bytesProcessed = 0;
  private sendFailed = false;

  constructor(
    private readonly oid: string,
    private readonly sink: ResponseSink
  ) {}

  get bytesSoFar(): number {
    return this.bytesProcessed;
  }

  /**
   * Adds n bytes to the total and emits one progress line; zero-length
   * chunks emit nothing. A line that cannot be sent does not stop the
   * transfer; only the first such failure is logged.
   */
  async record(n: number): Promise<void> {
    if (n <= 0) {
      return;
    }
    this.bytesProcessed += n;
    try {
      await this.sink.send({
        event: 'progress',
        oid: this.oid,
        bytesSoFar: this.bytesProcessed,
        bytesSinceLast: n,
      });
    } catch (error) {
      if (!this.sendFailed) {
        this.sendFailed = true;
        logger.error(`Unable to send progress for ${this.oid}: ${formatErrorMessage(error)}`);
      }
    }
  }

  /**
   * Pass-through stream for the source side of an upload. Chunks leave
   * unchanged; the next chunk is taken only after its progress line has
   * been written.
   */
  reader(): Transform {
    return new Transform({
      transform: (chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) => {
        this.record(chunk.length).then(
          () => callback(null, chunk),
          (error: unknown) => callback(error instanceof Error ? error : new Error(String(error)))
        );
      },
    });
  }

  /**
   * Decorates the destination of a download. Failed writes are rethrown
   * untouched and produce no progress line.
   */
  writer(target: RandomAccessWriter): RandomAccessWriter {
    return {
      writeAt: async (chunk: Uint8Array, offset: number): Promise<number> => {
        const written = await target.writeAt(chunk, offset);
        await this.record(written);
        return written;
      },
    };
  }
}
