import { open, unlink, FileHandle } from 'fs/promises';
import path from 'path';
import type { Readable } from 'stream';
import type { RandomAccessWriter } from './ProgressTracker.js';
import { ErrorHandler, errorDetails } from '../utils/errorHandler.js';
import { ValidationService } from './ValidationService.js';

/**
 * Open cache file being filled by a download
 */
export class CacheFileWriter implements RandomAccessWriter {
  private closed = false;

  constructor(
    readonly path: string,
    private readonly handle: FileHandle
  ) {}

  async writeAt(chunk: Uint8Array, offset: number): Promise<number> {
    try {
      const { bytesWritten } = await this.handle.write(chunk, 0, chunk.length, offset);
      return bytesWritten;
    } catch (error) {
      throw ErrorHandler.handleFileSystemError(error, this.path, 'write');
    }
  }

  /**
   * Flushes to disk and closes the file
   */
  async commit(): Promise<void> {
    try {
      await this.handle.sync();
    } catch (error) {
      await this.close();
      throw ErrorHandler.handleFileSystemError(error, this.path, 'sync');
    }
    await this.close();
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.handle.close();
    } catch (error) {
      throw ErrorHandler.handleFileSystemError(error, this.path, 'close');
    }
  }

  /**
   * Closes and deletes a file whose download failed
   */
  async discard(): Promise<void> {
    try {
      await this.close();
    } finally {
      try {
        await unlink(this.path);
      } catch (error) {
        if (errorDetails(error).code !== 'ENOENT') {
          throw ErrorHandler.handleFileSystemError(error, this.path, 'remove');
        }
      }
    }
  }
}

export interface CacheFileReader {
  path: string;
  size: number;
  stream: Readable;
  close(): Promise<void>;
}

/**
 * Git LFS local object cache: <root>/<oid[0:2]>/<oid[2:4]>/<oid>.
 * Directories are created by git-lfs itself.
 */
export class LocalObjectStore {
  constructor(private readonly root: string) {}

  pathFor(oid: string): string {
    const validation = ValidationService.validateOid(oid);
    if (!validation.isValid) {
      throw ValidationService.toError(validation);
    }
    return path.join(this.root, oid.slice(0, 2), oid.slice(2, 4), oid);
  }

  /**
   * Creates the cache file, truncating any previous content
   */
  async create(oid: string): Promise<CacheFileWriter> {
    const filePath = this.pathFor(oid);
    try {
      return new CacheFileWriter(filePath, await open(filePath, 'w'));
    } catch (error) {
      throw ErrorHandler.handleFileSystemError(error, filePath, 'create');
    }
  }

  /**
   * Opens an existing cache file for reading
   */
  async openForRead(oid: string): Promise<CacheFileReader> {
    const filePath = this.pathFor(oid);
    let handle: FileHandle;
    try {
      handle = await open(filePath, 'r');
    } catch (error) {
      throw ErrorHandler.handleFileSystemError(error, filePath, 'open');
    }

    try {
      const { size } = await handle.stat();
      const stream = handle.createReadStream({ autoClose: false });
      return {
        path: filePath,
        size,
        stream,
        close: async () => {
          stream.destroy();
          await handle.close();
        },
      };
    } catch (error) {
      await handle.close();
      throw ErrorHandler.handleFileSystemError(error, filePath, 'read');
    }
  }
}
