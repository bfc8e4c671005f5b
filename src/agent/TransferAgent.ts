import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';
import type { AgentConfig, ConfigResolution } from '../types/config.js';
import type { Request, Response, ResponseSink } from '../types/protocol.js';
import { ProtocolCodec } from '../services/ProtocolCodec.js';
import { ResponseWriter } from '../services/ResponseWriter.js';
import { LocalObjectStore } from '../services/LocalObjectStore.js';
import { S3Service } from '../services/S3Service.js';
import { S3TransferManager, type ObjectStorage } from '../services/S3TransferManager.js';
import { TransferService } from '../services/TransferService.js';
import { ValidationService } from '../services/ValidationService.js';
import {
  ConfigurationError,
  ErrorCodes,
  ErrorHandler,
  ValidationError,
  formatErrorMessage,
} from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

export type AgentState = 'awaiting-init' | 'ready' | 'terminated';

/**
 * Why the loop stopped
 */
export type AgentExit = 'terminated' | 'init-failed' | 'decode-failed' | 'input-closed';

export interface TransferAgentOptions {
  input: Readable;
  output: Writable;
  configuration: ConfigResolution;
  createStorage?: (config: AgentConfig) => ObjectStorage;
}

export function createS3Storage(config: AgentConfig): ObjectStorage {
  return new S3TransferManager(new S3Service(config), {
    partSize: config.partSize,
    uploadConcurrency: config.uploadConcurrency,
    downloadConcurrency: config.downloadConcurrency,
  });
}

/**
 * Event loop of the custom transfer agent. Requests are handled strictly
 * one at a time: a transfer runs to completion before the next line is
 * read, since responses carry no request ids.
 */
export class TransferAgent {
  private state: AgentState = 'awaiting-init';
  private transfers?: TransferService;
  private readonly sink: ResponseSink;
  private readonly createStorage: (config: AgentConfig) => ObjectStorage;

  constructor(private readonly options: TransferAgentOptions) {
    this.sink = new ResponseWriter(options.output);
    this.createStorage = options.createStorage ?? createS3Storage;
  }

  get currentState(): AgentState {
    return this.state;
  }

  async run(): Promise<AgentExit> {
    const lines = createInterface({ input: this.options.input, crlfDelay: Infinity, terminal: false });

    try {
      for await (const line of lines) {
        let request: Request;
        try {
          request = ProtocolCodec.decodeRequest(line);
        } catch (error) {
          // Framing is one object per line; there is no way to resynchronise
          logger.error(`Error reading input: ${formatErrorMessage(error)}`);
          this.state = 'terminated';
          return 'decode-failed';
        }

        const exit = await this.dispatch(request);
        if (exit) {
          this.state = 'terminated';
          return exit;
        }
      }
    } finally {
      lines.close();
    }

    this.state = 'terminated';
    return 'input-closed';
  }

  /**
   * Handles one request; returns an exit reason when the loop must stop
   */
  private async dispatch(request: Request): Promise<AgentExit | undefined> {
    const { event } = request;
    switch (event) {
      case 'init':
        return this.handleInit();
      case 'download':
      case 'upload':
        logger.log(`Received ${event} request for ${request.oid}`);
        await this.handleTransfer(event, request);
        return undefined;
      case 'terminate':
        logger.log('Terminating transfer agent gracefully.');
        return 'terminated';
      default:
        return undefined;
    }
  }

  private async handleInit(): Promise<AgentExit | undefined> {
    const { configuration } = this.options;

    if (!configuration.ok) {
      logger.error(`Initialization failed: ${configuration.error.message}`);
      await this.sendQuietly({
        error: {
          code: ErrorCodes.CONFIGURATION,
          message: `Initialization error: ${configuration.error.message}.`,
        },
      });
      return 'init-failed';
    }

    await this.sendQuietly({});
    this.state = 'ready';
    return undefined;
  }

  private async handleTransfer(event: 'download' | 'upload', request: Request): Promise<void> {
    const oid = request.oid ?? '';
    const { configuration } = this.options;
    const reportErrors = configuration.ok ? configuration.config.reportTransferErrors : true;

    let transfers: TransferService;
    try {
      if (this.state !== 'ready') {
        throw new ValidationError(`Received ${event} for ${oid} before init`);
      }
      const validation = ValidationService.validateOid(request.oid);
      if (!validation.isValid) {
        throw ValidationService.toError(validation);
      }
      transfers = this.transferService();
    } catch (error) {
      logger.error(`Rejected ${event} request for ${oid}: ${formatErrorMessage(error)}`);
      if (reportErrors) {
        await this.sendQuietly({ event: 'complete', oid, error: ErrorHandler.formatErrorResponse(error) });
      }
      return;
    }

    if (event === 'download') {
      await transfers.download(oid, request.size, this.sink);
    } else {
      await transfers.upload(oid, request.size, this.sink);
    }
  }

  /**
   * Builds the storage stack once, on the first transfer after init
   */
  private transferService(): TransferService {
    if (this.transfers) {
      return this.transfers;
    }

    const { configuration } = this.options;
    if (!configuration.ok) {
      throw configuration.error;
    }

    const { config } = configuration;
    let storage: ObjectStorage;
    try {
      storage = this.createStorage(config);
    } catch (error) {
      throw new ConfigurationError(`Error creating storage client: ${formatErrorMessage(error)}`, error);
    }

    this.transfers = new TransferService(storage, new LocalObjectStore(config.objectsDir), {
      reportTransferErrors: config.reportTransferErrors,
    });
    return this.transfers;
  }

  private async sendQuietly(response: Response): Promise<void> {
    try {
      await this.sink.send(response);
    } catch (error) {
      logger.error(`Unable to send response: ${formatErrorMessage(error)}`);
    }
  }
}
