import { once } from 'events';
import type { Writable } from 'stream';
import type { Response, ResponseSink } from '../types/protocol.js';
import { ResponseEncodeError } from '../utils/errorHandler.js';
import { ProtocolCodec } from './ProtocolCodec.js';

/**
 * Writes protocol responses to the output stream, one line per write.
 * `send` resolves once the stream has taken the line and, when its
 * buffer is full, after `drain`.
 */
export class ResponseWriter implements ResponseSink {
  private failure?: Error;

  constructor(private readonly output: Writable) {
    this.output.on('error', (error: Error) => {
      this.failure = error;
    });
  }

  async send(response: Response): Promise<void> {
    if (this.failure) {
      throw new ResponseEncodeError('Output stream failed earlier', this.failure);
    }
    if (this.output.destroyed || this.output.writableEnded) {
      throw new ResponseEncodeError('Output stream is closed');
    }

    let line: string;
    try {
      line = ProtocolCodec.encodeResponse(response);
    } catch (error) {
      throw new ResponseEncodeError('Unable to encode response', error);
    }

    await new Promise<void>((resolve, reject) => {
      this.output.write(line, (error) => {
        if (error) {
          reject(new ResponseEncodeError('Unable to write response', error));
        } else {
          resolve();
        }
      });
    });

    if (this.output.writableNeedDrain) {
      await once(this.output, 'drain');
    }
  }
}
