import type { Request, Response } from '../types/protocol.js';
import { ProtocolDecodeError } from '../utils/errorHandler.js';

/**
 * Line codec for the transfer protocol: one JSON object per line
 */
export class ProtocolCodec {
  /**
   * Decodes one request line.
   * Throws ProtocolDecodeError for malformed JSON or mistyped fields.
   */
  static decodeRequest(line: string): Request {
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProtocolDecodeError(`Malformed request line: ${reason}`, error);
    }

    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new ProtocolDecodeError('Request line must be a JSON object');
    }

    const fields: Record<string, unknown> = { ...value };
    const { event, oid, size } = fields;

    if (typeof event !== 'string') {
      throw new ProtocolDecodeError('Request field "event" must be a string');
    }
    if (oid !== undefined && typeof oid !== 'string') {
      throw new ProtocolDecodeError('Request field "oid" must be a string');
    }
    if (size !== undefined && !(typeof size === 'number' && Number.isSafeInteger(size) && size >= 0)) {
      throw new ProtocolDecodeError('Request field "size" must be a non-negative integer');
    }

    return { ...fields, event, oid, size };
  }

  static encodeRequest(request: Request): string {
    return `${JSON.stringify(request)}\n`;
  }

  static encodeResponse(response: Response): string {
    return `${JSON.stringify(response)}\n`;
  }
}
