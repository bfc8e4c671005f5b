/**
 * Git LFS custom transfer protocol messages.
 * Every message travels as a single JSON object on its own line.
 */

/**
 * A decoded request line. `event` stays a plain string because the
 * dispatcher ignores events it does not know. Fields the agent does not
 * read (`operation`, `remote`, `concurrent`, `concurrenttransfers`,
 * `path`, `action`) are kept as they arrived.
 */
export interface Request {
  event: string;
  oid?: string;
  size?: number;
  [field: string]: unknown;
}

export interface ProtocolError {
  code: number;
  message: string;
}

export interface InitResponse {
  error?: ProtocolError;
}

export interface ProgressResponse {
  event: 'progress';
  oid: string;
  bytesSoFar: number;
  bytesSinceLast: number;
}

export interface TransferResponse {
  event: 'complete';
  oid: string;
  path?: string;
  error?: ProtocolError;
}

export type Response = InitResponse | ProgressResponse | TransferResponse;

/**
 * Destination for outbound protocol lines.
 */
export interface ResponseSink {
  send(response: Response): Promise<void>;
}
