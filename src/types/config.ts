import type { ConfigurationError } from '../utils/errorHandler.js';

export interface StaticCredentials {
  accessKeyId: string;
  secretAccessKey: string;
}

/**
 * Agent configuration, resolved once at startup
 */
export interface AgentConfig {
  endpoint: string;
  bucket: string;
  region: string;
  credentials?: StaticCredentials;
  profile?: string;
  forcePathStyle: boolean;
  partSize: number;
  uploadConcurrency: number;
  downloadConcurrency: number;
  reportTransferErrors: boolean;
  objectsDir: string;
}

export type ConfigResolution =
  | { ok: true; config: AgentConfig }
  | { ok: false; error: ConfigurationError };
