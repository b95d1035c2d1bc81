import { Readable } from 'stream';
import { StorageProviderName } from '../config/config';

/**
 * Id-addressed byte storage. Blob ids are opaque to the provider.
 */
export interface StorageProvider {
  readonly name: StorageProviderName;

  initialize(): Promise<void>;

  /**
   * Drain `source` into the blob `blobId` and return the number of bytes written
   */
  put(blobId: string, source: Readable): Promise<number>;

  /**
   * Open a read handle. The promise settles once the handle is usable, and
   * the handle keeps working if the blob is deleted afterwards.
   */
  open(blobId: string): Promise<Readable>;

  /**
   * Delete a blob. Deleting a blob that is already gone is not an error.
   */
  delete(blobId: string): Promise<void>;

  healthCheck(): Promise<ProviderHealth>;

  cleanup(): Promise<void>;
}

export interface ProviderHealth {
  status: 'healthy' | 'degraded' | 'unhealthy';
  message?: string;
  responseTime?: number;
  lastCheck: Date;
}

export class BlobNotFoundError extends Error {
  constructor(readonly blobId: string) {
    super(`Blob not found: ${blobId}`);
    this.name = 'BlobNotFoundError';
  }
}
