import { Readable } from 'stream';
import { BlobNotFoundError, ProviderHealth, StorageProvider } from '../interfaces';

/**
 * Keeps blobs in process memory. Used for tests and throwaway instances.
 */
export class MemoryStorageProvider implements StorageProvider {
  readonly name = 'memory';

  private blobs = new Map<string, Buffer>();

  async initialize(): Promise<void> {}

  async put(blobId: string, source: Readable): Promise<number> {
    if (this.blobs.has(blobId)) {
      throw new Error(`Blob already exists: ${blobId}`);
    }

    const chunks: Buffer[] = [];
    for await (const chunk of source) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }

    const data = Buffer.concat(chunks);
    this.blobs.set(blobId, data);
    return data.length;
  }

  async open(blobId: string): Promise<Readable> {
    const data = this.blobs.get(blobId);
    if (!data) {
      throw new BlobNotFoundError(blobId);
    }
    // The stream holds its own reference, so a later delete does not cut it short
    return Readable.from([data]);
  }

  async delete(blobId: string): Promise<void> {
    this.blobs.delete(blobId);
  }

  has(blobId: string): boolean {
    return this.blobs.has(blobId);
  }

  get count(): number {
    return this.blobs.size;
  }

  async healthCheck(): Promise<ProviderHealth> {
    return { status: 'healthy', lastCheck: new Date() };
  }

  async cleanup(): Promise<void> {
    this.blobs.clear();
  }
}
