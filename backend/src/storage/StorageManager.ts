import { Readable } from 'stream';
import { StorageConfig } from '../config/config';
import { ProviderHealth, StorageProvider } from './interfaces';
import { LocalStorageProvider } from './providers/LocalStorageProvider';
import { MemoryStorageProvider } from './providers/MemoryStorageProvider';

export function createStorageProvider(storage: StorageConfig): StorageProvider {
  switch (storage.provider) {
    case 'local':
      return new LocalStorageProvider(storage.local);
    case 'memory':
      return new MemoryStorageProvider();
  }
}

/**
 * Front door to the configured blob store.
 */
export class StorageManager {
  private initialized = false;

  constructor(private readonly provider: StorageProvider) {}

  static fromConfig(storage: StorageConfig): StorageManager {
    return new StorageManager(createStorageProvider(storage));
  }

  get providerName(): string {
    return this.provider.name;
  }

  async initialize(): Promise<void> {
    await this.provider.initialize();
    this.initialized = true;
    console.log(`✅ Storage initialized with provider: ${this.provider.name}`);
  }

  async put(blobId: string, source: Readable): Promise<number> {
    this.assertInitialized();
    return this.provider.put(blobId, source);
  }

  async open(blobId: string): Promise<Readable> {
    this.assertInitialized();
    return this.provider.open(blobId);
  }

  async delete(blobId: string): Promise<void> {
    this.assertInitialized();
    return this.provider.delete(blobId);
  }

  async healthCheck(): Promise<ProviderHealth> {
    if (!this.initialized) {
      return { status: 'unhealthy', message: 'Storage provider not initialized', lastCheck: new Date() };
    }

    try {
      return await this.provider.healthCheck();
    } catch (error) {
      return {
        status: 'unhealthy',
        message: error instanceof Error ? error.message : String(error),
        lastCheck: new Date()
      };
    }
  }

  async cleanup(): Promise<void> {
    try {
      await this.provider.cleanup();
    } catch (error) {
      console.error('Error cleaning up storage provider:', error);
    }
    this.initialized = false;
  }

  private assertInitialized(): void {
    if (!this.initialized) {
      throw new Error('Storage provider not initialized');
    }
  }
}
