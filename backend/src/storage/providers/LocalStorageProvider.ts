import { createReadStream, promises as fs, ReadStream } from 'fs';
import { FileHandle } from 'fs/promises';
import { dirname, join, resolve as resolvePath } from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { errorCode } from '../../errors';
import { BlobNotFoundError, ProviderHealth, StorageProvider } from '../interfaces';

const MAX_CREATE_ATTEMPTS = 5;

export interface LocalStorageOptions {
  path: string;
  createSubdirs?: boolean;
  permissions?: string;
}

export class LocalStorageProvider implements StorageProvider {
  readonly name = 'local';

  private readonly basePath: string;
  private readonly createSubdirs: boolean;
  private readonly mode: number;

  constructor(options: LocalStorageOptions) {
    this.basePath = resolvePath(options.path);
    this.createSubdirs = options.createSubdirs ?? true;
    this.mode = parseInt(options.permissions ?? '0755', 8);
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.basePath, { recursive: true, mode: this.mode });
  }

  async put(blobId: string, source: Readable): Promise<number> {
    const fullPath = this.resolve(blobId);

    let handle: FileHandle;
    try {
      handle = await this.createExclusive(fullPath);
    } catch (error) {
      source.destroy();
      throw error;
    }

    let size = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        size += chunk.length;
        callback(null, chunk);
      }
    });

    try {
      await pipeline(source, counter, handle.createWriteStream());
    } catch (error) {
      await this.unlinkQuietly(fullPath);
      throw error;
    }

    return size;
  }

  async open(blobId: string): Promise<Readable> {
    const stream = createReadStream(this.resolve(blobId));
    await waitForDescriptor(stream, blobId);
    return stream;
  }

  async delete(blobId: string): Promise<void> {
    const fullPath = this.resolve(blobId);

    try {
      await fs.unlink(fullPath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
    }

    await this.cleanupEmptyDirectories(dirname(fullPath));
  }

  async healthCheck(): Promise<ProviderHealth> {
    const startTime = Date.now();

    try {
      // Test write and read operations
      const testData = Buffer.from('health-check');
      const testPath = join(this.basePath, '.health-check');

      await fs.writeFile(testPath, testData);
      const readData = await fs.readFile(testPath);
      await fs.unlink(testPath);

      if (!testData.equals(readData)) {
        return {
          status: 'unhealthy',
          message: 'Data integrity check failed',
          responseTime: Date.now() - startTime,
          lastCheck: new Date()
        };
      }

      return {
        status: 'healthy',
        responseTime: Date.now() - startTime,
        lastCheck: new Date()
      };
    } catch (error) {
      return {
        status: 'unhealthy',
        message: error instanceof Error ? error.message : String(error),
        responseTime: Date.now() - startTime,
        lastCheck: new Date()
      };
    }
  }

  async cleanup(): Promise<void> {
    // Holds no connections; blobs are left for the next process to reclaim
  }

  resolve(blobId: string): string {
    if (!/^[A-Za-z0-9-]+$/.test(blobId)) {
      throw new Error(`Invalid blob id: ${blobId}`);
    }
    return join(this.basePath, this.subdirectory(blobId), blobId);
  }

  private subdirectory(blobId: string): string {
    if (!this.createSubdirs) {
      return '';
    }
    // e.g. "ab/cd" for an id starting with "abcd..."
    const id = blobId.replace(/-/g, '');
    return join(id.slice(0, 2), id.slice(2, 4));
  }

  /**
   * Creates the blob file, refusing to overwrite. A delete pruning the same
   * subdirectory can remove it between mkdir and open; ENOENT is retried.
   */
  private async createExclusive(fullPath: string): Promise<FileHandle> {
    for (let attempt = 1; ; attempt++) {
      try {
        await fs.mkdir(dirname(fullPath), { recursive: true, mode: this.mode });
        return await fs.open(fullPath, 'wx');
      } catch (error) {
        if (errorCode(error) !== 'ENOENT' || attempt >= MAX_CREATE_ATTEMPTS) {
          throw error;
        }
      }
    }
  }

  private async unlinkQuietly(fullPath: string): Promise<void> {
    try {
      await fs.unlink(fullPath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        console.warn(`Failed to remove partial blob ${fullPath}:`, error);
      }
    }
  }

  private async cleanupEmptyDirectories(dirPath: string): Promise<void> {
    if (dirPath === this.basePath || !dirPath.startsWith(this.basePath)) {
      return;
    }

    try {
      const entries = await fs.readdir(dirPath);
      if (entries.length === 0) {
        await fs.rmdir(dirPath);
        await this.cleanupEmptyDirectories(dirname(dirPath));
      }
    } catch (error) {
      // A concurrent put may have repopulated or removed the directory
      const code = errorCode(error);
      if (code !== 'ENOENT' && code !== 'ENOTEMPTY' && code !== 'EEXIST') {
        console.warn(`Failed to prune directory ${dirPath}:`, error);
      }
    }
  }
}

function waitForDescriptor(stream: ReadStream, blobId: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onOpen = () => {
      stream.off('error', onError);
      resolve();
    };
    const onError = (error: Error) => {
      stream.off('open', onOpen);
      reject(errorCode(error) === 'ENOENT' ? new BlobNotFoundError(blobId) : error);
    };
    stream.once('open', onOpen);
    stream.once('error', onError);
  });
}
