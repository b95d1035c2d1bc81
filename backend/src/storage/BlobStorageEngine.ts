import { Request } from 'express';
import { StorageEngine } from 'multer';
import { v4 as uuidv4 } from 'uuid';
import { toStorageError } from '../errors';
import { StorageManager } from './StorageManager';

/**
 * multer storage engine that streams each uploaded file straight into the
 * blob store. The generated blob id is reported back as `file.filename`.
 */
export class BlobStorageEngine implements StorageEngine {
  constructor(private readonly storage: StorageManager) {}

  _handleFile(
    _req: Request,
    file: Express.Multer.File,
    callback: (error?: Error | null, info?: Partial<Express.Multer.File>) => void
  ): void {
    const blobId = uuidv4();

    this.storage.put(blobId, file.stream).then(
      size => callback(null, { filename: blobId, size }),
      error => callback(toStorageError(error, `store upload ${file.originalname}`))
    );
  }

  _removeFile(
    _req: Request,
    file: Express.Multer.File,
    callback: (error: Error | null) => void
  ): void {
    this.storage.delete(file.filename).then(
      () => callback(null),
      error => callback(error instanceof Error ? error : new Error(String(error)))
    );
  }
}
