import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { AppConfig } from '../config/config';
import { CapacityError, StorageFailure } from '../errors';
import { requireUploadSecret } from '../middleware/security';
import { AccessCoordinator, InvalidLinkOptionsError } from '../services/AccessCoordinator';
import { BlobStorageEngine } from '../storage/BlobStorageEngine';
import { StorageManager } from '../storage/StorageManager';
import { LinkOptions, UploadResponse } from '../types';

export interface UploadRouterDeps {
  config: AppConfig;
  storage: StorageManager;
  coordinator: AccessCoordinator;
}

/**
 * Reads the optional per-upload overrides from the multipart fields.
 */
export function parseLinkOptions(body: Record<string, unknown>): LinkOptions {
  const options: LinkOptions = {};

  const maxDownloads = body.maxDownloads;
  if (maxDownloads !== undefined && maxDownloads !== '') {
    const parsed = Number(maxDownloads);
    if (!Number.isInteger(parsed)) {
      throw new InvalidLinkOptionsError('maxDownloads must be a whole number');
    }
    options.maxDownloads = parsed;
  }

  const ttlSeconds = body.ttlSeconds;
  if (ttlSeconds !== undefined && ttlSeconds !== '') {
    const parsed = Number(ttlSeconds);
    if (!Number.isInteger(parsed)) {
      throw new InvalidLinkOptionsError('ttlSeconds must be a whole number');
    }
    options.ttlMs = parsed * 1000;
  }

  return options;
}

export function linkUrl(config: AppConfig, id: string): string {
  return `${config.publicUrl ?? ''}/api/download/${id}`;
}

export default function createUploadRouter({ config, storage, coordinator }: UploadRouterDeps): Router {
  const router = Router();

  const upload = multer({
    storage: new BlobStorageEngine(storage),
    limits: {
      fileSize: config.retention.maxFileSize,
      files: 1
    }
  });

  /**
   * Upload a file and issue its link
   * POST /api/upload
   */
  router.post('/', requireUploadSecret(config.uploadSecret), upload.single('file'), async (req: Request, res: Response) => {
    const file = req.file;
    if (!file) {
      return res.status(400).json({ error: 'No file uploaded' });
    }

    try {
      const link = coordinator.register(
        {
          blobId: file.filename,
          size: file.size,
          filename: file.originalname || 'upload.bin',
          contentType: file.mimetype || 'application/octet-stream'
        },
        parseLinkOptions(req.body)
      );

      const response: UploadResponse = {
        id: link.id,
        url: linkUrl(config, link.id),
        expiresAt: new Date(link.expiresAt).toISOString(),
        expiresInSeconds: Math.floor((link.expiresAt - link.createdAt) / 1000),
        remainingDownloads: link.remainingDownloads
      };

      res.json(response);
    } catch (error) {
      await coordinator.discardBlob(file.filename);

      if (error instanceof InvalidLinkOptionsError) {
        return res.status(400).json({ error: error.message });
      }

      console.error('Upload error:', error);
      res.status(500).json({ error: 'Upload failed' });
    }
  });

  router.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      if (error.code === 'LIMIT_FILE_SIZE') {
        return res.status(413).json({ error: 'File too large' });
      }
      return res.status(400).json({ error: error.message });
    }

    if (error instanceof CapacityError) {
      console.error('Upload rejected:', error.message);
      return res.status(507).json({ error: 'Insufficient storage' });
    }

    if (error instanceof StorageFailure) {
      console.error('Upload storage error:', error);
      return res.status(500).json({ error: 'Failed to store upload' });
    }

    next(error);
  });

  return router;
}
