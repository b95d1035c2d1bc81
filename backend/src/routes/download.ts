import { Router, Request, Response } from 'express';
import { pipeline } from 'stream/promises';
import { LinkRegistry } from '../registry/LinkRegistry';
import { AccessCoordinator } from '../services/AccessCoordinator';
import { LinkInfoResponse } from '../types';

export interface DownloadRouterDeps {
  registry: LinkRegistry;
  coordinator: AccessCoordinator;
  now?: () => number;
}

export default function createDownloadRouter({ registry, coordinator, now = Date.now }: DownloadRouterDeps): Router {
  const router = Router();

  /**
   * Headers of an active link. Registered ahead of GET, which Express would
   * otherwise run for HEAD and burn a download.
   * HEAD /api/download/:id
   */
  router.head('/:id', (req: Request, res: Response) => {
    const link = registry.peek(req.params.id);
    if (!link) {
      return res.status(404).end();
    }

    res.attachment(link.filename);
    res.setHeader('Content-Type', link.contentType);
    res.setHeader('Content-Length', link.size.toString());
    res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
    res.setHeader('X-Remaining-Downloads', link.remainingDownloads.toString());
    res.status(200).end();
  });

  /**
   * Stream a file, consuming one download
   * GET /api/download/:id
   */
  router.get('/:id', async (req: Request, res: Response) => {
    const { id } = req.params;

    try {
      const result = await coordinator.handleDownload(id);

      if (result.status === 'not_found') {
        return res.status(404).json({ error: 'File not found' });
      }
      if (result.status === 'gone') {
        return res.status(404).json({
          error: result.reason === 'expired' ? 'File has expired' : 'Download limit reached'
        });
      }

      const { stream, link, remaining } = result;

      res.attachment(link.filename);
      res.setHeader('Content-Type', link.contentType);
      res.setHeader('Content-Length', link.size.toString());
      res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
      res.setHeader('Pragma', 'no-cache');
      res.setHeader('Expires', '0');
      res.setHeader('X-Remaining-Downloads', remaining.toString());

      await pipeline(stream, res);
    } catch (error) {
      if (res.headersSent) {
        // The download is already counted; a dropped client does not get it back
        console.warn(`Stream for link ${id} ended early:`, error instanceof Error ? error.message : error);
        return;
      }

      console.error('Download error for link ID:', id, error);
      res.status(500).json({ error: 'Download failed' });
    }
  });

  /**
   * Link metadata without consuming a download
   * GET /api/download/:id/info
   */
  router.get('/:id/info', (req: Request, res: Response) => {
    const link = registry.peek(req.params.id);
    if (!link) {
      return res.status(404).json({ error: 'File not found or expired' });
    }

    const response: LinkInfoResponse = {
      filename: link.filename,
      size: link.size,
      contentType: link.contentType,
      remainingDownloads: link.remainingDownloads,
      maxDownloads: link.maxDownloads,
      expiresAt: new Date(link.expiresAt).toISOString(),
      expiresInSeconds: Math.max(0, Math.floor((link.expiresAt - now()) / 1000))
    };

    res.json(response);
  });

  return router;
}
