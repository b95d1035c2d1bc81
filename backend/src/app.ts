import express from 'express';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';
import { existsSync } from 'fs';
import { AppConfig } from './config/config';
import { ExpirySweeper } from './jobs/expirySweeper';
import { securityHeaders } from './middleware/security';
import { LinkRegistry } from './registry/LinkRegistry';
import createDownloadRouter from './routes/download';
import createUploadRouter from './routes/upload';
import { AccessCoordinator } from './services/AccessCoordinator';
import { StorageManager } from './storage/StorageManager';

export interface AppServices {
  config: AppConfig;
  storage: StorageManager;
  registry: LinkRegistry;
  coordinator: AccessCoordinator;
  sweeper: ExpirySweeper;
  now: () => number;
}

/**
 * Wires the core services together. The storage manager still needs
 * `initialize()` before the first request.
 */
export interface ServiceOverrides {
  now?: () => number;
  storage?: StorageManager;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const now = overrides.now ?? Date.now;
  const storage = overrides.storage ?? StorageManager.fromConfig(config.storage);
  const registry = new LinkRegistry({ now });
  const coordinator = new AccessCoordinator(registry, storage, config.retention);
  const sweeper = new ExpirySweeper(registry, coordinator, config.cleanup, now);

  return { config, storage, registry, coordinator, sweeper, now };
}

export function createApp(services: AppServices): express.Express {
  const { config, storage, registry, coordinator, sweeper, now } = services;
  const app = express();

  // Trust proxy for reverse proxy setup
  app.set('trust proxy', 'loopback');

  if (existsSync(config.docsPath)) {
    const swaggerDocument = YAML.load(config.docsPath);
    app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(swaggerDocument, {
      customCss: '.swagger-ui .topbar { display: none }',
      customSiteTitle: 'oncedrop API Documentation'
    }));
  }

  app.use(securityHeaders(config.nodeEnv === 'production'));

  app.use(cors({
    origin: config.corsOrigin,
    credentials: false,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'x-upload-secret'],
    exposedHeaders: ['Content-Disposition', 'X-Remaining-Downloads']
  }));

  // Health check endpoint
  app.get('/api/health', async (_req, res) => {
    try {
      const storageHealth = await storage.healthCheck();
      const isHealthy = storageHealth.status === 'healthy';

      res.status(isHealthy ? 200 : 503).json({
        status: isHealthy ? 'healthy' : 'degraded',
        timestamp: new Date().toISOString(),
        storage: { provider: storage.providerName, ...storageHealth },
        links: {
          active: registry.size,
          bytes: registry.totalBytes()
        },
        sweeper: sweeper.getStatistics(),
        environment: config.nodeEnv
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: error instanceof Error ? error.message : 'Unknown error'
      });
    }
  });

  app.use('/api/upload', createUploadRouter({ config, storage, coordinator }));
  app.use('/api/download', createDownloadRouter({ registry, coordinator, now }));

  app.use((_req: express.Request, res: express.Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Global error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('Unhandled error:', err);
    if (res.headersSent) {
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
