import { Server } from 'http';
import { loadConfig, loadEnvFile } from './config/config';
import { createApp, createServices } from './app';

async function main(): Promise<void> {
  loadEnvFile();

  const config = loadConfig();
  const services = createServices(config);

  await services.storage.initialize();

  const app = createApp(services);
  const server: Server = app.listen(config.port, config.host, () => {
    const ttlMinutes = Math.round(config.retention.defaultTtlMs / 60000);
    console.log(`🚀 oncedrop running on http://${config.host}:${config.port}`);
    console.log(`📁 Storage: ${config.storage.provider} (${config.storage.provider === 'local' ? config.storage.local.path : 'in-memory'})`);
    console.log(`⏰ Default link lifetime: ${ttlMinutes} minutes, ${config.retention.defaultMaxDownloads} downloads`);
    console.log(`📦 Max file size: ${Math.round(config.retention.maxFileSize / 1024 / 1024)}MB`);
    console.log(`🔐 Upload secret: ${config.uploadSecret ? 'required' : 'not configured'}`);
    console.log(`🌍 Environment: ${config.nodeEnv}`);
  });

  services.sweeper.start();

  // Graceful shutdown
  let shuttingDown = false;
  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`🔄 ${signal} received, shutting down gracefully...`);

    services.sweeper.stop();

    try {
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
      await services.storage.cleanup();
      console.log('✅ Cleanup completed');
      process.exit(0);
    } catch (error) {
      console.error('❌ Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

main().catch(error => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
