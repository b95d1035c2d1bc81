import { join } from 'path';
import request from 'supertest';
import { Express } from 'express';
import { AppServices, createApp, createServices } from '../../src/app';
import { loadConfig } from '../../src/config/config';
import { MemoryStorageProvider } from '../../src/storage/providers/MemoryStorageProvider';
import { StorageManager } from '../../src/storage/StorageManager';

const SECRET = 'test-secret';

describe('Upload and download API', () => {
  let clock: number;
  let provider: MemoryStorageProvider;
  let services: AppServices;
  let app: Express;

  function uploadFile(content: string, filename = 'hello.txt') {
    return request(app)
      .post('/api/upload')
      .set('x-upload-secret', SECRET)
      .attach('file', Buffer.from(content), filename);
  }

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    clock = 1_700_000_000_000;
    provider = new MemoryStorageProvider();

    const config = loadConfig({
      NODE_ENV: 'test',
      STORAGE_PROVIDER: 'memory',
      UPLOAD_SECRET: SECRET,
      PUBLIC_URL: 'http://files.test',
      MAX_FILE_SIZE: '1024',
      OPENAPI_DOCUMENT: join(__dirname, '../../../docs/openapi.yaml')
    });
    services = createServices(config, { now: () => clock, storage: new StorageManager(provider) });
    await services.storage.initialize();
    app = createApp(services);
  });

  afterEach(() => {
    services.sweeper.stop();
    jest.restoreAllMocks();
  });

  describe('POST /api/upload', () => {
    it('should reject uploads without the upload secret', async () => {
      const res = await request(app).post('/api/upload');

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Invalid or missing upload secret' });
    });

    it('should reject a request without a file', async () => {
      const res = await request(app).post('/api/upload').set('x-upload-secret', SECRET).field('maxDownloads', '2');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'No file uploaded' });
    });

    it('should issue a link with the default policy', async () => {
      const res = await uploadFile('hello world');

      expect(res.status).toBe(200);
      expect(res.body.url).toBe(`http://files.test/api/download/${res.body.id}`);
      expect(res.body.remainingDownloads).toBe(3);
      expect(res.body.expiresInSeconds).toBe(3600);
      expect(res.body.expiresAt).toBe(new Date(clock + 3_600_000).toISOString());
      expect(provider.count).toBe(1);
    });

    it('should apply per-upload overrides', async () => {
      const res = await uploadFile('hello world').field('maxDownloads', '1').field('ttlSeconds', '120');

      expect(res.status).toBe(200);
      expect(res.body.remainingDownloads).toBe(1);
      expect(res.body.expiresInSeconds).toBe(120);
    });

    it('should reject overrides beyond the limits and discard the blob', async () => {
      const res = await uploadFile('hello world').field('maxDownloads', '50');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'maxDownloads must be between 1 and 10' });
      expect(provider.count).toBe(0);
      expect(services.registry.size).toBe(0);
    });

    it('should reject a file above the size limit', async () => {
      const res = await uploadFile('x'.repeat(2048), 'big.bin');

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ error: 'File too large' });
      expect(provider.count).toBe(0);
      expect(services.registry.size).toBe(0);
    });
  });

  describe('GET /api/download/:id', () => {
    it('should serve a file exactly max_downloads times', async () => {
      const { body } = await uploadFile('hello world');

      for (const expectedRemaining of ['2', '1', '0']) {
        const res = await request(app).get(`/api/download/${body.id}`);

        expect(res.status).toBe(200);
        expect(res.text).toBe('hello world');
        expect(res.headers['x-remaining-downloads']).toBe(expectedRemaining);
        expect(res.headers['content-disposition']).toBe('attachment; filename="hello.txt"');
        expect(res.headers['cache-control']).toBe('no-cache, no-store, must-revalidate');
      }

      const res = await request(app).get(`/api/download/${body.id}`);
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'File not found' });
      expect(provider.count).toBe(0);
    });

    it('should answer 404 for an expired link and reclaim its blob', async () => {
      const { body } = await uploadFile('hello world').field('ttlSeconds', '60');
      clock += 61_000;

      const res = await request(app).get(`/api/download/${body.id}`);

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'File has expired' });
      expect(provider.count).toBe(0);
    });

    it('should answer 404 for an unknown link', async () => {
      const res = await request(app).get('/api/download/no-such-link');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'File not found' });
    });

    it('should answer HEAD without using up a download', async () => {
      const { body } = await uploadFile('hello world').field('maxDownloads', '1');

      const head = await request(app).head(`/api/download/${body.id}`);

      expect(head.status).toBe(200);
      expect(head.headers['x-remaining-downloads']).toBe('1');
      expect(head.headers['content-disposition']).toBe('attachment; filename="hello.txt"');
      expect(head.headers['content-length']).toBe('11');

      const res = await request(app).get(`/api/download/${body.id}`);
      expect(res.status).toBe(200);
      expect(res.text).toBe('hello world');
      expect(res.headers['x-remaining-downloads']).toBe('0');
    });

    it('should answer HEAD for an unknown link with 404', async () => {
      const res = await request(app).head('/api/download/no-such-link');

      expect(res.status).toBe(404);
    });

    it('should let only the download budget through under concurrent requests', async () => {
      const { body } = await uploadFile('hello world');

      const responses = await Promise.all(
        Array.from({ length: 5 }, () => request(app).get(`/api/download/${body.id}`))
      );

      expect(responses.filter(r => r.status === 200)).toHaveLength(3);
      expect(responses.filter(r => r.status === 404)).toHaveLength(2);
      expect(provider.count).toBe(0);
    });
  });

  describe('GET /api/download/:id/info', () => {
    it('should describe a link without consuming it', async () => {
      const { body } = await uploadFile('hello world');
      clock += 600_000;

      const info = await request(app).get(`/api/download/${body.id}/info`);

      expect(info.status).toBe(200);
      expect(info.body).toEqual({
        filename: 'hello.txt',
        size: 11,
        contentType: 'text/plain',
        remainingDownloads: 3,
        maxDownloads: 3,
        expiresAt: new Date(clock - 600_000 + 3_600_000).toISOString(),
        expiresInSeconds: 3000
      });

      const download = await request(app).get(`/api/download/${body.id}`);
      expect(download.headers['x-remaining-downloads']).toBe('2');
    });

    it('should answer 404 once a link has expired', async () => {
      const { body } = await uploadFile('hello world').field('ttlSeconds', '60');
      clock += 60_000;

      const res = await request(app).get(`/api/download/${body.id}/info`);

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'File not found or expired' });
    });
  });

  describe('expiry sweep', () => {
    it('should reclaim expired links nobody asked for again', async () => {
      await uploadFile('first').field('ttlSeconds', '60');
      await uploadFile('second').field('ttlSeconds', '600');
      clock += 120_000;

      const report = await services.sweeper.sweep();

      expect(report).toEqual({ scanned: 1, removed: 1, failed: 0 });
      expect(services.registry.size).toBe(1);
      expect(provider.count).toBe(1);
    });
  });

  describe('GET /api/health', () => {
    it('should report storage and link counts', async () => {
      await uploadFile('hello world');

      const res = await request(app).get('/api/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('healthy');
      expect(res.body.storage.provider).toBe('memory');
      expect(res.body.links).toEqual({ active: 1, bytes: 11 });
      expect(res.body.sweeper.schedule).toBe('0 */1 * * * *');
    });
  });

  it('should answer unknown routes with JSON', async () => {
    const res = await request(app).get('/api/nothing-here');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not found' });
  });
});
