import { existsSync, promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import { BlobNotFoundError } from '../../src/storage/interfaces';
import { LocalStorageProvider } from '../../src/storage/providers/LocalStorageProvider';

const BLOB_ID = '0f1e2d3c-aaaa-4bbb-8ccc-123456789abc';

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('LocalStorageProvider', () => {
  let baseDir: string;
  let provider: LocalStorageProvider;

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(join(tmpdir(), 'oncedrop-test-'));
    provider = new LocalStorageProvider({ path: baseDir });
    await provider.initialize();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  it('should write blobs into a two-level directory derived from the id', async () => {
    const size = await provider.put(BLOB_ID, Readable.from([Buffer.from('hello '), Buffer.from('world')]));

    expect(size).toBe(11);
    const onDisk = await fs.readFile(join(baseDir, '0f', '1e', BLOB_ID), 'utf8');
    expect(onDisk).toBe('hello world');
  });

  it('should write flat when subdirectories are disabled', async () => {
    const flat = new LocalStorageProvider({ path: baseDir, createSubdirs: false });

    await flat.put(BLOB_ID, Readable.from([Buffer.from('flat')]));

    expect(await fs.readFile(join(baseDir, BLOB_ID), 'utf8')).toBe('flat');
  });

  it('should refuse to overwrite an existing blob and keep the original', async () => {
    await provider.put(BLOB_ID, Readable.from([Buffer.from('first')]));

    await expect(provider.put(BLOB_ID, Readable.from([Buffer.from('second')]))).rejects.toMatchObject({ code: 'EEXIST' });
    expect(await fs.readFile(join(baseDir, '0f', '1e', BLOB_ID), 'utf8')).toBe('first');
  });

  it('should recreate a subdirectory pruned between mkdir and open', async () => {
    const openSpy = jest.spyOn(fs, 'open').mockRejectedValueOnce(
      Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' })
    );

    const size = await provider.put(BLOB_ID, Readable.from([Buffer.from('retried')]));

    expect(size).toBe(7);
    expect(openSpy).toHaveBeenCalledTimes(2);
    expect(await fs.readFile(join(baseDir, '0f', '1e', BLOB_ID), 'utf8')).toBe('retried');
  });

  it('should not fail uploads racing a delete in the same subdirectory', async () => {
    const first = 'abcd0000-0000-4000-8000-00000000000a';
    const second = 'abcd0000-0000-4000-8000-00000000000b';

    for (let round = 0; round < 50; round++) {
      await provider.put(first, Readable.from([Buffer.from('a')]));
      await Promise.all([
        provider.delete(first),
        provider.put(second, Readable.from([Buffer.from('b')]))
      ]);

      expect(await fs.readFile(join(baseDir, 'ab', 'cd', second), 'utf8')).toBe('b');
      await provider.delete(second);
    }
  });

  it('should keep an opened handle readable after the blob is deleted', async () => {
    await provider.put(BLOB_ID, Readable.from([Buffer.from('still here')]));

    const stream = await provider.open(BLOB_ID);
    await provider.delete(BLOB_ID);

    expect(existsSync(join(baseDir, '0f', '1e', BLOB_ID))).toBe(false);
    expect(await readAll(stream)).toBe('still here');
  });

  it('should prune emptied directories on delete', async () => {
    await provider.put(BLOB_ID, Readable.from([Buffer.from('x')]));

    await provider.delete(BLOB_ID);

    expect(existsSync(join(baseDir, '0f'))).toBe(false);
    expect(existsSync(baseDir)).toBe(true);
  });

  it('should treat deleting a missing blob as done', async () => {
    await expect(provider.delete(BLOB_ID)).resolves.toBeUndefined();
  });

  it('should report a missing blob on open', async () => {
    await expect(provider.open(BLOB_ID)).rejects.toThrow(BlobNotFoundError);
  });

  it('should reject ids that could escape the base directory', () => {
    expect(() => provider.resolve('../etc/passwd')).toThrow('Invalid blob id');
  });

  it('should pass its health check on a writable directory', async () => {
    const health = await provider.healthCheck();

    expect(health.status).toBe('healthy');
    expect(existsSync(join(baseDir, '.health-check'))).toBe(false);
  });
});
