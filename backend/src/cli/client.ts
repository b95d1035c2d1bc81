import axios, { AxiosInstance, isAxiosError } from 'axios';
import { promises as fs } from 'fs';
import { FileHandle } from 'fs/promises';
import { basename, extname, join } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { errorCode } from '../errors';
import { UPLOAD_SECRET_HEADER } from '../middleware/security';
import { LinkInfoResponse, UploadResponse } from '../types';

export interface ShareClientOptions {
  server: string;
  secret?: string;
  timeoutMs?: number;
}

export interface UploadOptions {
  maxDownloads?: number;
  ttlSeconds?: number;
  filename?: string;
  contentType?: string;
}

export interface DownloadedFile {
  path: string;
  bytes: number;
  remainingDownloads?: number;
}

export class ShareClientError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'ShareClientError';
  }
}

/**
 * Accepts a bare link id, a `/api/download/<id>` path or a full URL.
 */
export function extractLinkId(reference: string): string {
  const trimmed = reference.trim().replace(/\/+$/, '');
  const match = trimmed.match(/\/api\/download\/([^/?#]+)/);
  if (match) {
    return decodeURIComponent(match[1]);
  }
  return trimmed;
}

function filenameFromDisposition(header: unknown): string | undefined {
  if (typeof header !== 'string') {
    return undefined;
  }
  const encoded = header.match(/filename\*=UTF-8''([^;]+)/i);
  if (encoded) {
    return decodeURIComponent(encoded[1]);
  }
  const plain = header.match(/filename="([^"]+)"/i);
  return plain?.[1];
}

interface OpenTarget {
  path: string;
  handle: FileHandle;
}

const MAX_NAME_SUFFIX = 100;

async function openFreeName(desired: string): Promise<OpenTarget> {
  const ext = extname(desired);
  const stem = desired.slice(0, desired.length - ext.length);

  for (let n = 0; n <= MAX_NAME_SUFFIX; n++) {
    const path = n === 0 ? desired : `${stem} (${n})${ext}`;
    try {
      return { path, handle: await fs.open(path, 'wx') };
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw error;
      }
    }
  }
  throw new ShareClientError(`No free file name left for ${basename(desired)}`);
}

async function removePartial(path: string): Promise<void> {
  try {
    await fs.unlink(path);
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') {
      console.warn(`Failed to remove partial download ${path}:`, error);
    }
  }
}

/**
 * HTTP client for the upload/download API.
 */
export class ShareClient {
  private readonly http: AxiosInstance;

  constructor(private readonly options: ShareClientOptions) {
    this.http = axios.create({
      baseURL: options.server.replace(/\/+$/, ''),
      timeout: options.timeoutMs ?? 0
    });
  }

  linkUrl(upload: UploadResponse): string {
    return /^https?:\/\//.test(upload.url) ? upload.url : `${this.http.defaults.baseURL}${upload.url}`;
  }

  async upload(filePath: string, options: UploadOptions = {}): Promise<UploadResponse> {
    const data = await fs.readFile(filePath);
    const form = new FormData();
    form.append(
      'file',
      new Blob([new Uint8Array(data)], { type: options.contentType ?? 'application/octet-stream' }),
      options.filename ?? basename(filePath)
    );
    if (options.maxDownloads !== undefined) {
      form.append('maxDownloads', String(options.maxDownloads));
    }
    if (options.ttlSeconds !== undefined) {
      form.append('ttlSeconds', String(options.ttlSeconds));
    }

    const headers: Record<string, string> = {};
    if (this.options.secret) {
      headers[UPLOAD_SECRET_HEADER] = this.options.secret;
    }

    return this.request(async () => (await this.http.post<UploadResponse>('/api/upload', form, { headers })).data);
  }

  async info(reference: string): Promise<LinkInfoResponse> {
    const id = extractLinkId(reference);
    return this.request(async () => (await this.http.get<LinkInfoResponse>(`/api/download/${encodeURIComponent(id)}/info`)).data);
  }

  /**
   * Downloads into `outputPath`, overwriting it, or into `directory` under
   * the server-provided filename. An existing file there is never replaced:
   * the download lands under the next free "name (n).ext" instead. A transfer
   * that fails midway leaves no partial file behind.
   */
  async download(reference: string, outputPath?: string, directory: string = process.cwd()): Promise<DownloadedFile> {
    const id = extractLinkId(reference);

    return this.request(async () => {
      const response = await this.http.get<Readable>(`/api/download/${encodeURIComponent(id)}`, {
        responseType: 'stream'
      });

      let target: OpenTarget;
      try {
        target = outputPath
          ? { path: outputPath, handle: await fs.open(outputPath, 'w') }
          : await openFreeName(join(directory, basename(filenameFromDisposition(response.headers['content-disposition']) ?? id)));
      } catch (error) {
        response.data.destroy();
        throw error;
      }

      let bytes = 0;
      response.data.on('data', (chunk: Buffer) => {
        bytes += chunk.length;
      });

      try {
        await pipeline(response.data, target.handle.createWriteStream());
      } catch (error) {
        await removePartial(target.path);
        throw error;
      }

      const remaining = Number(response.headers['x-remaining-downloads']);
      return {
        path: target.path,
        bytes,
        remainingDownloads: Number.isFinite(remaining) ? remaining : undefined
      };
    });
  }

  async health(): Promise<Record<string, unknown>> {
    return this.request(async () => {
      const response = await this.http.get<Record<string, unknown>>('/api/health', {
        validateStatus: status => status === 200 || status === 503
      });
      return response.data;
    });
  }

  private async request<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw this.toClientError(error);
    }
  }

  private toClientError(error: unknown): ShareClientError {
    if (error instanceof ShareClientError) {
      return error;
    }
    if (isAxiosError(error)) {
      const status = error.response?.status;
      const body: unknown = error.response?.data;
      if (body instanceof Readable) {
        body.destroy();
      }
      if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
        return new ShareClientError(body.error, status);
      }
      // streamed responses carry no parsed body
      if (status === 404) {
        return new ShareClientError('Link not found, expired or used up', status);
      }
      return new ShareClientError(error.message, status);
    }
    return new ShareClientError(error instanceof Error ? error.message : String(error));
  }
}
