import { Readable } from 'stream';

export type LinkState = 'active' | 'exhausted' | 'expired';

/**
 * Descriptive data about stored bytes, captured when the upload finishes.
 */
export interface BlobDescriptor {
  blobId: string;
  size: number;
  filename: string;
  contentType: string;
}

/**
 * Read-only copy of a registry entry. The registry never hands out its
 * mutable records.
 */
export interface LinkSnapshot extends Readonly<BlobDescriptor> {
  readonly id: string;
  readonly maxDownloads: number;
  readonly remainingDownloads: number;
  readonly createdAt: number;
  readonly expiresAt: number;
}

export interface NotFoundOutcome {
  status: 'not_found';
}

export interface ExpiredOutcome {
  status: 'expired';
  link: LinkSnapshot;
}

export interface ExhaustedOutcome {
  status: 'exhausted';
  link: LinkSnapshot;
}

export interface GrantedOutcome {
  status: 'granted';
  link: LinkSnapshot;
  remaining: number;
  // true when this grant took the last download
  last: boolean;
  /**
   * Marks the read handle for this grant as open (or failed). Returns true
   * when the entry was removed while the handle was opening and no other
   * grant is still opening: the caller then owns the blob deletion.
   */
  settle: () => boolean;
}

export type ConsumeOutcome = NotFoundOutcome | ExpiredOutcome | ExhaustedOutcome | GrantedOutcome;

export interface RemovedLink {
  link: LinkSnapshot;
  // false while grants are still opening; the last settle() deletes the blob
  blobReleasable: boolean;
}

export type ReleaseResult = 'released' | 'absent' | 'blob_delete_failed';

export type DownloadResult =
  | {
      status: 'stream';
      stream: Readable;
      link: LinkSnapshot;
      remaining: number;
    }
  | { status: 'not_found' }
  | { status: 'gone'; reason: 'expired' | 'exhausted' };

export interface LinkOptions {
  maxDownloads?: number;
  ttlMs?: number;
}

export interface UploadResponse {
  id: string;
  url: string;
  expiresAt: string;
  expiresInSeconds: number;
  remainingDownloads: number;
}

export interface LinkInfoResponse {
  filename: string;
  size: number;
  contentType: string;
  remainingDownloads: number;
  maxDownloads: number;
  expiresAt: string;
  expiresInSeconds: number;
}

export interface SweepReport {
  scanned: number;
  removed: number;
  failed: number;
}

export type TimeUnit = 'seconds' | 'minutes' | 'hours';

export interface RetentionConfig {
  defaultTtlMs: number;
  maxTtlMs: number;
  defaultMaxDownloads: number;
  maxDownloadsLimit: number;
  maxFileSize: number;
}

export interface CleanupConfig {
  intervalMs: number;
  schedule?: string;
}
