import { Readable } from 'stream';
import { StorageFailure } from '../errors';
import { LinkRegistry } from '../registry/LinkRegistry';
import { StorageManager } from '../storage/StorageManager';
import {
  BlobDescriptor,
  DownloadResult,
  LinkOptions,
  LinkSnapshot,
  ReleaseResult,
  RetentionConfig
} from '../types';

export type LinkPolicy = Pick<RetentionConfig, 'defaultTtlMs' | 'maxTtlMs' | 'defaultMaxDownloads' | 'maxDownloadsLimit'>;

export class InvalidLinkOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidLinkOptionsError';
  }
}

/**
 * Turns uploads into registry entries and download requests into registry
 * transactions plus a byte stream. Owns every blob deletion.
 */
export class AccessCoordinator {
  constructor(
    private readonly registry: LinkRegistry,
    private readonly storage: StorageManager,
    private readonly policy: LinkPolicy
  ) {}

  register(blob: BlobDescriptor, options: LinkOptions = {}): LinkSnapshot {
    const maxDownloads = options.maxDownloads ?? this.policy.defaultMaxDownloads;
    const ttlMs = options.ttlMs ?? this.policy.defaultTtlMs;

    if (!Number.isInteger(maxDownloads) || maxDownloads < 1 || maxDownloads > this.policy.maxDownloadsLimit) {
      throw new InvalidLinkOptionsError(`maxDownloads must be between 1 and ${this.policy.maxDownloadsLimit}`);
    }
    if (!Number.isFinite(ttlMs) || ttlMs <= 0 || ttlMs > this.policy.maxTtlMs) {
      throw new InvalidLinkOptionsError(`ttl must be between 1 and ${Math.floor(this.policy.maxTtlMs / 1000)} seconds`);
    }

    const link = this.registry.create(blob, maxDownloads, ttlMs);
    console.log(`📁 Link ${link.id} registered (${link.size} bytes, ${maxDownloads} downloads, expires ${new Date(link.expiresAt).toISOString()})`);
    return link;
  }

  async handleDownload(id: string): Promise<DownloadResult> {
    const outcome = this.registry.tryConsume(id);

    switch (outcome.status) {
      case 'not_found':
        return { status: 'not_found' };

      case 'expired':
      case 'exhausted':
        await this.release(id);
        return { status: 'gone', reason: outcome.status };

      case 'granted': {
        const { link, remaining, last } = outcome;
        let stream: Readable;

        try {
          stream = await this.storage.open(link.blobId);
        } catch (error) {
          // The grant stays consumed; a failed final download still burns the link
          await this.afterOpen(id, link.blobId, outcome.settle(), last);
          throw new StorageFailure(`Failed to open blob for link ${id}`, error);
        }

        await this.afterOpen(id, link.blobId, outcome.settle(), last);
        return { status: 'stream', stream, link, remaining };
      }
    }
  }

  /**
   * Removes the entry and deletes its blob when this caller owns it. Blob
   * deletion failures are logged, never thrown.
   */
  async release(id: string): Promise<ReleaseResult> {
    const removed = this.registry.remove(id);
    if (!removed) {
      return 'absent';
    }

    if (!removed.blobReleasable) {
      // a grant is still opening the blob; its settle() hands deletion back here
      return 'released';
    }

    return (await this.deleteBlob(removed.link.blobId, id)) ? 'released' : 'blob_delete_failed';
  }

  /**
   * Best-effort removal of bytes that never got a link.
   */
  async discardBlob(blobId: string): Promise<void> {
    await this.deleteBlob(blobId);
  }

  private async afterOpen(id: string, blobId: string, orphaned: boolean, last: boolean): Promise<void> {
    if (last) {
      await this.release(id);
    }
    if (orphaned) {
      await this.deleteBlob(blobId, id);
    }
  }

  private async deleteBlob(blobId: string, linkId?: string): Promise<boolean> {
    try {
      await this.storage.delete(blobId);
      console.log(`🗑️ Blob ${blobId} deleted${linkId ? ` (link ${linkId})` : ''}`);
      return true;
    } catch (error) {
      console.error(`Failed to delete blob ${blobId}:`, error);
      return false;
    }
  }
}
