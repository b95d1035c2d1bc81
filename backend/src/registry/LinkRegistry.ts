import { v4 as uuidv4 } from 'uuid';
import {
  BlobDescriptor,
  ConsumeOutcome,
  LinkSnapshot,
  LinkState,
  RemovedLink
} from '../types';

interface LinkRecord extends BlobDescriptor {
  id: string;
  maxDownloads: number;
  remainingDownloads: number;
  createdAt: number;
  expiresAt: number;
  // set once an access attempt has seen the entry expired or exhausted
  retired: boolean;
  // grants whose read handle is not open yet
  opening: number;
  removed: boolean;
}

export interface LinkRegistryOptions {
  now?: () => number;
  generateId?: () => string;
}

/**
 * In-memory table of live links.
 *
 * Every method is synchronous. Node runs request handlers and the sweeper on
 * one event loop, so a method call is indivisible with respect to all other
 * callers: two requests can never both observe the same remaining count.
 * Blob I/O is the caller's business and happens outside these calls.
 */
export class LinkRegistry {
  private readonly entries = new Map<string, LinkRecord>();
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: LinkRegistryOptions = {}) {
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? (() => uuidv4());
  }

  get size(): number {
    return this.entries.size;
  }

  totalBytes(): number {
    let total = 0;
    for (const entry of this.entries.values()) {
      total += entry.size;
    }
    return total;
  }

  create(blob: BlobDescriptor, maxDownloads: number, ttlMs: number): LinkSnapshot {
    if (!Number.isInteger(maxDownloads) || maxDownloads < 1) {
      throw new RangeError(`maxDownloads must be a positive integer (got ${maxDownloads})`);
    }
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new RangeError(`ttl must be a positive duration (got ${ttlMs}ms)`);
    }

    let id = this.generateId();
    while (this.entries.has(id)) {
      id = this.generateId();
    }

    const createdAt = this.now();
    const record: LinkRecord = {
      id,
      blobId: blob.blobId,
      size: blob.size,
      filename: blob.filename,
      contentType: blob.contentType,
      maxDownloads,
      remainingDownloads: maxDownloads,
      createdAt,
      expiresAt: createdAt + ttlMs,
      retired: false,
      opening: 0,
      removed: false
    };

    this.entries.set(id, record);
    return snapshot(record);
  }

  /**
   * Check-and-decrement for one download. Expired and exhausted entries are
   * retired: they never grant again and the caller is expected to remove them.
   */
  tryConsume(id: string): ConsumeOutcome {
    const entry = this.entries.get(id);
    if (!entry) {
      return { status: 'not_found' };
    }

    const state = this.stateOf(entry, this.now());
    if (state === 'expired') {
      entry.retired = true;
      return { status: 'expired', link: snapshot(entry) };
    }
    if (state === 'exhausted' || entry.retired) {
      entry.retired = true;
      return { status: 'exhausted', link: snapshot(entry) };
    }

    entry.remainingDownloads -= 1;
    entry.opening += 1;

    let settled = false;
    const settle = (): boolean => {
      if (settled) {
        return false;
      }
      settled = true;
      entry.opening -= 1;
      return entry.removed && entry.opening === 0;
    };

    return {
      status: 'granted',
      link: snapshot(entry),
      remaining: entry.remainingDownloads,
      last: entry.remainingDownloads === 0,
      settle
    };
  }

  /**
   * Active entry by id, without consuming it.
   */
  peek(id: string): LinkSnapshot | undefined {
    const entry = this.entries.get(id);
    if (!entry || entry.retired || this.stateOf(entry, this.now()) !== 'active') {
      return undefined;
    }
    return snapshot(entry);
  }

  /**
   * Idempotent. Only the first call for an id gets the entry back.
   */
  remove(id: string): RemovedLink | undefined {
    const entry = this.entries.get(id);
    if (!entry) {
      return undefined;
    }

    this.entries.delete(id);
    entry.removed = true;
    entry.retired = true;
    return { link: snapshot(entry), blobReleasable: entry.opening === 0 };
  }

  /**
   * Ids the sweeper should reclaim: entries past their deadline, plus
   * exhausted or retired entries nobody is still opening. Iterates a copy of
   * the table taken on the first `next()`.
   */
  *scanExpired(now: number = this.now()): Generator<string, void, undefined> {
    const candidates = Array.from(this.entries.values());
    for (const entry of candidates) {
      if (entry.removed) {
        continue;
      }
      if (entry.expiresAt <= now) {
        yield entry.id;
      } else if ((entry.retired || entry.remainingDownloads === 0) && entry.opening === 0) {
        yield entry.id;
      }
    }
  }

  stateOf(entry: Pick<LinkSnapshot, 'remainingDownloads' | 'expiresAt'>, now: number = this.now()): LinkState {
    if (now >= entry.expiresAt) {
      return 'expired';
    }
    if (entry.remainingDownloads <= 0) {
      return 'exhausted';
    }
    return 'active';
  }
}

function snapshot(entry: LinkRecord): LinkSnapshot {
  return {
    id: entry.id,
    blobId: entry.blobId,
    size: entry.size,
    filename: entry.filename,
    contentType: entry.contentType,
    maxDownloads: entry.maxDownloads,
    remainingDownloads: entry.remainingDownloads,
    createdAt: entry.createdAt,
    expiresAt: entry.expiresAt
  };
}
