/**
 * Blob I/O failed while storing or opening bytes.
 */
export class StorageFailure extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageFailure';
  }
}

/**
 * The store ran out of room for an upload.
 */
export class CapacityError extends Error {
  constructor(message = 'Storage capacity exceeded') {
    super(message);
    this.name = 'CapacityError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const CAPACITY_CODES = new Set(['ENOSPC', 'EDQUOT']);

/**
 * Maps a raw store error to the taxonomy the upload path reports.
 */
export function toStorageError(error: unknown, action: string): StorageFailure | CapacityError {
  if (error instanceof StorageFailure || error instanceof CapacityError) {
    return error;
  }
  const code = errorCode(error);
  if (code && CAPACITY_CODES.has(code)) {
    return new CapacityError(`Storage capacity exceeded while trying to ${action}`);
  }
  return new StorageFailure(`Failed to ${action}: ${errorMessage(error)}`, error);
}
