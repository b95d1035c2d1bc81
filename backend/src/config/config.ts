import dotenv from 'dotenv';
import { join } from 'path';
import { ConfigError, errorCode } from '../errors';
import { CleanupConfig, RetentionConfig, TimeUnit } from '../types';

export type StorageProviderName = 'local' | 'memory';

export interface StorageConfig {
  provider: StorageProviderName;
  local: {
    path: string;
    createSubdirs: boolean;
  };
}

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  publicUrl?: string;
  corsOrigin: string[] | '*';
  uploadSecret?: string;
  docsPath: string;
  storage: StorageConfig;
  retention: RetentionConfig;
  cleanup: CleanupConfig;
}

type Env = Record<string, string | undefined>;

const UNIT_MS: Record<TimeUnit, number> = {
  seconds: 1000,
  minutes: 60 * 1000,
  hours: 60 * 60 * 1000
};

/**
 * Loads `.env` into process.env. A missing file is fine.
 */
export function loadEnvFile(path?: string): void {
  const result = dotenv.config(path ? { path } : undefined);
  if (result.error && errorCode(result.error) !== 'ENOENT') {
    console.warn('⚠️ Failed to load .env file:', result.error.message);
  }
}

export function parseTimeUnit(name: string, value: string | undefined, fallback: TimeUnit): TimeUnit {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const unit = value.trim().toLowerCase();
  if (unit === 'seconds' || unit === 'minutes' || unit === 'hours') {
    return unit;
  }
  throw new ConfigError(`${name} must be one of seconds, minutes, hours (got "${value}")`);
}

function parsePositive(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    console.warn(`⚠️ Invalid ${name} value "${value}", falling back to ${fallback}`);
    return fallback;
  }
  return parsed;
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  const parsed = parsePositive(name, value, fallback);
  if (!Number.isInteger(parsed)) {
    console.warn(`⚠️ ${name} must be a whole number, falling back to ${fallback}`);
    return fallback;
  }
  return parsed;
}

export function toMilliseconds(value: number, unit: TimeUnit): number {
  return value * UNIT_MS[unit];
}

function parseStorageProvider(value: string | undefined): StorageProviderName {
  const provider = value?.trim() || 'local';
  if (provider === 'local' || provider === 'memory') {
    return provider;
  }
  throw new ConfigError(`Unsupported storage provider: ${provider}`);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const ttlUnit = parseTimeUnit('DEFAULT_TTL_UNIT', env.DEFAULT_TTL_UNIT, 'minutes');
  const cleanupUnit = parseTimeUnit('CLEANUP_INTERVAL_UNIT', env.CLEANUP_INTERVAL_UNIT, 'seconds');

  const defaultTtlMs = toMilliseconds(parsePositive('DEFAULT_TTL', env.DEFAULT_TTL, 60), ttlUnit);
  const maxTtlMs = toMilliseconds(parsePositive('MAX_TTL', env.MAX_TTL, 1440), ttlUnit);
  if (defaultTtlMs > maxTtlMs) {
    throw new ConfigError('DEFAULT_TTL cannot exceed MAX_TTL');
  }

  const defaultMaxDownloads = parsePositiveInt('MAX_DOWNLOADS', env.MAX_DOWNLOADS, 3);
  const maxDownloadsLimit = parsePositiveInt('MAX_DOWNLOADS_LIMIT', env.MAX_DOWNLOADS_LIMIT, Math.max(10, defaultMaxDownloads));
  if (defaultMaxDownloads > maxDownloadsLimit) {
    throw new ConfigError('MAX_DOWNLOADS cannot exceed MAX_DOWNLOADS_LIMIT');
  }

  const corsOrigin = env.CORS_ORIGIN?.trim();

  return {
    port: parsePositiveInt('PORT', env.PORT, 8080),
    host: env.HOST || '0.0.0.0',
    nodeEnv: env.NODE_ENV || 'development',
    publicUrl: env.PUBLIC_URL ? env.PUBLIC_URL.replace(/\/+$/, '') : undefined,
    corsOrigin: !corsOrigin || corsOrigin === '*' ? '*' : corsOrigin.split(',').map(o => o.trim()),
    uploadSecret: env.UPLOAD_SECRET || undefined,
    docsPath: env.OPENAPI_DOCUMENT || join(process.cwd(), 'docs', 'openapi.yaml'),

    storage: {
      provider: parseStorageProvider(env.STORAGE_PROVIDER),
      local: {
        path: env.UPLOAD_DIR || './data',
        createSubdirs: env.STORAGE_CREATE_SUBDIRS !== 'false'
      }
    },

    retention: {
      defaultTtlMs,
      maxTtlMs,
      defaultMaxDownloads,
      maxDownloadsLimit,
      maxFileSize: parsePositiveInt('MAX_FILE_SIZE', env.MAX_FILE_SIZE, 104857600) // 100MB
    },

    cleanup: {
      intervalMs: toMilliseconds(parsePositive('CLEANUP_INTERVAL', env.CLEANUP_INTERVAL, 60), cleanupUnit),
      schedule: env.CLEANUP_SCHEDULE || undefined
    }
  };
}
