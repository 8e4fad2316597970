import type { LogLevel } from '@nestjs/common';
import { LOG_LEVELS, LogLevelName } from './env.validation';

export interface DatabaseConfig {
  url?: string;
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
  replicaUrls: string[];
  connectionLimit: number;
}

export interface CatalogConfig {
  ncbiApiKey?: string;
  ncbiEmail?: string;
  timeoutMs: number;
  maxRetries: number;
  proxyUrl?: string;
}

export interface StorageConfig {
  endpoint?: string;
  region: string;
  bucket?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  downloadDir: string;
}

export interface AppConfig {
  port: number;
  logLevel: LogLevelName;
  database: DatabaseConfig;
  catalog: CatalogConfig;
  storage: StorageConfig;
}

function optional(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

function int(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function isLogLevelName(value: string | undefined): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

export function configuration(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: int(env.PORT, 3000),
    logLevel: isLogLevelName(env.LOG_LEVEL) ? env.LOG_LEVEL : 'log',
    database: {
      url: optional(env.DATABASE_URL),
      host: env.DATABASE_HOST || 'localhost',
      port: int(env.DATABASE_PORT, 5432),
      user: env.DATABASE_USER || 'postgres',
      password: env.DATABASE_PASSWORD || 'postgres',
      name: env.DATABASE_NAME || 'idat_catalog',
      replicaUrls: (env.DATABASE_REPLICA_URLS ?? '')
        .split(',')
        .map((u) => u.trim())
        .filter((u) => u.length > 0),
      connectionLimit: int(env.DB_CONNECTION_LIMIT, 10),
    },
    catalog: {
      ncbiApiKey: optional(env.NCBI_API_KEY),
      ncbiEmail: optional(env.NCBI_EMAIL),
      timeoutMs: int(env.HTTP_TIMEOUT_MS, 60_000),
      maxRetries: int(env.HTTP_MAX_RETRIES, 3),
      proxyUrl: optional(env.HTTPS_PROXY) ?? optional(env.HTTP_PROXY),
    },
    storage: {
      endpoint: optional(env.S3_ENDPOINT_URL),
      region: env.S3_REGION || 'us-east-1',
      bucket: optional(env.S3_BUCKET),
      accessKeyId: optional(env.AWS_ACCESS_KEY_ID),
      secretAccessKey: optional(env.AWS_SECRET_ACCESS_KEY),
      downloadDir: env.DOWNLOAD_DIR || './downloads',
    },
  };
}

/**
 * Nest logger levels enabled for a configured threshold.
 * `log` enables error, warn and log; `verbose` enables everything.
 */
export function loggerLevels(level: LogLevelName): LogLevel[] {
  const index = LOG_LEVELS.indexOf(level);
  return LOG_LEVELS.slice(0, index + 1);
}
