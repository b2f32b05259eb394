import { AppConfig } from '../types';

const HOUR_MS = 60 * 60 * 1000;

function readInt(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readHours(name: string, fallbackHours: number): number {
  const parsed = parseFloat(process.env[name] || '');
  return (Number.isNaN(parsed) ? fallbackHours : parsed) * HOUR_MS;
}

/**
 * Load configuration from environment variables
 * Expects dotenv to have been loaded by the entry point
 */
export function loadConfig(): AppConfig {
  return {
    dataDirectory: process.env.DATA_DIRECTORY || './data',
    problemDatabaseUrl:
      process.env.PROBLEM_DATABASE_URL || 'https://uhunt.onlinejudge.org/api/p',
    categoryIndexUrl:
      process.env.CATEGORY_INDEX_URL || 'https://archive.example.org/categories/INDEX',
    categoryDataUrl:
      process.env.CATEGORY_DATA_URL || 'https://archive.example.org/categories/{name}.cat',
    retryCount: Math.max(0, readInt('DOWNLOAD_RETRY_COUNT', 2)),
    reportIntervalMs: readInt('PROGRESS_INTERVAL_MS', 100),
    requestTimeoutMs: readInt('REQUEST_TIMEOUT_MS', 30000),
    problemMaxAgeMs: readHours('PROBLEM_MAX_AGE_HOURS', 24), // 1 day
    categoryIndexMaxAgeMs: readHours('CATEGORY_INDEX_MAX_AGE_HOURS', 9.6), // 0.4 day
    minCacheBytes: readInt('MIN_CACHE_BYTES', 100),
  };
}
