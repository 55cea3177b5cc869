/**
 * Runtime configuration helpers. Values come from environment variables
 * and fall back to the defaults in `config/constants` when missing or invalid.
 */

import { ENV_KEYS, PAGE_CACHE, PAGE_SIZE, SOURCE, TASK_POOL } from '../config/constants';

export type Env = Record<string, string | undefined>;

/**
 * Settings of a data view. Worker count and source deadline are read by
 * the source task pool and the sources themselves.
 */
export interface ViewConfig {
  pageSize: number;
  cacheCapacity: number;
}

function readPositiveInt(env: Env, key: string, fallback: number, max: number): number {
  const raw = env[key];
  if (!raw) return fallback;

  const value = Number(raw.trim());
  if (Number.isInteger(value) && value > 0 && value <= max) {
    return value;
  }

  return fallback;
}

/**
 * Get the default page size.
 * Falls back to `PAGE_SIZE.DEFAULT` if not set or invalid.
 */
export function getDefaultPageSize(env: Env = process.env): number {
  return readPositiveInt(env, ENV_KEYS.PAGE_SIZE, PAGE_SIZE.DEFAULT, PAGE_SIZE.MAX);
}

export function getCacheCapacity(env: Env = process.env): number {
  return readPositiveInt(
    env,
    ENV_KEYS.CACHE_CAPACITY,
    PAGE_CACHE.DEFAULT_CAPACITY,
    Number.MAX_SAFE_INTEGER,
  );
}

export function getMaxWorkers(env: Env = process.env): number {
  return readPositiveInt(
    env,
    ENV_KEYS.MAX_WORKERS,
    TASK_POOL.DEFAULT_MAX_CONCURRENCY,
    TASK_POOL.MAX_CONCURRENCY,
  );
}

/**
 * Get the source operation timeout in milliseconds.
 * Falls back to 30000 (30s) if not set or invalid.
 */
export function getFetchTimeoutMs(env: Env = process.env): number {
  return readPositiveInt(
    env,
    ENV_KEYS.FETCH_TIMEOUT_MS,
    SOURCE.DEFAULT_TIMEOUT_MS,
    SOURCE.MAX_TIMEOUT_MS,
  );
}

export function resolveViewConfig(
  overrides: Partial<ViewConfig> = {},
  env: Env = process.env,
): ViewConfig {
  return {
    pageSize: overrides.pageSize ?? getDefaultPageSize(env),
    cacheCapacity: overrides.cacheCapacity ?? getCacheCapacity(env),
  };
}
