// Page size configuration
export const PAGE_SIZE = {
  // Sizes offered by the page-size menu. Any integer >= MIN is accepted as custom.
  OPTIONS: [10, 25, 50, 100] as const,
  DEFAULT: 50,
  MIN: 1,
  MAX: 100_000,
} as const;

// Page cache configuration
export const PAGE_CACHE = {
  // Number of distinct page requests kept across all sources
  DEFAULT_CAPACITY: 64,
} as const;

// Worker threads running fetch/sort/count tasks
export const TASK_POOL = {
  DEFAULT_MAX_CONCURRENCY: 4,
  MAX_CONCURRENCY: 64,
} as const;

// State kept inside each source worker thread
export const SOURCE_WORKER = {
  // Opened tables per worker, least recently used ones are dropped first
  MAX_SESSIONS: 8,
  // Memoised row orders (sort spec + filter) per materialized table
  MAX_MEMOISED_ORDERS: 16,
} as const;

// Source adapters
export const SOURCE = {
  // Deadline for a single adapter operation (open, count, fetch, aggregate)
  DEFAULT_TIMEOUT_MS: 30_000,
  MAX_TIMEOUT_MS: 10 * 60 * 1000,

  // Extensions recognized by the source catalog
  TABLE_EXTENSIONS: ['.db', '.db3', '.sqlite', '.sqlite3'] as const,
  SPREADSHEET_EXTENSIONS: ['.xlsx', '.xls', '.ods'] as const,
  DELIMITED_EXTENSIONS: ['.csv', '.tsv', '.txt'] as const,

  // Candidates for delimiter detection, in order of preference on ties
  DELIMITER_CANDIDATES: [',', ';', '\t', '|'] as const,
} as const;

// Environment variables read by the runtime configuration
export const ENV_KEYS = {
  PAGE_SIZE: 'TABULAR_PAGER_PAGE_SIZE',
  CACHE_CAPACITY: 'TABULAR_PAGER_CACHE_CAPACITY',
  MAX_WORKERS: 'TABULAR_PAGER_MAX_WORKERS',
  FETCH_TIMEOUT_MS: 'TABULAR_PAGER_FETCH_TIMEOUT_MS',
  DEBUG: 'TABULAR_PAGER_DEBUG',
  LOG_LEVEL: 'TABULAR_PAGER_LOG_LEVEL',
} as const;

export type PageSizeOption = (typeof PAGE_SIZE.OPTIONS)[number];
