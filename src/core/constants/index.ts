/**
 * Application constants
 */

// Database constants
export const DB_CONSTANTS = {
  CACHE_SIZE: -20000,
  JOURNAL_MODE: "WAL",
  SYNCHRONOUS: "NORMAL",
  /** Snapshots kept for comparison: the baseline and the newest */
  SNAPSHOT_RETENTION: 2,
} as const;

// Catalog fetch constants
export const FETCH_CONSTANTS = {
  USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit(537.36) Chrome/124.0.0.0 Safari/537.36",
  ACCEPT_HEADER: "application/json,text/plain;q=0.9,*/*;q=0.8",
  PAGE_DELAY_MS: 250,
} as const;

// Catalog normalization constants
export const CATALOG_CONSTANTS = {
  /** Option names that carry the size axis, first match wins */
  SIZE_OPTION_NAMES: ["Size", "Taglia", "Options", "option"],
  DEFAULT_SIZE_TYPE: "Default Title",
  DEFAULT_VARIANT_TITLE: "Default Title",
} as const;

// Queue constants
export const QUEUE_CONSTANTS = {
  NAME: "catalog-refresh",
  SCHEDULER_ID: "refresh-catalog",
  JOB_NAME: "refresh",
} as const;
