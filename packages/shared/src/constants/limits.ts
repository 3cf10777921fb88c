/** Shape limits checked after the whole workbook has been parsed */
export const PARSE_LIMITS = {
  MAX_SHEETS: 50,
  MAX_CELLS: 100_000,
} as const;

/** Upload and file limits */
export const FILE_LIMITS = {
  MAX_UPLOAD_SIZE_BYTES: 10 * 1024 * 1024, // 10MB
  ALLOWED_EXTENSION: '.xlsx',
  XLSX_MIME_TYPE: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  STORED_EXTENSION: 'xlsx',
} as const;

/** Search contract limits */
export const SEARCH_LIMITS = {
  MAX_KEYWORDS: 5,
  MAX_KEYWORDS_LENGTH: 200,
  DEFAULT_PAGE_SIZE: 20,
  MAX_PAGE_SIZE: 100,
  /** Largest 0-based page whose offset stays a safe integer at MAX_PAGE_SIZE */
  MAX_PAGE: Math.floor(Number.MAX_SAFE_INTEGER / 100),
} as const;

/** Index write tuning */
export const INDEX_TUNING = {
  CELL_BATCH_SIZE: 500,
  PURGE_BATCH_SIZE: 500,
} as const;
