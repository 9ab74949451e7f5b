export const LOG_LEVELS = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
} as const;

export const ERROR_CODES = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export const DEFAULT_ITERATIONS = 1_000_000;

/** Content shared by every key kind; the integer key stands in for the same entry */
export const SAMPLE_KEYS = {
  text: 'ruby',
  interned: 'ruby',
  integer: 1,
} as const;

export const SAMPLE_DESCRIPTION =
  'A dynamic, open source programming language with a focus on simplicity and productivity.';

export const OUTPUT_FORMATS = ['console', 'json', 'csv'] as const;
