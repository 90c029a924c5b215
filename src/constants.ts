/**
 * Centralized constants for report-harness.
 *
 * This file consolidates file names, defaults and result codes
 * so every component agrees on a single source of truth.
 */

// ==================== Paths ====================

/**
 * File and directory names under the storage root.
 */
export const PATHS = {
  /** Default storage root (relative to the working directory) */
  DEFAULT_ROOT: '.report-harness',
  /** Pending fake queue, truncated on every harness initialization */
  FAKE_QUEUE_FILE: 'fakelist.txt',
  /** Permanent artifact store, kept until purged */
  STORE_DIR: 'storage',
  /** Harness log file (inside the store) */
  LOG_FILE: 'log.txt',
  /** Store database (inside the store) */
  DB_FILE: 'db.txt',
  /** Backups of faked destinations, one subdirectory per namespace */
  BACKUP_DIR: 'backups',
  /** Marker always pointing at the most recent artifact */
  LATEST_MARKER: 'lastreport',
  /** Artifact of the last successful request, removed when a request starts */
  CURRENT_RESULT_FILE: 'current-report',
  /** Possible config file names (in order of preference) */
  CONFIG_FILENAMES: ['report-harness.yaml', 'report-harness.yml', '.report-harness.yaml', '.report-harness.yml'],
  /** Default config file name (first in CONFIG_FILENAMES) */
  DEFAULT_CONFIG_FILENAME: 'report-harness.yaml',
} as const;

/**
 * Environment variables read by the harness.
 */
export const ENV_VARS = {
  /** Overrides storage.root from the config file */
  ROOT: 'REPORT_HARNESS_ROOT',
  /** Name recorded in the log when the harness is initialized */
  TEST_NAME: 'TEST',
  /** Default diagnostic log level for library use */
  LOG_LEVEL: 'REPORT_HARNESS_LOG_LEVEL',
} as const;

// ==================== Side files ====================

/**
 * Suffixes of the side files stored next to every artifact.
 */
export const SIDE_FILES = {
  /** Copy of the fake queue active at generation time */
  FAKELIST: '.fakelist',
  /** Raw parameter string */
  PARAMS: '.params',
  /** Captured combined stdout/stderr of the tool */
  OUTPUT: '.output',
  /** Archive entry listing */
  LISTING: '.listing',
} as const;

// ==================== Defaults ====================

/**
 * Defaults for report generation.
 */
export const REPORT_DEFAULTS = {
  /** Namespace used when the caller passes none */
  NAMESPACE: 'default',
  /** Keyword accepted in place of the default exit status */
  DEFAULT_KEYWORD: 'default',
  /** Expected exit status when the caller passes none */
  EXPECTED_EXIT_STATUS: '0',
  /** Backup namespace for faked destinations */
  BACKUP_NAMESPACE: 'report-harness',
} as const;

/**
 * Defaults describing the external report tool.
 */
export const TOOL_DEFAULTS = {
  COMMAND: 'sosreport',
  BATCH_FLAG: '--batch',
  UNSUPPORTED_FLAGS: ['--build'],
  /** Answers fed to the tool's prompts when not in batch mode */
  INTERACTIVE_ANSWERS: ['', 'tester', '123', ''],
  MARKER: 'Your sosreport has been generated and saved in:',
  ARTIFACT_PATTERN: '/sosreport-.*tar.*',
  ARTIFACT_PREFIX: 'sosreport',
  CHECKSUM_SUFFIX: '.md5',
} as const;

// ==================== Result codes ====================

/**
 * Result codes returned by harness operations and used as CLI exit codes.
 */
export const RESULT_CODES = {
  /** Operation succeeded */
  OK: 0,
  /** Bad usage, failed assertion or configuration problem */
  USAGE: 1,
  /** The report tool exited outside the expected status */
  TOOL_FAILURE: 2,
  /** Parameters request a mode whose output cannot be post-processed */
  UNSUPPORTED_MODE: 10,
  /** The tool succeeded but its output did not announce an artifact */
  ARTIFACT_NOT_RECOGNIZED: 20,
} as const;

export type ResultCode = (typeof RESULT_CODES)[keyof typeof RESULT_CODES];
