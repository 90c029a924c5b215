/**
 * Configuration validation using Zod schemas.
 *
 * Every section has defaults, so an empty file (or no file at all)
 * yields a complete configuration.
 */

import { z } from 'zod';
import { existsSync } from 'fs';
import { join } from 'path';
import { PATHS, REPORT_DEFAULTS, TOOL_DEFAULTS } from '../constants.js';
import { ConfigError } from '../errors/types.js';

const isValidRegExp = (source: string): boolean => {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
};

/**
 * Storage configuration schema.
 */
export const storageConfigSchema = z.object({
  /** Root directory holding the fake queue, store and backups */
  root: z.string().min(1).default(PATHS.DEFAULT_ROOT),
}).default({});

/**
 * Report tool configuration schema.
 */
export const toolConfigSchema = z.object({
  /** Executable (or shell snippet) invoked with the parameter string */
  command: z.string().min(1).default(TOOL_DEFAULTS.COMMAND),
  /** Flag selecting non-interactive mode */
  batchFlag: z.string().min(1).default(TOOL_DEFAULTS.BATCH_FLAG),
  /** Flags whose output cannot be post-processed */
  unsupportedFlags: z.array(z.string().min(1)).default([...TOOL_DEFAULTS.UNSUPPORTED_FLAGS]),
  /** Lines written to stdin when not in batch mode */
  interactiveAnswers: z.array(z.string()).default([...TOOL_DEFAULTS.INTERACTIVE_ANSWERS]),
  /** Echo tool output live while capturing it */
  streamOutput: z.boolean().default(true),
  /** Kill the tool after this many ms (0 = wait forever) */
  timeoutMs: z.number().int().min(0).default(0),
}).default({});

/**
 * Artifact recognition configuration schema.
 */
export const artifactConfigSchema = z.object({
  /** Output line announcing the artifact location */
  marker: z.string().min(1).default(TOOL_DEFAULTS.MARKER),
  /** Regular expression the announced path must match */
  pattern: z
    .string()
    .min(1)
    .refine(isValidRegExp, { message: 'Invalid regular expression' })
    .default(TOOL_DEFAULTS.ARTIFACT_PATTERN),
  /** File name prefix shared by all artifacts (used by purge) */
  prefix: z.string().min(1).default(TOOL_DEFAULTS.ARTIFACT_PREFIX),
  /** Suffix of the checksum file written next to the artifact */
  checksumSuffix: z.string().min(1).default(TOOL_DEFAULTS.CHECKSUM_SUFFIX),
}).default({});

/**
 * Backup configuration schema.
 */
export const backupConfigSchema = z.object({
  /** Namespace under which faked destinations are backed up */
  namespace: z
    .string()
    .regex(/^[\w.-]+$/, 'Namespace may only contain letters, digits, ".", "_" and "-"')
    .default(REPORT_DEFAULTS.BACKUP_NAMESPACE),
}).default({});

/**
 * Logging configuration schema.
 */
export const loggingConfigSchema = z.object({
  /** Diagnostic log level */
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  /** Diagnostic log file (default: stdout) */
  file: z.string().optional(),
  /** Human-readable output through pino-pretty */
  pretty: z.boolean().default(false),
}).default({});

/**
 * Complete report-harness.yaml configuration schema.
 */
export const harnessConfigSchema = z.object({
  storage: storageConfigSchema,
  tool: toolConfigSchema,
  artifact: artifactConfigSchema,
  backup: backupConfigSchema,
  logging: loggingConfigSchema,
});

/**
 * Fully resolved configuration.
 */
export type HarnessConfig = z.infer<typeof harnessConfigSchema>;

/**
 * Configuration as written by users, every field optional.
 */
export type HarnessConfigInput = z.input<typeof harnessConfigSchema>;

/**
 * Validate a configuration object.
 * Returns the validated config with defaults applied, or throws with helpful errors.
 */
export function validateConfig(config: unknown, filePath?: string): HarnessConfig {
  const result = harnessConfigSchema.safeParse(config ?? {});

  if (!result.success) {
    const location = filePath ? ` in ${filePath}` : '';
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path || 'root'}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration${location}:\n${issues.join('\n')}`, {
      path: filePath,
    });
  }

  return result.data;
}

/**
 * Check if a config file exists at the given path or in the working directory.
 */
export function findConfigFile(explicitPath?: string): string | null {
  if (explicitPath) {
    return existsSync(explicitPath) ? explicitPath : null;
  }

  for (const name of PATHS.CONFIG_FILENAMES) {
    const path = join(process.cwd(), name);
    if (existsSync(path)) {
      return path;
    }
  }

  return null;
}
