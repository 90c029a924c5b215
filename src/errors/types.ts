/**
 * Error types for report-harness.
 *
 * Error hierarchy:
 * - HarnessError (base)
 *   - UsageError (bad arguments, no state mutated)
 *   - FakeError (one fake entry could not be installed)
 *     - BackupError
 *     - CopyError
 *   - GenerationError (fatal report generation failures)
 *     - UnsupportedModeError
 *     - ExternalToolError
 *     - ArtifactNotRecognizedError
 *   - RevertError (cleanup after generation)
 *   - AssertionFailedError (listing assertions)
 *   - ConfigError (configuration issues)
 */

import { RESULT_CODES, type ResultCode } from '../constants.js';

/**
 * Error severity levels.
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Error context for debugging after the fact.
 */
export interface ErrorContext {
  /** Operation that failed */
  operation?: string;
  /** Component where error occurred */
  component?: string;
  /** Namespace of the request if applicable */
  namespace?: string;
  /** Path involved in the failure */
  path?: string;
  /** Timing information */
  timing?: {
    startedAt: Date;
    failedAt: Date;
    durationMs: number;
  };
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

interface HarnessErrorOptions {
  code: string;
  resultCode?: ResultCode;
  severity?: ErrorSeverity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all harness errors.
 */
export class HarnessError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Numeric result code, also used as the CLI exit code */
  readonly resultCode: ResultCode;
  /** Error severity */
  readonly severity: ErrorSeverity;
  /** Error context for debugging */
  readonly context: ErrorContext;
  /** Original error if this wraps another */
  readonly cause?: Error;

  constructor(message: string, options: HarnessErrorOptions) {
    super(message);
    this.name = 'HarnessError';
    this.code = options.code;
    this.resultCode = options.resultCode ?? RESULT_CODES.USAGE;
    this.severity = options.severity ?? 'medium';
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Create a new error with additional context.
   */
  withContext(additionalContext: Partial<ErrorContext>): HarnessError {
    return new HarnessError(this.message, {
      code: this.code,
      resultCode: this.resultCode,
      severity: this.severity,
      context: { ...this.context, ...additionalContext },
      cause: this.cause,
    });
  }

  /**
   * Convert to JSON for logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      resultCode: this.resultCode,
      message: this.message,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      stack: this.stack,
    };
  }
}

// =============================================================================
// Usage Errors
// =============================================================================

/**
 * Wrong argument count or shape. Raised before any state is touched.
 */
export class UsageError extends HarnessError {
  constructor(message: string, context?: ErrorContext) {
    super(message, {
      code: 'USAGE_ERROR',
      resultCode: RESULT_CODES.USAGE,
      severity: 'low',
      context,
    });
    this.name = 'UsageError';
  }
}

// =============================================================================
// Fake Errors
// =============================================================================

/**
 * Base class for failures local to a single fake entry.
 */
export class FakeError extends HarnessError {
  /** Destination the fake was meant for */
  readonly destination: string;

  constructor(message: string, destination: string, code: string, cause?: Error) {
    super(message, {
      code,
      severity: 'medium',
      context: { path: destination },
      cause,
    });
    this.name = 'FakeError';
    this.destination = destination;
  }
}

/**
 * The destination could not be backed up, so the fake was not installed.
 */
export class BackupError extends FakeError {
  constructor(destination: string, cause?: Error) {
    super(`Cannot back up '${destination}'`, destination, 'FAKE_BACKUP_FAILED', cause);
    this.name = 'BackupError';
  }
}

/**
 * The fake payload could not be copied over its destination.
 */
export class CopyError extends FakeError {
  /** Payload that failed to install */
  readonly source: string;

  constructor(source: string, destination: string, cause?: Error) {
    super(`Cannot install '${source}' to '${destination}'`, destination, 'FAKE_COPY_FAILED', cause);
    this.name = 'CopyError';
    this.source = source;
  }
}

// =============================================================================
// Generation Errors
// =============================================================================

/**
 * Base class for fatal report generation failures.
 */
export class GenerationError extends HarnessError {
  constructor(message: string, options: HarnessErrorOptions) {
    super(message, { severity: 'high', ...options });
    this.name = 'GenerationError';
  }
}

/**
 * The parameters request a mode whose output the harness cannot post-process.
 */
export class UnsupportedModeError extends GenerationError {
  /** Flag that triggered the rejection */
  readonly flag: string;

  constructor(flag: string, context?: ErrorContext) {
    super(`${flag} parameter detected but not supported yet`, {
      code: 'UNSUPPORTED_MODE',
      resultCode: RESULT_CODES.UNSUPPORTED_MODE,
      context: { ...context, metadata: { ...context?.metadata, flag } },
    });
    this.name = 'UnsupportedModeError';
    this.flag = flag;
  }
}

/**
 * The tool exited with a status outside the expected bound.
 */
export class ExternalToolError extends GenerationError {
  /** Exit status, null when the tool was killed or never started */
  readonly exitCode: number | null;
  /** Expected status specification */
  readonly expected: string;

  constructor(
    message: string,
    exitCode: number | null,
    expected: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, {
      code: 'EXTERNAL_TOOL_FAILED',
      resultCode: RESULT_CODES.TOOL_FAILURE,
      context: { ...context, metadata: { ...context?.metadata, exitCode, expected } },
      cause,
    });
    this.name = 'ExternalToolError';
    this.exitCode = exitCode;
    this.expected = expected;
  }
}

/**
 * The tool reported success but its output carried no artifact location,
 * or the announced artifact does not exist.
 */
export class ArtifactNotRecognizedError extends GenerationError {
  constructor(context?: ErrorContext, message = 'Generated report not recognized from tool output') {
    super(message, {
      code: 'ARTIFACT_NOT_RECOGNIZED',
      resultCode: RESULT_CODES.ARTIFACT_NOT_RECOGNIZED,
      context,
    });
    this.name = 'ArtifactNotRecognizedError';
  }
}

// =============================================================================
// Cleanup and assertion errors
// =============================================================================

/**
 * Restoring the faked paths failed.
 */
export class RevertError extends HarnessError {
  /** Paths that could not be restored */
  readonly failedPaths: string[];

  constructor(namespace: string, failedPaths: string[], cause?: Error) {
    super(`Uninstall of fakes in namespace '${namespace}' failed`, {
      code: 'REVERT_FAILED',
      severity: 'medium',
      context: { namespace, metadata: { failedPaths } },
      cause,
    });
    this.name = 'RevertError';
    this.failedPaths = failedPaths;
  }
}

/**
 * A listing assertion did not hold.
 */
export class AssertionFailedError extends HarnessError {
  readonly pattern: string;

  constructor(message: string, pattern: string) {
    super(message, {
      code: 'ASSERTION_FAILED',
      severity: 'medium',
      context: { metadata: { pattern } },
    });
    this.name = 'AssertionFailedError';
    this.pattern = pattern;
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Configuration-related error.
 */
export class ConfigError extends HarnessError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, {
      code: 'CONFIG_ERROR',
      severity: 'high',
      context,
      cause,
    });
    this.name = 'ConfigError';
  }
}

/**
 * Configuration file not found.
 */
export class ConfigNotFoundError extends ConfigError {
  /** Path that was searched */
  readonly path: string;

  constructor(path: string, context?: ErrorContext) {
    super(`Configuration file not found: ${path}`, {
      ...context,
      path,
    });
    this.name = 'ConfigNotFoundError';
    this.path = path;
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Check if an error is a HarnessError.
 */
export function isHarnessError(error: unknown): error is HarnessError {
  return error instanceof HarnessError;
}

/**
 * Wrap an unknown error in a HarnessError.
 */
export function wrapError(error: unknown, context?: ErrorContext): HarnessError {
  if (isHarnessError(error)) {
    return context ? error.withContext(context) : error;
  }

  const originalError = error instanceof Error ? error : new Error(String(error));

  return new HarnessError(originalError.message, {
    code: 'UNKNOWN_ERROR',
    severity: 'medium',
    context,
    cause: originalError,
  });
}

/**
 * Extract error message from any error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Result code for any thrown value.
 */
export function resultCodeFor(error: unknown): ResultCode {
  return isHarnessError(error) ? error.resultCode : RESULT_CODES.USAGE;
}

/**
 * Create timing context for error tracking.
 */
export function createTimingContext(startedAt: Date): ErrorContext['timing'] {
  const failedAt = new Date();
  return {
    startedAt,
    failedAt,
    durationMs: failedAt.getTime() - startedAt.getTime(),
  };
}
