/**
 * report-harness - fake commands and files around an external report tool
 * and reuse the reports it already generated.
 *
 * @packageDocumentation
 */

// Facade
export { ReportHarness, createHarness, type HarnessOptions } from './harness.js';

// Context
export {
  openHarnessContext,
  resolveHarnessPaths,
  type HarnessContext,
  type HarnessPaths,
  type OpenContextOptions,
} from './context/harness-context.js';

// Fakes
export { FakeQueue } from './fakes/queue.js';
export { parseFakeLine, serializeFake, type ParsedFakeLine } from './fakes/serialization.js';
export {
  FAKE_ARITY,
  FAKE_KINDS,
  FAKE_TAGS,
  isFakeKind,
  type CommandFake,
  type FakeEntry,
  type FakeKind,
  type FileFake,
  type QueuedFake,
  type TreeFake,
  type UnknownFake,
} from './fakes/types.js';

// Overlay
export {
  FileBackupProvider,
  type BackupOptions,
  type BackupProvider,
  type RestoreFailure,
  type RestoreResult,
} from './overlay/backup.js';
export {
  OverlayManager,
  type ApplyReport,
  type FakeOutcome,
  type FakeOutcomeStatus,
  type RevertReport,
} from './overlay/overlay-manager.js';

// Fingerprint
export {
  computeFingerprint,
  fingerprintId,
  hashFakes,
  hashParams,
  normalizeParams,
  sameFingerprint,
  type Fingerprint,
} from './fingerprint/fingerprint.js';

// Store
export {
  ReportStore,
  formatRecord,
  parseRecord,
  type AdoptedArtifact,
  type SideFileContents,
  type StoreEntry,
  type StoreListing,
  type StoreRecord,
} from './store/report-store.js';
export { TarArchiveLister, type ArchiveLister } from './store/listing.js';

// Generation
export {
  ReportGenerator,
  normalizeNamespace,
  type GenerateOptions,
  type ReportResult,
} from './report/generator.js';
export { listingMatches } from './report/assertions.js';
export { extractArtifactPath, findFlag, hasFlag } from './report/tool-output.js';
export {
  ProcessToolRunner,
  type ToolInvocation,
  type ToolRunResult,
  type ToolRunner,
} from './runner/tool-runner.js';
export {
  normalizeExpectedStatus,
  parseExpectedStatus,
  statusMatches,
  type StatusRange,
} from './runner/exit-status.js';

// Configuration
export { loadConfig, applyEnvOverrides, generateDefaultConfig } from './config/loader.js';
export {
  harnessConfigSchema,
  validateConfig,
  findConfigFile,
  type HarnessConfig,
  type HarnessConfigInput,
} from './config/validator.js';

// Errors
export {
  HarnessError,
  UsageError,
  FakeError,
  BackupError,
  CopyError,
  GenerationError,
  UnsupportedModeError,
  ExternalToolError,
  ArtifactNotRecognizedError,
  RevertError,
  AssertionFailedError,
  ConfigError,
  ConfigNotFoundError,
  isHarnessError,
  wrapError,
  getErrorMessage,
  resultCodeFor,
  type ErrorContext,
  type ErrorSeverity,
} from './errors/types.js';

// Logging
export {
  createLogger,
  getLogger,
  configureLogger,
  resetLogger,
  defaultLogLevel,
  type LogLevel,
  type LoggerConfig,
  type Logger,
} from './logging/logger.js';
export { HarnessLog, formatLogTimestamp } from './logging/harness-log.js';

export { RESULT_CODES, type ResultCode } from './constants.js';
export { VERSION } from './version.js';
