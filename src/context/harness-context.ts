/**
 * Explicit harness context.
 *
 * Holds the storage layout, namespaces and loggers that every component
 * receives, so nothing reads ambient global state.
 *
 * Precondition: one harness run per storage root at a time. The queue,
 * database and log are plain files without locking.
 */

import { closeSync, existsSync, mkdirSync, openSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { ENV_VARS, PATHS } from '../constants.js';
import type { HarnessConfig } from '../config/validator.js';
import { HarnessLog } from '../logging/harness-log.js';
import { getLogger, type Logger } from '../logging/logger.js';

/**
 * Absolute locations of every persisted file.
 */
export interface HarnessPaths {
  root: string;
  fakeQueue: string;
  store: string;
  log: string;
  db: string;
  backups: string;
  latestMarker: string;
  currentResult: string;
}

export interface HarnessContext {
  readonly config: HarnessConfig;
  readonly paths: HarnessPaths;
  /** Namespace under which faked destinations are backed up */
  readonly backupNamespace: string;
  readonly log: HarnessLog;
  readonly logger: Logger;
}

export interface OpenContextOptions {
  /** Truncate the fake queue (done once per test run) */
  resetQueue?: boolean;
  /** Name recorded in the log, defaults to $TEST or "user" */
  loadedBy?: string;
  /** Clock used for log timestamps */
  now?: () => Date;
}

/**
 * Resolve all harness paths below a storage root.
 */
export function resolveHarnessPaths(root: string): HarnessPaths {
  const absoluteRoot = resolve(root);
  const store = join(absoluteRoot, PATHS.STORE_DIR);
  return {
    root: absoluteRoot,
    fakeQueue: join(absoluteRoot, PATHS.FAKE_QUEUE_FILE),
    store,
    log: join(store, PATHS.LOG_FILE),
    db: join(store, PATHS.DB_FILE),
    backups: join(absoluteRoot, PATHS.BACKUP_DIR),
    latestMarker: join(store, PATHS.LATEST_MARKER),
    currentResult: join(absoluteRoot, PATHS.CURRENT_RESULT_FILE),
  };
}

function touch(path: string): void {
  closeSync(openSync(path, 'a'));
}

/**
 * Create the storage layout (if needed) and build a context.
 */
export function openHarnessContext(
  config: HarnessConfig,
  options: OpenContextOptions = {}
): HarnessContext {
  const paths = resolveHarnessPaths(config.storage.root);

  for (const dir of [paths.root, paths.store, paths.backups]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
  touch(paths.log);
  touch(paths.db);

  if (options.resetQueue) {
    writeFileSync(paths.fakeQueue, '', 'utf-8');
  } else {
    touch(paths.fakeQueue);
  }

  const logger = getLogger('harness');
  const context: HarnessContext = {
    config,
    paths,
    backupNamespace: config.backup.namespace,
    log: new HarnessLog(paths.log, logger, options.now),
    logger,
  };

  if (options.resetQueue) {
    const loadedBy = options.loadedBy ?? process.env[ENV_VARS.TEST_NAME] ?? 'user';
    context.log.log('---');
    context.log.log(`harness initialized by: ${loadedBy}`);
    logger.debug({ paths }, 'Harness storage ready');
  }

  return context;
}
