import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { ENV_VARS } from '../constants.js';
import { ConfigError, ConfigNotFoundError } from '../errors/types.js';
import { findConfigFile, validateConfig, type HarnessConfig } from './validator.js';

export { ConfigNotFoundError };
export type { HarnessConfig, HarnessConfigInput } from './validator.js';

/**
 * Load configuration from file or return defaults.
 *
 * An explicit path must exist; otherwise the working directory is searched
 * and a missing file simply means "all defaults".
 */
export function loadConfig(explicitPath?: string): HarnessConfig {
  const path = findConfigFile(explicitPath);
  if (explicitPath && !path) {
    throw new ConfigNotFoundError(explicitPath);
  }

  const config = path ? loadConfigFile(path) : validateConfig({});
  return applyEnvOverrides(config);
}

/**
 * Load and parse a specific config file.
 */
function loadConfigFile(path: string): HarnessConfig {
  const content = readFileSync(path, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid YAML in config file ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { path },
      error instanceof Error ? error : undefined
    );
  }

  // Empty files mean defaults
  return validateConfig(parsed ?? {}, path);
}

/**
 * Apply environment overrides on top of a loaded config.
 */
export function applyEnvOverrides(
  config: HarnessConfig,
  env: NodeJS.ProcessEnv = process.env
): HarnessConfig {
  const root = env[ENV_VARS.ROOT];
  if (!root) {
    return config;
  }
  return { ...config, storage: { ...config.storage, root } };
}

/**
 * Generate default config file content.
 */
export function generateDefaultConfig(): string {
  return `# report-harness configuration
storage:
  root: .report-harness

tool:
  command: sosreport
  batchFlag: --batch
  unsupportedFlags: [--build]
  # Answers written to stdin when the batch flag is absent
  interactiveAnswers: ['', tester, '123', '']
  streamOutput: true
  # timeoutMs: 600000

artifact:
  marker: 'Your sosreport has been generated and saved in:'
  pattern: '/sosreport-.*tar.*'
  prefix: sosreport
  checksumSuffix: .md5

backup:
  namespace: report-harness

logging:
  level: warn
  pretty: false
  # file: ./report-harness.log
`;
}
