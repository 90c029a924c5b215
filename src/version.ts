/**
 * Centralized version management.
 */

import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { readFileSync } from 'fs';
import { z } from 'zod';

const packageJsonSchema = z.object({ version: z.string() });

/**
 * Get the package version.
 *
 * Reads package.json at runtime so the value is right both from src/ and
 * from an installed dist/.
 */
function getPackageVersion(): string {
  try {
    if (process.env.npm_package_version) {
      return process.env.npm_package_version;
    }

    const moduleDir = dirname(fileURLToPath(import.meta.url));
    const packagePath = join(moduleDir, '..', 'package.json');
    const parsed: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));

    return packageJsonSchema.parse(parsed).version;
  } catch {
    // Fallback version - should match package.json
    return '0.3.0';
  }
}

export const VERSION = getPackageVersion();

export const PACKAGE_NAME = 'report-harness';
