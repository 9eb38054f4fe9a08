#!/usr/bin/env tsx
/**
 * changelog-guard CLI Entry Point
 *
 * Validates CHANGELOG.md, prints the latest version, or extracts release notes.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { Command } from 'commander';

import { checkCommand } from './commands/check.js';
import { logWarning, toError } from './utils/logger.js';

const FALLBACK_VERSION = '0.0.0';

/**
 * Read the CLI version from package.json at runtime
 */
function readPackageVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '../package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    logWarning('config', `No version field in ${packageJsonPath}, using ${FALLBACK_VERSION}`);
  } catch (error) {
    logWarning('config', `Could not read ${packageJsonPath}, using ${FALLBACK_VERSION}`, toError(error));
  }
  return FALLBACK_VERSION;
}

const program = new Command();

program
  .name('changelog-guard')
  .description('Validate CHANGELOG.md and extract release notes')
  .version(readPackageVersion());

checkCommand(program);

await program.parseAsync(process.argv);
