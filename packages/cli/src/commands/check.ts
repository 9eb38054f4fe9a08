/**
 * Check Command
 *
 * Validates the changelog, then either prints the latest version, writes the
 * release notes of one version to a file, or confirms the changelog is valid.
 * Registered on the root program: `changelog-guard [options]`.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { basename, dirname, resolve } from 'node:path';

import {
  DEFAULT_CHANGELOG_FILE_NAME,
  UsageError,
  extractReleaseNotes,
  isChangelogError,
  validateChangelog,
} from '@changelog-guard/core';
import type { Command } from 'commander';

import { CONFIG_FILE_NAME } from '../schemas/config-schema.js';
import { displayConfigErrors, type ConfigErrorDetails } from '../utils/config-error-reporter.js';
import { findConfigPath, loadConfigWithErrors } from '../utils/config-loader.js';
import { logDebug, logError, toError } from '../utils/logger.js';
import { findProjectRoot } from '../utils/project-root.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export interface CheckOptions {
  latestVersion?: boolean;
  releaseNotesVersion?: string;
  releaseNotesOutput?: string;
  changelog?: string;
  config?: string;
  yaml?: boolean;
}

/**
 * Structured result written with --yaml
 */
export interface CheckReport {
  valid: boolean;
  changelog: string;
  latestVersion?: string;
  releases?: Array<{ version: string; date: string }>;
  notes?: { version: string; output: string };
  error?: { code: string; message: string };
}

type ChangelogLocation =
  | { path: string; source: 'option' | 'config' | 'default' }
  | { configErrors: ConfigErrorDetails };

/**
 * Work out which changelog to read
 *
 * --changelog wins (config is not read), then the config file's `changelog`
 * key, then CHANGELOG.md at the project root.
 */
export function locateChangelog(options: CheckOptions, cwd: string): ChangelogLocation {
  if (options.changelog) {
    return { path: resolve(cwd, options.changelog), source: 'option' };
  }

  const projectRoot = findProjectRoot(cwd);
  const configPath = options.config ? resolve(cwd, options.config) : findConfigPath(projectRoot);
  const { config, errors, filePath } = loadConfigWithErrors(configPath);

  if (errors) {
    return { configErrors: { fileName: basename(filePath ?? CONFIG_FILE_NAME), errors } };
  }

  if (config?.changelog && filePath) {
    return { path: resolve(dirname(filePath), config.changelog), source: 'config' };
  }

  return { path: resolve(projectRoot, DEFAULT_CHANGELOG_FILE_NAME), source: 'default' };
}

/**
 * Run one check and return the process exit code
 *
 * @param options - Parsed command-line options
 * @param cwd - Directory relative paths are resolved against
 * @returns 0 on success, 1 on any validation, usage, lookup or I/O failure
 */
export async function runCheck(options: CheckOptions, cwd: string = process.cwd()): Promise<number> {
  const location = locateChangelog(options, cwd);
  if ('configErrors' in location) {
    displayConfigErrors(location.configErrors);
    return 1;
  }

  const changelogPath = location.path;
  const fileName = basename(changelogPath);
  logDebug('changelog', 'Resolved changelog path', { changelogPath, source: location.source });

  const finish = async (report: CheckReport, exitCode: number): Promise<number> => {
    if (options.yaml) {
      await outputYamlResult(report);
    }
    return exitCode;
  };

  let content: string;
  try {
    content = readFileSync(changelogPath, 'utf-8');
  } catch (error) {
    const cause = toError(error);
    logError('changelog', `Failed to read ${changelogPath}`, cause);
    return finish({ valid: false, changelog: changelogPath, error: { code: 'IO', message: cause.message } }, 1);
  }

  const result = validateChangelog(content, { fileName });
  if (!result.valid) {
    console.error(result.error.message);
    return finish(
      { valid: false, changelog: changelogPath, error: { code: result.error.code, message: result.error.message } },
      1
    );
  }

  const { latestVersion } = result;
  const report: CheckReport = {
    valid: true,
    changelog: changelogPath,
    latestVersion,
    releases: result.headings.map(({ version, date }) => ({ version, date })),
  };

  if (options.latestVersion) {
    if (!options.yaml) {
      console.log(latestVersion);
    }
    return finish(report, 0);
  }

  const notesVersion = options.releaseNotesVersion;
  if (notesVersion) {
    const output = options.releaseNotesOutput;
    if (!output) {
      const usage = new UsageError('--release-notes-output is required with --release-notes-version');
      console.error(usage.message);
      return finish({ ...report, error: { code: usage.code, message: usage.message } }, 1);
    }

    let notes: string;
    try {
      notes = extractReleaseNotes(content, notesVersion);
    } catch (error) {
      if (!isChangelogError(error)) {
        throw error;
      }
      console.error(error.message);
      return finish({ ...report, error: { code: error.code, message: error.message } }, 1);
    }

    try {
      writeFileSync(resolve(cwd, output), notes, 'utf-8');
    } catch (error) {
      const cause = toError(error);
      logError('notes', `Failed to write release notes to ${output}`, cause);
      return finish({ ...report, error: { code: 'IO', message: cause.message } }, 1);
    }

    logDebug('notes', 'Wrote release notes', {
      version: notesVersion,
      output,
      bytes: Buffer.byteLength(notes, 'utf-8'),
    });
    if (!options.yaml) {
      console.log(`Wrote release notes for v${notesVersion} to ${output}`);
    }
    return finish({ ...report, notes: { version: notesVersion, output } }, 0);
  }

  if (!options.yaml) {
    console.log(`${fileName} format is valid. Latest version: ${latestVersion}`);
  }
  return finish(report, 0);
}

export function checkCommand(program: Command): void {
  program
    .option('--latest-version', 'Print the latest release version from the changelog')
    .option('--release-notes-version <version>', 'Version to extract release notes for')
    .option('--release-notes-output <path>', 'Path to write extracted release notes')
    .option('--changelog <path>', `Changelog to check (default: ${DEFAULT_CHANGELOG_FILE_NAME} at the project root)`)
    .option('--config <path>', `Config file (default: ${CONFIG_FILE_NAME} at the project root)`)
    .option('-y, --yaml', 'Output the result as YAML to stdout')
    .addHelpText('after', `
Exit codes:
  0  Changelog valid (and the requested output was produced)
  1  Validation failed, option missing, version not found, or I/O error

Examples:
  $ changelog-guard
  $ changelog-guard --latest-version
  $ changelog-guard --release-notes-version 1.4.0 --release-notes-output .release-notes.md
`)
    .action(async (options: CheckOptions) => {
      process.exit(await runCheck(options));
    });
}
