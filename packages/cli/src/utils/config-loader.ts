/**
 * Configuration Loader
 *
 * Loads changelog-guard.config.yaml from the project root (or an explicit
 * path) and validates it with detailed errors.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';

import { parse as parseYaml } from 'yaml';

import { CONFIG_FILE_NAME, safeValidateConfig, type ChangelogGuardConfig } from '../schemas/config-schema.js';

import { logDebug } from './logger.js';

export interface ConfigLoadResult {
  /** Validated configuration, or null when absent or invalid */
  config: ChangelogGuardConfig | null;
  /** Validation errors, or null when the file is absent or valid */
  errors: string[] | null;
  /** Config file that was (or would have been) read */
  filePath: string | null;
}

/**
 * Find the config file in a project root
 *
 * @param projectRoot - Directory to look in
 * @returns Config file path or null if not found
 */
export function findConfigPath(projectRoot: string): string | null {
  const configPath = join(projectRoot, CONFIG_FILE_NAME);
  return existsSync(configPath) ? configPath : null;
}

/**
 * Load configuration with detailed validation errors
 *
 * @param configPath - Absolute path to the config file, or null when there is none
 * @returns Object with config, errors, and file path
 *
 * @example
 * ```typescript
 * const { config, errors, filePath } = loadConfigWithErrors(findConfigPath(root));
 * if (errors) {
 *   displayConfigErrors({ fileName: basename(filePath ?? CONFIG_FILE_NAME), errors });
 * }
 * ```
 */
export function loadConfigWithErrors(configPath: string | null): ConfigLoadResult {
  if (!configPath) {
    return { config: null, errors: null, filePath: null };
  }

  const filePath = resolve(configPath);

  // Only YAML files supported
  if (!filePath.endsWith('.yaml')) {
    return {
      config: null,
      errors: [`Unsupported config file format: ${filePath} (only .yaml is supported)`],
      filePath,
    };
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { config: null, errors: [`Cannot read config file: ${message}`], filePath };
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (parseError) {
    const message = parseError instanceof Error ? parseError.message : String(parseError);
    return { config: null, errors: [`YAML syntax error: ${message}`], filePath };
  }

  // An empty file means "all defaults"
  if (raw === null || raw === undefined) {
    raw = {};
  }

  // Remove $schema property if present (used for IDE support only)
  if (typeof raw === 'object' && raw !== null && '$schema' in raw) {
    const { $schema: _schema, ...rest } = raw;
    raw = rest;
  }

  const validation = safeValidateConfig(raw);
  if (!validation.success) {
    return { config: null, errors: validation.errors, filePath };
  }

  logDebug('config', 'Loaded configuration', { filePath, config: validation.data });
  return { config: validation.data, errors: null, filePath };
}
