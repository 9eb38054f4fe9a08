import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { findConfigPath, loadConfigWithErrors } from '../../src/utils/config-loader.js';

describe('config-loader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'changelog-guard-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string, name = 'changelog-guard.config.yaml'): string {
    const filePath = join(dir, name);
    writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  describe('findConfigPath', () => {
    it('should return null when there is no config file', () => {
      expect(findConfigPath(dir)).toBeNull();
    });

    it('should return the config file path when present', () => {
      const filePath = writeConfig('changelog: CHANGELOG.md\n');

      expect(findConfigPath(dir)).toBe(filePath);
    });
  });

  describe('loadConfigWithErrors', () => {
    it('should return nulls when no path is given', () => {
      expect(loadConfigWithErrors(null)).toEqual({ config: null, errors: null, filePath: null });
    });

    it('should load a valid config', () => {
      const filePath = writeConfig('changelog: docs/CHANGELOG.md\n');

      expect(loadConfigWithErrors(filePath)).toEqual({
        config: { changelog: 'docs/CHANGELOG.md' },
        errors: null,
        filePath,
      });
    });

    it('should treat an empty file as defaults', () => {
      const filePath = writeConfig('');

      expect(loadConfigWithErrors(filePath).config).toEqual({});
    });

    it('should ignore a $schema property', () => {
      const filePath = writeConfig('$schema: ./schema.json\nchangelog: HISTORY.md\n');

      expect(loadConfigWithErrors(filePath).config).toEqual({ changelog: 'HISTORY.md' });
    });

    it('should reject unknown keys', () => {
      const filePath = writeConfig('changelogs: CHANGELOG.md\n');

      const result = loadConfigWithErrors(filePath);

      expect(result.config).toBeNull();
      expect(result.errors).toEqual(["Unrecognized key(s) in object: 'changelogs'"]);
    });

    it('should reject an empty changelog path', () => {
      const filePath = writeConfig('changelog: ""\n');

      expect(loadConfigWithErrors(filePath).errors).toEqual(['changelog: Changelog path cannot be empty']);
    });

    it('should reject a non-object document', () => {
      const filePath = writeConfig('- CHANGELOG.md\n');

      expect(loadConfigWithErrors(filePath).errors).toEqual(['Expected object, received array']);
    });

    it('should report YAML syntax errors', () => {
      const filePath = writeConfig('changelog: [unclosed\n');

      const errors = loadConfigWithErrors(filePath).errors;

      expect(errors).toHaveLength(1);
      expect(errors?.[0]).toMatch(/^YAML syntax error: /);
    });

    it('should only accept .yaml files', () => {
      const filePath = writeConfig('changelog: CHANGELOG.md\n', 'changelog-guard.json');

      expect(loadConfigWithErrors(filePath).errors?.[0]).toMatch(/^Unsupported config file format: /);
    });

    it('should report an unreadable file', () => {
      const filePath = join(dir, 'missing.yaml');

      const result = loadConfigWithErrors(filePath);

      expect(result.filePath).toBe(filePath);
      expect(result.errors?.[0]).toMatch(/^Cannot read config file: ENOENT/);
    });
  });
});
