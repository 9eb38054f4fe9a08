/**
 * Tests for logger utilities
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';

import { DEBUG_ENV_VAR, logDebug, logError, logWarning, toError } from '../../src/utils/logger.js';

describe('logger', () => {
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    delete process.env[DEBUG_ENV_VAR];
  });

  describe('without CHANGELOG_GUARD_DEBUG', () => {
    it('should not output debug messages', () => {
      logDebug('changelog', 'Resolved changelog path', { changelogPath: '/repo/CHANGELOG.md' });

      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it('should not output warnings', () => {
      logWarning('config', 'Could not read package.json', new Error('boom'));

      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it('should always output errors', () => {
      logError('notes', 'Failed to write release notes');

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        expect.stringMatching(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[ERROR\] \[notes\] Failed to write release notes$/)
      );
    });

    it('should output the error cause after the message', () => {
      logError('changelog', 'Failed to read CHANGELOG.md', new Error('ENOENT: no such file'));

      expect(consoleErrorSpy).toHaveBeenCalledWith('Error: ENOENT: no such file');
    });
  });

  describe('with CHANGELOG_GUARD_DEBUG=1', () => {
    beforeEach(() => {
      process.env[DEBUG_ENV_VAR] = '1';
    });

    it('should output debug messages with metadata', () => {
      logDebug('changelog', 'Resolved changelog path', { source: 'default' });

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        expect.stringContaining('[DEBUG] [changelog] Resolved changelog path')
      );
      expect(consoleErrorSpy).toHaveBeenCalledWith(JSON.stringify({ source: 'default' }, null, 2));
    });

    it('should output warnings', () => {
      logWarning('config', 'Could not read package.json');

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        expect.stringContaining('[WARN] [config] Could not read package.json')
      );
    });
  });

  describe('toError', () => {
    it('should pass errors through', () => {
      const error = new Error('kept');

      expect(toError(error)).toBe(error);
    });

    it('should wrap other values', () => {
      expect(toError('plain')).toEqual(new Error('plain'));
    });
  });
});
