/**
 * Structured logging for changelog-guard
 *
 * Debug and warning lines are only output when CHANGELOG_GUARD_DEBUG=1.
 * Errors always go to stderr.
 */

export type LogCategory =
  | 'changelog'
  | 'config'
  | 'notes';

export const DEBUG_ENV_VAR = 'CHANGELOG_GUARD_DEBUG';

function isDebugEnabled(): boolean {
  return process.env[DEBUG_ENV_VAR] === '1';
}

function writeError(error: Error): void {
  console.error(`Error: ${error.message}`);
  if (error.stack) {
    console.error(error.stack);
  }
}

/**
 * Log a debug message
 * Only outputs when CHANGELOG_GUARD_DEBUG=1
 *
 * @example
 * ```typescript
 * logDebug('changelog', 'Resolved changelog path', { changelogPath });
 * ```
 */
export function logDebug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
  if (!isDebugEnabled()) {
    return;
  }
  console.error(`[${new Date().toISOString()}] [DEBUG] [${category}] ${message}`);
  if (metadata) {
    console.error(JSON.stringify(metadata, null, 2));
  }
}

/**
 * Log a warning (non-critical problem)
 * Only outputs when CHANGELOG_GUARD_DEBUG=1
 */
export function logWarning(category: LogCategory, message: string, error?: Error): void {
  if (!isDebugEnabled()) {
    return;
  }
  console.error(`[${new Date().toISOString()}] [WARN] [${category}] ${message}`);
  if (error) {
    writeError(error);
  }
}

/**
 * Log an error (critical failure)
 * Always outputs, even without CHANGELOG_GUARD_DEBUG
 *
 * @example
 * ```typescript
 * logError('notes', `Failed to write ${outputPath}`, error);
 * ```
 */
export function logError(category: LogCategory, message: string, error?: Error): void {
  console.error(`[${new Date().toISOString()}] [ERROR] [${category}] ${message}`);
  if (error) {
    writeError(error);
  }
}

/**
 * Normalize a caught value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
