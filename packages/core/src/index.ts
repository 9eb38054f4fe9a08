/**
 * @changelog-guard/core
 *
 * Validation and parsing for changelogs of the form:
 *
 * ```markdown
 * # Changelog
 *
 * ## 2.0.0 - 2024-06-01
 * Breaking change.
 *
 * ## 1.0.0 - 2024-01-01
 * Initial release.
 * ```
 *
 * Versions must be unique and strictly descending, dates real calendar days.
 *
 * ## Example Usage
 *
 * ```typescript
 * import { validateChangelog, extractReleaseNotes } from '@changelog-guard/core';
 *
 * const result = validateChangelog(content);
 * if (result.valid) {
 *   const notes = extractReleaseNotes(content, result.latestVersion);
 * }
 * ```
 *
 * @packageDocumentation
 */

export {
  HEADING_PATTERN,
  LINE_START,
  LINE_END,
  extractHeadings,
  parseVersion,
  compareVersions,
  isIsoCalendarDate,
  type ReleaseHeading,
  type VersionTriple,
} from './headings.js';

export {
  CHANGELOG_TITLE,
  DEFAULT_CHANGELOG_FILE_NAME,
  validateChangelog,
  type ChangelogValidationResult,
  type ValidateChangelogOptions,
} from './validator.js';

export { extractReleaseNotes } from './release-notes.js';

export {
  ChangelogError,
  FormatError,
  DuplicateVersionError,
  InvalidDateError,
  OrderingError,
  NotFoundError,
  UsageError,
  isChangelogError,
  type ChangelogErrorCode,
} from './errors.js';
