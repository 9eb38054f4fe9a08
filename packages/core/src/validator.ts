/**
 * Changelog Validator
 *
 * Checks the title, the presence of release headings, and then each heading
 * in document order. The first failure wins; later headings are not checked.
 *
 * @packageDocumentation
 */

import {
  type ChangelogError,
  DuplicateVersionError,
  FormatError,
  InvalidDateError,
  OrderingError,
} from './errors.js';
import {
  compareVersions,
  extractHeadings,
  isIsoCalendarDate,
  parseVersion,
  type ReleaseHeading,
  type VersionTriple,
} from './headings.js';

export const CHANGELOG_TITLE = '# Changelog';
export const DEFAULT_CHANGELOG_FILE_NAME = 'CHANGELOG.md';

export interface ValidateChangelogOptions {
  /** File name used in the title diagnostic (default: CHANGELOG.md) */
  fileName?: string;
}

export type ChangelogValidationResult =
  | {
      valid: true;
      /** Version of the topmost heading, which is also the highest */
      latestVersion: string;
      headings: ReleaseHeading[];
    }
  | {
      valid: false;
      error: ChangelogError;
    };

/**
 * Validate changelog text
 *
 * @param content - Raw changelog text
 * @param options - Diagnostic options
 * @returns Latest version on success, the first failure otherwise
 *
 * @example
 * ```typescript
 * const result = validateChangelog(readFileSync('CHANGELOG.md', 'utf-8'));
 * if (result.valid) {
 *   console.log(result.latestVersion);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function validateChangelog(
  content: string,
  options: ValidateChangelogOptions = {}
): ChangelogValidationResult {
  const fileName = options.fileName ?? DEFAULT_CHANGELOG_FILE_NAME;

  if (!content.startsWith(CHANGELOG_TITLE)) {
    return fail(new FormatError(`${fileName} must start with '${CHANGELOG_TITLE}'.`));
  }

  const headings = [...extractHeadings(content)];
  if (headings.length === 0) {
    return fail(new FormatError("No release headings found. Expected: '## X.Y.Z - YYYY-MM-DD'."));
  }

  const seen = new Set<string>();
  let previous: { version: string; parsed: VersionTriple } | null = null;

  for (const { version, date } of headings) {
    if (seen.has(version)) {
      return fail(new DuplicateVersionError(version));
    }
    seen.add(version);

    if (!isIsoCalendarDate(date)) {
      return fail(new InvalidDateError(version, date));
    }

    const parsed = parseVersion(version);

    // Only the immediate predecessor is compared
    if (previous && compareVersions(parsed, previous.parsed) >= 0) {
      return fail(new OrderingError(version, previous.version));
    }
    previous = { version, parsed };
  }

  return { valid: true, latestVersion: headings[0].version, headings };
}

function fail(error: ChangelogError): ChangelogValidationResult {
  return { valid: false, error };
}
