/**
 * Release Heading Extraction
 *
 * Finds every `## X.Y.Z - YYYY-MM-DD` line in a changelog, in document order.
 *
 * @packageDocumentation
 */

/**
 * Line anchors for patterns compiled without the `m` flag
 *
 * Only `\n` ends a line. A bare `\r`, U+2028 or U+2029 does not.
 */
export const LINE_START = String.raw`(?:^|(?<=\n))`;
export const LINE_END = String.raw`(?=\n|$)`;

/**
 * Source of the release heading pattern (compile with `g` only)
 *
 * Group 1 is the version, group 2 the date.
 */
export const HEADING_PATTERN = String.raw`${LINE_START}##\s+(\d+\.\d+\.\d+)\s+-\s+(\d{4}-\d{2}-\d{2})\s*${LINE_END}`;

export interface ReleaseHeading {
  /** Version exactly as written, e.g. "1.4.0" */
  version: string;
  /** Date exactly as written, e.g. "2024-06-01" */
  date: string;
  /** Offset of the first character of the heading match */
  start: number;
  /** Offset just past the heading match */
  end: number;
}

/**
 * Extract release headings from changelog text
 *
 * The returned iterable is lazy and restartable: each iteration scans the
 * text again from the top.
 *
 * @param content - Raw changelog text
 * @returns Release headings, top to bottom
 *
 * @example
 * ```typescript
 * const versions = [...extractHeadings(content)].map(h => h.version);
 * ```
 */
export function extractHeadings(content: string): Iterable<ReleaseHeading> {
  return {
    *[Symbol.iterator]() {
      for (const match of content.matchAll(new RegExp(HEADING_PATTERN, 'g'))) {
        const start = match.index ?? 0;
        yield {
          version: match[1],
          date: match[2],
          start,
          end: start + match[0].length,
        };
      }
    },
  };
}

export type VersionTriple = readonly [major: bigint, minor: bigint, patch: bigint];

/**
 * Parse a heading version into numeric parts
 *
 * Parts have no size limit and leading zeros are ignored ("01.2.3" is 1.2.3).
 *
 * @throws Error if the version is not three dot-separated digit runs
 */
export function parseVersion(version: string): VersionTriple {
  const match = /^(\d+)\.(\d+)\.(\d+)$/.exec(version);
  if (!match) {
    throw new Error(`Not an X.Y.Z version: ${version}`);
  }
  return [BigInt(match[1]), BigInt(match[2]), BigInt(match[3])];
}

/**
 * Compare two version triples part by part
 *
 * @returns Negative, zero or positive, like a sort comparator
 */
export function compareVersions(a: VersionTriple, b: VersionTriple): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  return 0;
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Check that a `YYYY-MM-DD` string names a real calendar day (year 1 or later)
 */
export function isIsoCalendarDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return false;
  }

  const maxDay = month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
  return day <= maxDay;
}
