/**
 * Release Notes Extraction
 *
 * Pulls the body of one release out of a changelog for publishing (e.g. as
 * the text of a GitHub release).
 *
 * @packageDocumentation
 */

import { NotFoundError } from './errors.js';
import { HEADING_PATTERN, LINE_END, LINE_START } from './headings.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Extract the release notes for a version
 *
 * The body runs from the end of the version's heading line to the next
 * release heading (any version) or the end of the text, and is trimmed.
 * Does not validate the changelog; validate first.
 *
 * @param content - Raw changelog text
 * @param version - Version to extract (e.g. "1.2.0")
 * @returns Trimmed notes, or `Release v<version>` when the body is empty
 * @throws NotFoundError if no heading carries this version
 *
 * @example
 * ```typescript
 * writeFileSync('.release-notes.md', extractReleaseNotes(content, '1.2.0'), 'utf-8');
 * ```
 */
export function extractReleaseNotes(content: string, version: string): string {
  const versionHeading = new RegExp(
    String.raw`${LINE_START}##\s+${escapeRegExp(version)}\s+-\s+\d{4}-\d{2}-\d{2}\s*${LINE_END}`
  );
  const match = versionHeading.exec(content);
  if (!match) {
    throw new NotFoundError(version);
  }

  const start = match.index + match[0].length;

  const nextHeading = new RegExp(HEADING_PATTERN, 'g');
  nextHeading.lastIndex = start;
  const next = nextHeading.exec(content);
  const end = next ? next.index : content.length;

  const notes = content.slice(start, end).trim();
  return notes === '' ? `Release v${version}` : notes;
}
