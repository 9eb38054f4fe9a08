/**
 * Changelog Errors
 *
 * Every failure the validator, the release-notes extractor or the command
 * dispatcher can report. The `message` of each error is the one-line
 * diagnostic printed to stderr.
 *
 * @packageDocumentation
 */

export type ChangelogErrorCode =
  | 'FORMAT'
  | 'DUPLICATE_VERSION'
  | 'INVALID_DATE'
  | 'ORDERING'
  | 'NOT_FOUND'
  | 'USAGE';

export abstract class ChangelogError extends Error {
  public abstract readonly code: ChangelogErrorCode;
}

/**
 * Missing `# Changelog` title, no release headings, or an unusable version
 */
export class FormatError extends ChangelogError {
  public readonly code = 'FORMAT';

  constructor(message: string) {
    super(message);
    this.name = 'FormatError';
  }
}

export class DuplicateVersionError extends ChangelogError {
  public readonly code = 'DUPLICATE_VERSION';
  public readonly version: string;

  constructor(version: string) {
    super(`Duplicate changelog version heading found: ${version}`);
    this.name = 'DuplicateVersionError';
    this.version = version;
  }
}

export class InvalidDateError extends ChangelogError {
  public readonly code = 'INVALID_DATE';
  public readonly version: string;
  public readonly date: string;

  constructor(version: string, date: string) {
    super(`Invalid changelog date for ${version}: ${date}`);
    this.name = 'InvalidDateError';
    this.version = version;
    this.date = date;
  }
}

/**
 * A heading whose version is not strictly below the heading above it
 */
export class OrderingError extends ChangelogError {
  public readonly code = 'ORDERING';
  public readonly version: string;
  public readonly previousVersion: string;

  constructor(version: string, previousVersion: string) {
    super('Changelog versions must be strictly descending (newest first).');
    this.name = 'OrderingError';
    this.version = version;
    this.previousVersion = previousVersion;
  }
}

export class NotFoundError extends ChangelogError {
  public readonly code = 'NOT_FOUND';
  public readonly version: string;

  constructor(version: string) {
    super(`No changelog entry for ${version}`);
    this.name = 'NotFoundError';
    this.version = version;
  }
}

/**
 * A required companion option is missing
 */
export class UsageError extends ChangelogError {
  public readonly code = 'USAGE';

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function isChangelogError(value: unknown): value is ChangelogError {
  return value instanceof ChangelogError;
}
