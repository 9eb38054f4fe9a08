/**
 * Configuration error reporting
 *
 * Formats changelog-guard.config.yaml problems for stderr.
 */

import chalk from 'chalk';

export interface ConfigErrorDetails {
  fileName: string;
  errors: string[];
}

const MAX_LISTED_ERRORS = 5;

/**
 * Format configuration errors, listing at most five of them
 *
 * @returns One string per output line
 */
export function formatConfigErrors(details: ConfigErrorDetails): string[] {
  const listed = details.errors.slice(0, MAX_LISTED_ERRORS).map(err => chalk.gray(`  • ${err}`));
  const hidden = details.errors.length - listed.length;

  return [
    chalk.red(`❌ Configuration is invalid: ${details.fileName}`),
    chalk.yellow('Validation errors:'),
    ...listed,
    ...(hidden > 0 ? [chalk.gray(`  ... and ${hidden} more`)] : []),
    chalk.blue('💡 Suggestions:'),
    chalk.gray('  • Check YAML syntax (indentation, colons, quotes)'),
    chalk.gray('  • The only supported key is `changelog`, a path relative to the config file'),
    chalk.gray('  • Or bypass the config file with --changelog <path>'),
  ];
}

export function displayConfigErrors(details: ConfigErrorDetails): void {
  for (const line of formatConfigErrors(details)) {
    console.error(line);
  }
}
