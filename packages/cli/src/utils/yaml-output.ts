/**
 * YAML Output
 *
 * Writes a structured report to stdout as a single YAML document framed by
 * `---` separators, so callers can pipe it straight into yq.
 */

import { stringify as stringifyYaml } from 'yaml';

const SEPARATOR = '---\n';

/**
 * Output a result as YAML to stdout and wait for stdout to drain
 *
 * @example
 * ```typescript
 * await outputYamlResult({ valid: true, latestVersion: '1.4.0' });
 * // ---
 * // valid: true
 * // latestVersion: 1.4.0
 * // ---
 * ```
 */
export async function outputYamlResult(result: unknown): Promise<void> {
  // Let pending stderr diagnostics land before the document starts
  await new Promise(resolve => setTimeout(resolve, 10));

  const yaml = stringifyYaml(result);
  process.stdout.write(SEPARATOR);
  process.stdout.write(yaml.endsWith('\n') ? yaml : `${yaml}\n`);
  process.stdout.write(SEPARATOR);

  await new Promise<void>(resolve => {
    if (process.stdout.write('')) {
      resolve();
    } else {
      process.stdout.once('drain', resolve);
    }
  });
}
