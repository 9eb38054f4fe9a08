/**
 * Project root detection
 */

import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

/**
 * Find project root by walking up to a .git directory
 * Falls back to startDir if no git repo found
 *
 * @param startDir - Directory to start searching from
 * @returns Project root directory path
 */
export function findProjectRoot(startDir: string): string {
  const start = resolve(startDir);
  let current = start;

  while (true) {
    if (existsSync(join(current, '.git'))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) {
      // Reached filesystem root, no git found
      return start;
    }
    current = parent;
  }
}
