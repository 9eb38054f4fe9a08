/**
 * Global Vitest Setup
 *
 * Runs once at test suite startup. Clears CHANGELOG_GUARD_* variables
 * inherited from the parent shell (e.g. CHANGELOG_GUARD_DEBUG=1) so debug
 * output does not leak into assertions on stderr.
 */

for (const key of Object.keys(process.env)) {
  if (key.startsWith('CHANGELOG_GUARD_')) {
    delete process.env[key];
  }
}
