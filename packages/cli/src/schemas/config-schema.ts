/**
 * Configuration Schema
 *
 * Shape of changelog-guard.config.yaml, validated with Zod.
 */

import { z } from 'zod';

export const CONFIG_FILE_NAME = 'changelog-guard.config.yaml';

export const ChangelogGuardConfigSchema = z.object({
  /** Path to the changelog, relative to the config file's directory */
  changelog: z.string().min(1, 'Changelog path cannot be empty').optional(),
}).strict();

export type ChangelogGuardConfig = z.infer<typeof ChangelogGuardConfigSchema>;

export type ConfigValidation =
  | { success: true; data: ChangelogGuardConfig }
  | { success: false; errors: string[] };

/**
 * Validate raw configuration data
 *
 * Error messages carry the full path (e.g., "changelog: Expected string, received number").
 */
export function safeValidateConfig(data: unknown): ConfigValidation {
  const result = ChangelogGuardConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    }),
  };
}
