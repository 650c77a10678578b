/**
 * Zod schema for deployment configuration validation
 */

import { posix } from 'node:path';
import { z } from 'zod';
import type { DeployConfig } from '../../types/config.js';
import { DeployError } from '../utils/errors.js';

/**
 * Main configuration schema
 */
export const configSchema: z.ZodType<DeployConfig> = z.object({
  host: z
    .string()
    .min(1, 'Host is required')
    .regex(/^[^\s-]\S*$/, 'Host must not contain whitespace or start with "-"'),
  remotePath: z
    .string()
    .min(1, 'Remote path is required')
    .refine((value) => value.startsWith('/'), 'Remote path must be absolute')
    .transform((value) => posix.normalize(value).replace(/\/+$/, ''))
    .refine((value) => value !== '', 'Remote path cannot be the root directory'),
  sourceDir: z.string().min(1, 'Source directory is required'),
  skipBackup: z.boolean(),
});

/**
 * Format zod issues as `field: message` lines
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.') || 'config'}: ${issue.message}`)
    .join('\n');
}

/**
 * Validate config and return a frozen, typed result
 */
export function validateConfig(config: unknown): Readonly<DeployConfig> {
  const result = configSchema.safeParse(config);

  if (!result.success) {
    throw new DeployError('input', `Invalid configuration:\n${formatIssues(result.error)}`);
  }

  return Object.freeze(result.data);
}
