/**
 * Environment configuration, validated with zod.
 *
 * `dotenv/config` is loaded by the CLI entry point, so values may come from
 * a `.env` file as well as the process environment.
 */

import { z } from 'zod';

import { ValidationError } from '../errors.js';
import type { AttackWorkbookConfig } from '../types/config.js';

export const DEFAULT_STIX_BASE_URL =
  'https://raw.githubusercontent.com/mitre-attack/attack-stix-data/master';

export const DEFAULT_FETCH_TIMEOUT_MS = 60_000;

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  ATTACK_STIX_BASE_URL: z.string().url().default(DEFAULT_STIX_BASE_URL),
  ATTACK_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
});

/**
 * Build the runtime configuration from an environment map.
 * Empty strings count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AttackWorkbookConfig {
  const cleaned: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid configuration: ${issues}`);
  }

  return {
    logging: { level: result.data.LOG_LEVEL },
    source: {
      stixBaseUrl: result.data.ATTACK_STIX_BASE_URL.replace(/\/+$/, ''),
      fetchTimeoutMs: result.data.ATTACK_FETCH_TIMEOUT_MS,
    },
  };
}
