/**
 * @eventframe/core - Configuration
 *
 * Runtime settings read from environment variables and validated with zod.
 */

import { z } from 'zod';
import { ValidationError } from '../../domain/exceptions/exceptions';

// ============================================================================
// Schema
// ============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_FORMAT: z.enum(['json', 'text']).default('json'),
  SERVICE_NAME: z.string().min(1).default('eventframe'),

  // Query cache
  CACHE_CAPACITY: z.coerce.number().int().min(1).default(1000),
  CACHE_TTL_MS: z.coerce.number().int().min(0).default(60000),

  // Metrics
  METRICS_MAX_SAMPLES: z.coerce.number().int().min(1).default(1000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// ============================================================================
// Loader
// ============================================================================

/**
 * Load and validate configuration.
 *
 * @throws ValidationError naming the first invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const logger = createPinoLogger(config);
 * const cache = new CacheManager({ capacity: config.CACHE_CAPACITY, defaultTtl: config.CACHE_TTL_MS });
 * ```
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : '';
    throw new ValidationError(
      field,
      issue ? issue.message : 'invalid configuration',
      field ? env[field] : undefined,
    );
  }
  return result.data;
}
