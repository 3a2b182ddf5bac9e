import { z } from 'zod';
import { AppError } from '../utils/AppError';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_DIR: z.string().min(1).default('logs'),
  MATCH_MAX_ALTERNATES: z.coerce.number().int().min(0).default(2),
  MATCH_LEGACY_BARE_UNITS: booleanString.default('true'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses an environment map into validated settings.
 * Throws an INVALID_INPUT AppError naming every offending variable.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw AppError.invalidInput(`Invalid environment configuration: ${problems.join('; ')}`);
  }
  return Object.freeze(result.data);
}

export const env: Env = loadEnv();

export default env;
