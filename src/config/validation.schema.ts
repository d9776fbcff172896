import { z } from 'zod';
import { ConfigError } from '../domain/errors/config.error';

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no'])])
  .transform((value) => value === true || value === 'true' || value === '1' || value === 'yes');

const timezone = z.string().refine(
  (value) => {
    try {
      new Intl.DateTimeFormat('en-US', { timeZone: value });
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Unknown IANA timezone' },
);

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT: z.enum(['pretty', 'json']).default('pretty'),

  // NVR
  EXPORT_API_URL: z.string().url(),
  EXPORT_API_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  EXPORT_API_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),

  // Paths & retention
  SOURCE_PATH: z.string().min(1),
  DEST_PATH: z.string().min(1),
  EXPORT_RETENTION_DAYS: z.coerce.number().int().positive(),
  EXPORT_DAYS_AGO: z.coerce.number().int().min(0).default(1),
  TIMEZONE: timezone.default('Asia/Shanghai'),

  // Orchestrator
  ORCHESTRATOR_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(30000),
  ORCHESTRATOR_MAX_WAIT_MS: z.coerce.number().int().positive().default(7200000),
  ORCHESTRATOR_MAX_CONCURRENT_POLLS: z.coerce.number().int().min(1).max(64).default(4),
  ORCHESTRATOR_MAX_CONSECUTIVE_POLL_ERRORS: z.coerce.number().int().min(1).default(5),
  ORCHESTRATOR_REQUIRE_STABLE_SIZE: booleanFlag.default(true),
  ORCHESTRATOR_RUN_DEADLINE_MS: z.coerce.number().int().positive().optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(
      `Configuration validation failed:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`,
      issues,
    );
  }

  return result.data;
}
