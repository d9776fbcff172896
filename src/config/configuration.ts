/**
 * Application Configuration
 *
 * Loads and validates every setting, providing type-safe access to
 * configuration values throughout the application.
 *
 * ## Configuration Sources (later wins):
 * 1. YAML config file (`./config.yml`, `--config` or `CONFIG_FILE`)
 * 2. Environment variables
 * 3. Command line overrides (e.g. `--log-level`)
 *
 * All of them are validated together by the Zod schema in
 * `validation.schema.ts` and transformed into a typed AppConfig.
 *
 * ## Usage:
 * ```typescript
 * constructor(@Inject(ConfigService) private configService: ConfigService<AppConfig, true>) {}
 *
 * const pollInterval = this.configService.get('orchestrator.pollIntervalMs', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { loadConfigFile } from './config-file.loader';
import { validateEnv } from './validation.schema';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json';

export interface AppConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  /** Base URL of the NVR, e.g. http://nvr.local:5000 */
  apiUrl: string;
  /** Directory where the NVR writes finished exports */
  sourcePath: string;
  /** Backup directory */
  destPath: string;
  exportRetentionDays: number;
  exportDaysAgo: number;
  timezone: string;
  exportApi: {
    timeoutMs: number;
    maxRetries: number;
  };
  /**
   * Export orchestration.
   *
   * ### pollIntervalMs (ORCHESTRATOR_POLL_INTERVAL_MS)
   * Minimum gap between the end of one status poll of a job and the start of
   * the next. Exports of a few hours take minutes on the NVR, so 30s is plenty.
   *
   * ### maxWaitMs (ORCHESTRATOR_MAX_WAIT_MS)
   * Per-job budget measured from submission; past it the job is TIMED_OUT.
   *
   * ### maxConcurrentPolls (ORCHESTRATOR_MAX_CONCURRENT_POLLS)
   * Upper bound on status requests in flight at once.
   *
   * ### maxConsecutivePollErrors (ORCHESTRATOR_MAX_CONSECUTIVE_POLL_ERRORS)
   * A job whose status cannot be read this many times in a row is FAILED.
   *
   * ### requireStableSize (ORCHESTRATOR_REQUIRE_STABLE_SIZE)
   * Only accept a completed export once its file size stopped changing
   * between two polls.
   *
   * ### runDeadlineMs (ORCHESTRATOR_RUN_DEADLINE_MS)
   * Optional budget for the whole orchestration phase.
   */
  orchestrator: {
    pollIntervalMs: number;
    maxWaitMs: number;
    maxConcurrentPolls: number;
    maxConsecutivePollErrors: number;
    requireStableSize: boolean;
    runDeadlineMs?: number;
  };
}

export interface ConfigLoadOptions {
  /** Explicit config file; missing file is then an error */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Environment-style keys that win over file and environment */
  overrides?: Record<string, unknown>;
}

export function loadConfiguration(options: ConfigLoadOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const fileValues = loadConfigFile(options.configPath ?? nonEmpty(env.CONFIG_FILE));

  const envValues: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      envValues[key] = value;
    }
  }

  const overrides: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(options.overrides ?? {})) {
    if (value !== undefined) {
      overrides[key] = value;
    }
  }

  const validated = validateEnv({ ...fileValues, ...envValues, ...overrides });

  return {
    nodeEnv: validated.NODE_ENV,
    logLevel: validated.LOG_LEVEL,
    logFormat: validated.LOG_FORMAT,
    apiUrl: validated.EXPORT_API_URL.replace(/\/+$/, ''),
    sourcePath: validated.SOURCE_PATH,
    destPath: validated.DEST_PATH,
    exportRetentionDays: validated.EXPORT_RETENTION_DAYS,
    exportDaysAgo: validated.EXPORT_DAYS_AGO,
    timezone: validated.TIMEZONE,
    exportApi: {
      timeoutMs: validated.EXPORT_API_TIMEOUT_MS,
      maxRetries: validated.EXPORT_API_MAX_RETRIES,
    },
    orchestrator: {
      pollIntervalMs: validated.ORCHESTRATOR_POLL_INTERVAL_MS,
      maxWaitMs: validated.ORCHESTRATOR_MAX_WAIT_MS,
      maxConcurrentPolls: validated.ORCHESTRATOR_MAX_CONCURRENT_POLLS,
      maxConsecutivePollErrors: validated.ORCHESTRATOR_MAX_CONSECUTIVE_POLL_ERRORS,
      requireStableSize: validated.ORCHESTRATOR_REQUIRE_STABLE_SIZE,
      runDeadlineMs: validated.ORCHESTRATOR_RUN_DEADLINE_MS,
    },
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}
