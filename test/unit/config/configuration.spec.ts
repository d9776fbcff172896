import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { loadConfiguration } from '../../../src/config/configuration';
import { flattenConfig, toEnvKey } from '../../../src/config/config-file.loader';
import { ConfigError } from '../../../src/domain/errors/config.error';

describe('Configuration', () => {
  let dir: string;

  const requiredEnv = {
    EXPORT_API_URL: 'http://nvr.local:5000/',
    SOURCE_PATH: '/nvr/exports',
    DEST_PATH: '/backup',
    EXPORT_RETENTION_DAYS: '7',
  };

  const yaml = async (content: string) => {
    const file = path.join(dir, 'config.yml');
    await writeFile(file, content);
    return file;
  };

  const FILE_CONFIG = [
    'export_api:',
    '  url: http://nvr.local:5000',
    '  timeout_ms: 5000',
    'source_path: /nvr/exports',
    'dest_path: /backup',
    'export_retention_days: 14',
    'timezone: Europe/Berlin',
    'orchestrator:',
    '  pollIntervalMs: 10000',
    '  require_stable_size: false',
    '',
  ].join('\n');

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'nvr-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('loadConfiguration', () => {
    it('should apply defaults around the required settings', () => {
      const config = loadConfiguration({ configPath: undefined, env: requiredEnv });

      expect(config).toEqual({
        nodeEnv: 'production',
        logLevel: 'info',
        logFormat: 'pretty',
        apiUrl: 'http://nvr.local:5000',
        sourcePath: '/nvr/exports',
        destPath: '/backup',
        exportRetentionDays: 7,
        exportDaysAgo: 1,
        timezone: 'Asia/Shanghai',
        exportApi: { timeoutMs: 30000, maxRetries: 3 },
        orchestrator: {
          pollIntervalMs: 30000,
          maxWaitMs: 7200000,
          maxConcurrentPolls: 4,
          maxConsecutivePollErrors: 5,
          requireStableSize: true,
          runDeadlineMs: undefined,
        },
      });
    });

    it('should read nested YAML keys in either case style', async () => {
      const configPath = await yaml(FILE_CONFIG);

      const config = loadConfiguration({ configPath, env: {} });

      expect(config.apiUrl).toBe('http://nvr.local:5000');
      expect(config.exportApi.timeoutMs).toBe(5000);
      expect(config.exportRetentionDays).toBe(14);
      expect(config.timezone).toBe('Europe/Berlin');
      expect(config.orchestrator.pollIntervalMs).toBe(10000);
      expect(config.orchestrator.requireStableSize).toBe(false);
    });

    it('should find the file through CONFIG_FILE', async () => {
      const configPath = await yaml(FILE_CONFIG);

      const config = loadConfiguration({ env: { CONFIG_FILE: configPath } });

      expect(config.exportRetentionDays).toBe(14);
    });

    it('should let the environment win over the file, ignoring empty values', async () => {
      const configPath = await yaml(FILE_CONFIG);

      const config = loadConfiguration({
        configPath,
        env: { EXPORT_RETENTION_DAYS: '30', ORCHESTRATOR_REQUIRE_STABLE_SIZE: 'yes', TIMEZONE: '' },
      });

      expect(config.exportRetentionDays).toBe(30);
      expect(config.orchestrator.requireStableSize).toBe(true);
      expect(config.timezone).toBe('Europe/Berlin');
    });

    it('should let command line overrides win over everything', () => {
      const config = loadConfiguration({
        env: { ...requiredEnv, LOG_LEVEL: 'warn', TIMEZONE: 'UTC' },
        overrides: { LOG_LEVEL: 'debug', TIMEZONE: undefined },
      });

      expect(config.logLevel).toBe('debug');
      expect(config.timezone).toBe('UTC');
    });

    it('should list every missing required setting', () => {
      const error = (() => {
        try {
          loadConfiguration({ env: {} });
        } catch (caught) {
          return caught;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.message.startsWith('Configuration validation failed:\n  - ')).toBe(true);
      expect(error.issues).toContain('EXPORT_API_URL: Required');
      expect(error.issues).toContain('SOURCE_PATH: Required');
      expect(error.issues).toContain('DEST_PATH: Required');
    });

    it('should reject invalid values', () => {
      expect(() =>
        loadConfiguration({ env: { ...requiredEnv, TIMEZONE: 'Nowhere/City' } }),
      ).toThrow('TIMEZONE: Unknown IANA timezone');
      expect(() =>
        loadConfiguration({ env: { ...requiredEnv, EXPORT_RETENTION_DAYS: '0' } }),
      ).toThrow(ConfigError);
      expect(() =>
        loadConfiguration({ env: { ...requiredEnv, ORCHESTRATOR_REQUIRE_STABLE_SIZE: 'maybe' } }),
      ).toThrow(ConfigError);
      expect(() =>
        loadConfiguration({ env: { ...requiredEnv, EXPORT_API_URL: 'not a url' } }),
      ).toThrow(ConfigError);
    });

    it('should fail on a missing explicit config file', () => {
      const missing = path.join(dir, 'missing.yml');

      expect(() => loadConfiguration({ configPath: missing, env: requiredEnv })).toThrow(
        `Config file not found: ${missing}`,
      );
    });

    it('should fail on invalid YAML', async () => {
      const configPath = await yaml('cameras: [front, garage\n');

      expect(() => loadConfiguration({ configPath, env: requiredEnv })).toThrow(
        `Config file ${configPath} is not valid YAML`,
      );
    });

    it('should fail on a file that is not a mapping', async () => {
      const configPath = await yaml('- front\n- garage\n');

      expect(() => loadConfiguration({ configPath, env: requiredEnv })).toThrow(
        `Config file ${configPath} must contain a mapping at the top level`,
      );
    });

    it('should accept an empty file', async () => {
      const configPath = await yaml('');

      expect(loadConfiguration({ configPath, env: requiredEnv }).destPath).toBe('/backup');
    });
  });

  describe('config file keys', () => {
    it('should map keys to environment names', () => {
      expect(toEnvKey('exportApi')).toBe('EXPORT_API');
      expect(toEnvKey('retention-days')).toBe('RETENTION_DAYS');
      expect(toEnvKey('_x_')).toBe('X');
    });

    it('should flatten nested mappings and keep lists as values', () => {
      expect(flattenConfig({ a: { b: { c: 1 } }, list: [1, 2] })).toEqual({ A_B_C: 1, LIST: [1, 2] });
    });
  });
});
