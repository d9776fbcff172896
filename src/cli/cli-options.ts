import { readFileSync } from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import { z } from 'zod';
import type { RunBackupCommand } from '../application/ports/input/run-backup.port';
import { ConfigError } from '../domain/errors/config.error';

export type CliInvocation =
  | { kind: 'help' }
  | { kind: 'version' }
  | {
      kind: 'run';
      command: Omit<RunBackupCommand, 'signal'>;
      configPath?: string;
      logLevel?: string;
    };

export type RunInvocation = Extract<CliInvocation, { kind: 'run' }>;

export const USAGE = `Usage: nvr-export-backup [options]

Export recordings of one day from the NVR and move them into the backup directory.

Options:
  -c, --camera <name>        Camera to export; repeat or comma-separate (default: all cameras)
      --date <YYYY-MM-DD>    Day to export (default: exportDaysAgo days before today)
      --start-hour <0-23>    First hour of a single window (default: 0)
      --end-hour <1-24>      End hour of a single window, exclusive (default: 24)
      --split-interval <h>   Split the whole day into windows of this many hours
      --config <file>        YAML config file (default: ./config.yml or $CONFIG_FILE)
      --log-level <level>    debug | info | warn | error
  -h, --help                 Show this help
  -v, --version              Print the version
`;

const packageSchema = z.object({ version: z.string() });

const CLI_OPTIONS = {
  camera: { type: 'string', short: 'c', multiple: true },
  cameras: { type: 'string', multiple: true },
  date: { type: 'string' },
  'start-hour': { type: 'string' },
  'end-hour': { type: 'string' },
  'split-interval': { type: 'string' },
  config: { type: 'string' },
  'log-level': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
} as const;

export function parseCliArgs(argv: string[]): CliInvocation {
  const parsed = parseRaw(argv);
  const { values } = parsed;

  if (values.help) {
    return { kind: 'help' };
  }
  if (values.version) {
    return { kind: 'version' };
  }

  const cameras = [...(values.camera ?? []), ...(values.cameras ?? [])]
    .flatMap((entry) => entry.split(','))
    .map((camera) => camera.trim())
    .filter((camera) => camera.length > 0);

  return {
    kind: 'run',
    command: {
      cameras: cameras.length > 0 ? cameras : undefined,
      date: values.date,
      startHour: parseInteger('--start-hour', values['start-hour']),
      endHour: parseInteger('--end-hour', values['end-hour']),
      splitInterval: parseHours('--split-interval', values['split-interval']),
    },
    configPath: values.config,
    logLevel: values['log-level'],
  };
}

function parseRaw(argv: string[]) {
  try {
    return parseArgs({ args: argv, strict: true, allowPositionals: false, options: CLI_OPTIONS });
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
}

export function readVersion(): string {
  const manifest = path.join(__dirname, '..', '..', 'package.json');
  return packageSchema.parse(JSON.parse(readFileSync(manifest, 'utf8'))).version;
}

function parseInteger(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${flag} expects a whole number of hours, got "${raw}"`);
  }
  return Number(raw);
}

function parseHours(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (raw.trim().length === 0 || !Number.isFinite(value)) {
    throw new ConfigError(`${flag} expects a number of hours, got "${raw}"`);
  }
  return value;
}
