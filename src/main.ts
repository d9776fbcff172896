#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { RunBackupUseCase } from './application/use-cases/run-backup.use-case';
import { parseCliArgs, readVersion, type RunInvocation, USAGE } from './cli/cli-options';
import { formatRunSummary } from './cli/run-summary';
import { type AppConfig, loadConfiguration } from './config/configuration';
import { ApiError } from './domain/errors/api.error';
import { ConfigError } from './domain/errors/config.error';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

/** Exit code for bad parameters or an unreachable NVR */
const EXIT_FATAL = 2;

type Prepared = { exitCode: number } | { config: AppConfig; invocation: RunInvocation };

/**
 * Parse the command line and load configuration; nothing touches the NVR yet.
 */
function prepare(argv: string[]): Prepared {
  try {
    const invocation = parseCliArgs(argv);
    if (invocation.kind === 'help') {
      process.stdout.write(USAGE);
      return { exitCode: 0 };
    }
    if (invocation.kind === 'version') {
      process.stdout.write(`${readVersion()}\n`);
      return { exitCode: 0 };
    }

    const config = loadConfiguration({
      configPath: invocation.configPath,
      overrides: { LOG_LEVEL: invocation.logLevel },
    });
    return { config, invocation };
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return { exitCode: EXIT_FATAL };
    }
    throw error;
  }
}

/**
 * Bootstrap a NestJS application context, run one backup and report.
 * Resolves with the process exit code.
 */
async function bootstrap(argv: string[]): Promise<number> {
  const prepared = prepare(argv);
  if ('exitCode' in prepared) {
    return prepared.exitCode;
  }
  const { config, invocation } = prepared;

  const app = await NestFactory.createApplicationContext(AppModule.forRoot(config), {
    bufferLogs: true,
  });
  app.useLogger(app.get(PinoLoggerService));
  const logger = new Logger('Bootstrap');

  // First signal stops polling; unfinished exports are reported as timed out
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}, wrapping up the current run`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const result = await app
      .get(RunBackupUseCase)
      .execute({ ...invocation.command, signal: controller.signal });

    for (const line of formatRunSummary(result)) {
      if (result.exitCode === 0) {
        logger.log(line);
      } else {
        logger.warn(line);
      }
    }
    return result.exitCode;
  } catch (error) {
    if (error instanceof ConfigError || error instanceof ApiError) {
      logger.error(error.message);
      return EXIT_FATAL;
    }
    throw error;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await app.close();
  }
}

bootstrap(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error('Backup run crashed:', error);
    process.exitCode = 1;
  },
);
