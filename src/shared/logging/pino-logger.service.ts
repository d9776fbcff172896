import { Inject, Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { Logger } from 'pino';
import { AppConfig } from '../../config/configuration';

/**
 * Backs Nest's `Logger` once the bootstrap calls `app.useLogger()`.
 * Human-readable output through pino-pretty unless `logFormat` is json.
 */
@Injectable()
export class PinoLoggerService implements LoggerService {
  private readonly logger: Logger;

  constructor(@Inject(ConfigService) configService: ConfigService<AppConfig, true>) {
    const logLevel = configService.get('logLevel', { infer: true });
    const logFormat = configService.get('logFormat', { infer: true });
    const nodeEnv = configService.get('nodeEnv', { infer: true });

    this.logger = pino({
      level: logLevel,
      ...(logFormat === 'pretty' && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname,service,env',
          },
        },
      }),
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: 'nvr-export-backup',
        env: nodeEnv,
      },
    });
  }

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write('warn', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write('trace', message, optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.write('fatal', message, optionalParams);
  }

  /**
   * Nest passes `(message, context)` or, for errors, `(message, stack, context)`.
   */
  private write(level: pino.Level, message: unknown, optionalParams: unknown[]): void {
    const strings = optionalParams.filter((param): param is string => typeof param === 'string');
    const context = strings.length > 0 ? strings[strings.length - 1] : undefined;
    const stack = strings.length > 1 ? strings[0] : undefined;

    if (message instanceof Error) {
      this.logger[level]({ context, err: message }, message.message);
    } else if (typeof message === 'object' && message !== null) {
      this.logger[level]({ context, ...message }, '');
    } else {
      this.logger[level]({ context, ...(stack !== undefined && { stack }) }, String(message));
    }
  }
}
