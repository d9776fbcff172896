import { describe, it, expect } from 'vitest';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../../src/app.module';
import { EXPORT_API_PORT } from '../../src/application/ports/output/injection-tokens';
import { RunBackupUseCase } from '../../src/application/use-cases/run-backup.use-case';
import { NvrExportApiAdapter } from '../../src/infrastructure/adapters/export-api/nvr-export-api.adapter';
import { PinoLoggerService } from '../../src/shared/logging/pino-logger.service';
import { createTestConfig } from './helpers/mock-factories';

describe('AppModule', () => {
  it('should wire the use cases to their adapters', async () => {
    const app = await NestFactory.createApplicationContext(AppModule.forRoot(createTestConfig()), {
      logger: false,
    });

    try {
      expect(app.get(RunBackupUseCase)).toBeInstanceOf(RunBackupUseCase);
      expect(app.get(EXPORT_API_PORT)).toBeInstanceOf(NvrExportApiAdapter);
      expect(app.get(PinoLoggerService)).toBeInstanceOf(PinoLoggerService);
    } finally {
      await app.close();
    }
  });
});
