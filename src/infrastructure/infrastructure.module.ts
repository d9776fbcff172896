import { Module } from '@nestjs/common';
import { HttpModule } from '../shared/http/http.module';
import {
  BACKUP_STORAGE_PORT,
  CLOCK_PORT,
  EVENT_PUBLISHER_PORT,
  EXPORT_API_PORT,
} from '../application/ports/output/injection-tokens';

// Adapters (implementations)
import { NvrExportApiAdapter } from './adapters/export-api/nvr-export-api.adapter';
import { LocalBackupStorageAdapter } from './adapters/storage/local-backup-storage.adapter';
import { SystemClockAdapter } from './adapters/clock/system-clock.adapter';
import { LoggingEventPublisherAdapter } from './adapters/events/logging-event-publisher.adapter';

export { BACKUP_STORAGE_PORT, CLOCK_PORT, EVENT_PUBLISHER_PORT, EXPORT_API_PORT };

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * This module:
 * 1. Imports shared infrastructure modules (HTTP client)
 * 2. Binds each port token to its adapter
 * 3. Exports the tokens so they can be injected into use cases
 */
@Module({
  imports: [HttpModule],
  providers: [
    // NVR API adapter
    {
      provide: EXPORT_API_PORT,
      useClass: NvrExportApiAdapter,
    },

    // Storage adapter
    {
      provide: BACKUP_STORAGE_PORT,
      useClass: LocalBackupStorageAdapter,
    },

    // Clock adapter
    {
      provide: CLOCK_PORT,
      useClass: SystemClockAdapter,
    },

    // Event publisher adapter
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: LoggingEventPublisherAdapter,
    },
  ],
  exports: [EXPORT_API_PORT, BACKUP_STORAGE_PORT, CLOCK_PORT, EVENT_PUBLISHER_PORT],
})
export class InfrastructureModule {}
