import { Injectable, Logger } from '@nestjs/common';
import type { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import { DomainEvent } from '../../../domain/events/base.event';
import {
  BackupPrunedEvent,
  BackupRelocatedEvent,
  ExportCompletedEvent,
  ExportFailedEvent,
  ExportProgressEvent,
  ExportRecordDeletedEvent,
  ExportSubmittedEvent,
  ExportTimedOutEvent,
} from '../../../domain/events';
import { formatBytes, formatDuration } from '../../../shared/format/format';

/**
 * Logging Event Publisher Adapter
 * Implements EventPublisherPort by rendering every event as one log line
 */
@Injectable()
export class LoggingEventPublisherAdapter implements EventPublisherPort {
  private readonly logger = new Logger(LoggingEventPublisherAdapter.name);

  async publish(event: DomainEvent): Promise<void> {
    const line = `[${event.eventName}] ${describeEvent(event)}`;

    switch (event.severity) {
      case 'error':
        this.logger.error(line);
        break;
      case 'warn':
        this.logger.warn(line);
        break;
      default:
        this.logger.log(line);
    }
  }
}

export function describeEvent(event: DomainEvent): string {
  if (event instanceof ExportSubmittedEvent) {
    const { camera, window, jobId } = event.payload;
    return `${camera} ${window} submitted as ${jobId}`;
  }
  if (event instanceof ExportProgressEvent) {
    const { camera, name, sizeBytes, elapsedMs, reportedElapsedMs } = event.payload;
    const size = sizeBytes === undefined ? 'not on disk yet' : formatBytes(sizeBytes);
    const line = `${camera} ${name ?? event.payload.jobId} in progress, size ${size}, elapsed ${formatDuration(elapsedMs)}`;
    return reportedElapsedMs === undefined
      ? line
      : `${line} (NVR reports ${formatDuration(reportedElapsedMs)})`;
  }
  if (event instanceof ExportCompletedEvent) {
    const { camera, artifactPath, sizeBytes, elapsedMs } = event.payload;
    return `${camera} ${artifactPath} ready, size ${formatBytes(sizeBytes)}, elapsed ${formatDuration(elapsedMs)}`;
  }
  if (event instanceof ExportFailedEvent) {
    const { camera, window, stage, reason } = event.payload;
    return `${camera} ${window} failed during ${stage}: ${reason}`;
  }
  if (event instanceof ExportTimedOutEvent) {
    const { camera, window, cause, elapsedMs } = event.payload;
    return `${camera} ${window} timed out (${cause.replace('_', ' ')}) after ${formatDuration(elapsedMs)}`;
  }
  if (event instanceof BackupRelocatedEvent) {
    const { destPath, sizeBytes, status } = event.payload;
    return status === 'moved'
      ? `${destPath} stored, size ${formatBytes(sizeBytes)}`
      : `${destPath} already present, size ${formatBytes(sizeBytes)}`;
  }
  if (event instanceof ExportRecordDeletedEvent) {
    const { camera, jobId } = event.payload;
    return `${camera} export record ${jobId} removed from the NVR`;
  }
  if (event instanceof BackupPrunedEvent) {
    const { path, ageMs } = event.payload;
    return `${path} removed, age ${formatDuration(ageMs)}`;
  }
  return JSON.stringify(event.toJSON());
}
