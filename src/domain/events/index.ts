/**
 * Domain Events Barrel Export
 */
export { DomainEvent, type EventSeverity } from './base.event';
export { ExportSubmittedEvent, type ExportSubmittedEventPayload } from './export-submitted.event';
export { ExportProgressEvent, type ExportProgressEventPayload } from './export-progress.event';
export { ExportCompletedEvent, type ExportCompletedEventPayload } from './export-completed.event';
export { ExportFailedEvent, type ExportFailedEventPayload } from './export-failed.event';
export {
  ExportTimedOutEvent,
  type ExportTimedOutEventPayload,
  type TimeoutCause,
} from './export-timed-out.event';
export { BackupRelocatedEvent, type BackupRelocatedEventPayload } from './backup-relocated.event';
export {
  ExportRecordDeletedEvent,
  type ExportRecordDeletedEventPayload,
} from './export-record-deleted.event';
export { BackupPrunedEvent, type BackupPrunedEventPayload } from './backup-pruned.event';
