// Injection tokens (string symbols for DI)
export const EXPORT_API_PORT = 'ExportApiPort';
export const BACKUP_STORAGE_PORT = 'BackupStoragePort';
export const CLOCK_PORT = 'ClockPort';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
