import { TimeWindowVO } from '../value-objects/time-window.vo';

/**
 * Backup File - a relocated export under its deterministic name.
 * Derived from filesystem state; never persisted on its own.
 */
export interface BackupFile {
  readonly sourcePath: string;
  readonly destPath: string;
  readonly camera: string;
  readonly window: TimeWindowVO;
  readonly sizeBytes: number;
  readonly createdAt: Date;
}
