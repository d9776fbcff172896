export interface RelocatedExport {
  /** Remote export id; records without one are never deleted */
  jobId?: string;
  camera: string;
  destPath: string;
}

export interface SweepRetentionCommand {
  destRoot: string;
  maxAgeDays: number;
  relocated: RelocatedExport[];
}

export type SweepFailureKind = 'record-missing-backup' | 'record-delete' | 'prune';

export interface SweepFailure {
  kind: SweepFailureKind;
  subject: string;
  reason: string;
}

export interface SweepReport {
  recordsDeleted: string[];
  recordsSkipped: string[];
  filesPruned: string[];
  failures: SweepFailure[];
}

/**
 * Sweep Retention Port (Driving Port / Use Case Interface)
 * Deletes NVR export records whose backup is confirmed on disk and prunes
 * backups older than the retention age
 */
export interface SweepRetentionPort {
  execute(command: SweepRetentionCommand): Promise<SweepReport>;
}
