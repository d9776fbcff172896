import { OrchestrationCounts } from './orchestrate-exports.port';
import { SweepReport } from './sweep-retention.port';
import { RelocationStatus } from './relocate-artifact.port';

export interface RunBackupCommand {
  /** Empty or absent means every camera the NVR knows about */
  cameras?: string[];
  /** YYYY-MM-DD; defaults to `exportDaysAgo` days before today */
  date?: string;
  startHour?: number;
  endHour?: number;
  splitInterval?: number;
  signal?: AbortSignal;
}

export type RunFailureStage = 'export' | 'relocation' | 'record-cleanup' | 'retention';

export interface RunFailure {
  stage: RunFailureStage;
  subject: string;
  reason: string;
}

export interface RelocatedBackup {
  camera: string;
  window: string;
  destPath: string;
  sizeBytes: number;
  status: RelocationStatus;
}

export interface RunBackupResult {
  date: string;
  cameras: string[];
  windows: string[];
  counts: OrchestrationCounts;
  relocated: RelocatedBackup[];
  sweep: SweepReport;
  failures: RunFailure[];
  durationMs: number;
  /** 0 on full success, 1 when anything did not succeed */
  exitCode: 0 | 1;
}

/**
 * Run Backup Port (Driving Port / Use Case Interface)
 * One complete run: plan, export, relocate, clean up
 */
export interface RunBackupPort {
  execute(command: RunBackupCommand): Promise<RunBackupResult>;
}
