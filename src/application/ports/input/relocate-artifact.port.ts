import { BackupFile } from '../../../domain/entities/backup-file.entity';
import { TimeWindowVO } from '../../../domain/value-objects/time-window.vo';

export interface RelocateArtifactCommand {
  artifactPath: string;
  camera: string;
  window: TimeWindowVO;
}

export type RelocationStatus = 'moved' | 'already-present';

export interface RelocationResult {
  status: RelocationStatus;
  backupFile: BackupFile;
}

/**
 * Relocate Artifact Port (Driving Port / Use Case Interface)
 * Moves a finished export into the backup directory under its
 * deterministic name
 */
export interface RelocateArtifactPort {
  execute(command: RelocateArtifactCommand): Promise<RelocationResult>;
}
