import { ExportStatusVO } from '../../../domain/value-objects/export-status.vo';
import { TimeWindowVO } from '../../../domain/value-objects/time-window.vo';

/**
 * What the NVR reports for one export record
 */
export interface ExportStatusSnapshot {
  status: ExportStatusVO;
  /** Display name the NVR gave the export */
  name?: string;
  /** Path of the artifact as seen by the NVR; always set once complete */
  videoPath?: string;
  /** Seconds since the record was created on the NVR */
  elapsedSeconds?: number;
  errorMessage?: string;
}

/**
 * Export API Port (Driven Port)
 * Interface for communicating with the NVR export API
 */
export interface ExportApiPort {
  /**
   * Ask the NVR to export one camera over one window.
   * Resolves with the remote export id; throws ApiError otherwise.
   */
  submitExport(camera: string, window: TimeWindowVO): Promise<string>;

  /**
   * Current state of an export record. A missing record is NOT_FOUND,
   * never an error.
   */
  getJobStatus(jobId: string): Promise<ExportStatusSnapshot>;

  /**
   * Remove the export record (and the NVR's copy of the artifact).
   * Idempotent: an already missing record counts as deleted.
   * Resolves false when the NVR refused the deletion.
   */
  deleteExportRecord(jobId: string): Promise<boolean>;

  /**
   * Names of every camera the NVR knows about
   */
  listCameras(): Promise<string[]>;
}
