import { ExportJobEntity } from '../../../domain/entities/export-job.entity';
import { TimeWindowVO } from '../../../domain/value-objects/time-window.vo';

export interface OrchestrateExportsCommand {
  cameras: string[];
  windows: TimeWindowVO[];
  /** Aborting marks every unfinished job TIMED_OUT and returns */
  signal?: AbortSignal;
}

export interface OrchestrationCounts {
  total: number;
  completed: number;
  failed: number;
  timedOut: number;
}

export interface OrchestrationSummary {
  /** Final state of every job, in submission order */
  jobs: ExportJobEntity[];
  completed: ExportJobEntity[];
  failed: ExportJobEntity[];
  timedOut: ExportJobEntity[];
  counts: OrchestrationCounts;
}

/**
 * Orchestrate Exports Port (Driving Port / Use Case Interface)
 * Submits one export per (camera, window) and drives all of them to a
 * terminal state
 */
export interface OrchestrateExportsPort {
  execute(command: OrchestrateExportsCommand): Promise<OrchestrationSummary>;
}
