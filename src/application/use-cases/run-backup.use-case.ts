import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  RelocatedBackup,
  RunBackupCommand,
  RunBackupPort,
  RunBackupResult,
  RunFailure,
} from '../ports/input/run-backup.port';
import type { SweepFailure } from '../ports/input/sweep-retention.port';
import type { ClockPort } from '../ports/output/clock.port';
import type { ExportApiPort } from '../ports/output/export-api.port';
import { CLOCK_PORT, EXPORT_API_PORT } from '../ports/output/injection-tokens';
import { AppConfig } from '../../config/configuration';
import { ExportJobEntity } from '../../domain/entities/export-job.entity';
import { ApiError, ApiUnavailableError } from '../../domain/errors/api.error';
import { ConflictError } from '../../domain/errors/conflict.error';
import { IoError } from '../../domain/errors/io.error';
import { plan, resolvePlanMode, resolveTargetDate } from '../../domain/services/time-window-planner';
import { OrchestrateExportsUseCase } from './orchestrate-exports.use-case';
import { RelocateArtifactUseCase } from './relocate-artifact.use-case';
import { SweepRetentionUseCase } from './sweep-retention.use-case';

/**
 * Run Backup Use Case
 *
 * One complete run:
 * 1. resolve the day, the windows and the cameras (bad parameters fail here,
 *    before the NVR is contacted)
 * 2. export every (camera, window)
 * 3. relocate every completed export, one file at a time
 * 4. remove confirmed export records and prune expired backups
 *
 * Only configuration errors and an unreachable NVR escape; everything else
 * is collected into `failures`.
 */
@Injectable()
export class RunBackupUseCase implements RunBackupPort {
  private readonly logger = new Logger(RunBackupUseCase.name);
  private readonly settings: Pick<
    AppConfig,
    'timezone' | 'exportDaysAgo' | 'destPath' | 'exportRetentionDays'
  >;

  constructor(
    @Inject(OrchestrateExportsUseCase) private readonly orchestrateExports: OrchestrateExportsUseCase,
    @Inject(RelocateArtifactUseCase) private readonly relocateArtifact: RelocateArtifactUseCase,
    @Inject(SweepRetentionUseCase) private readonly sweepRetention: SweepRetentionUseCase,
    @Inject(EXPORT_API_PORT) private readonly exportApi: ExportApiPort,
    @Inject(CLOCK_PORT) private readonly clock: ClockPort,
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
  ) {
    this.settings = {
      timezone: configService.get('timezone', { infer: true }),
      exportDaysAgo: configService.get('exportDaysAgo', { infer: true }),
      destPath: configService.get('destPath', { infer: true }),
      exportRetentionDays: configService.get('exportRetentionDays', { infer: true }),
    };
  }

  async execute(command: RunBackupCommand): Promise<RunBackupResult> {
    const startedAt = this.clock.now();
    const { timezone } = this.settings;

    const date = resolveTargetDate(command.date, this.settings.exportDaysAgo, timezone, startedAt);
    const mode = resolvePlanMode({
      startHour: command.startHour,
      endHour: command.endHour,
      splitInterval: command.splitInterval,
    });
    const windows = plan(date, mode, timezone);
    const cameras = await this.resolveCameras(command.cameras);

    this.logger.log(
      `Backing up ${date} (${timezone}): ${windows.map((window) => window.label()).join(', ')}`,
    );

    if (cameras.length === 0) {
      this.logger.warn('No cameras to export');
    }

    const failures: RunFailure[] = [];

    const summary = await this.orchestrateExports.execute({ cameras, windows, signal: command.signal });
    for (const job of [...summary.failed, ...summary.timedOut]) {
      failures.push(exportFailure(job));
    }

    const relocated: RelocatedBackup[] = [];
    const relocatedJobs: { jobId?: string; camera: string; destPath: string }[] = [];
    for (const job of summary.completed) {
      if (job.artifactPath === undefined) continue;

      try {
        const result = await this.relocateArtifact.execute({
          artifactPath: job.artifactPath,
          camera: job.camera,
          window: job.window,
        });
        relocated.push({
          camera: job.camera,
          window: job.window.label(),
          destPath: result.backupFile.destPath,
          sizeBytes: result.backupFile.sizeBytes,
          status: result.status,
        });
        relocatedJobs.push({ jobId: job.jobId, camera: job.camera, destPath: result.backupFile.destPath });
      } catch (error) {
        if (!(error instanceof IoError) && !(error instanceof ConflictError)) {
          throw error;
        }
        this.logger.error(`Relocating ${job.artifactPath} failed: ${error.message}`);
        failures.push({ stage: 'relocation', subject: job.artifactPath, reason: error.message });
      }
    }

    const sweep = await this.sweepRetention.execute({
      destRoot: this.settings.destPath,
      maxAgeDays: this.settings.exportRetentionDays,
      relocated: relocatedJobs,
    });
    failures.push(...sweep.failures.map(sweepFailure));

    const durationMs = this.clock.now().getTime() - startedAt.getTime();

    return {
      date,
      cameras,
      windows: windows.map((window) => window.label()),
      counts: summary.counts,
      relocated,
      sweep,
      failures,
      durationMs,
      exitCode: failures.length === 0 ? 0 : 1,
    };
  }

  private async resolveCameras(requested: string[] | undefined): Promise<string[]> {
    const explicit = dedupe(requested ?? []);
    if (explicit.length > 0) {
      return explicit;
    }

    try {
      const discovered = dedupe(await this.exportApi.listCameras());
      this.logger.log(`Discovered cameras: ${discovered.join(', ') || '(none)'}`);
      return discovered;
    } catch (error) {
      if (error instanceof ApiError && error.isTransport()) {
        throw new ApiUnavailableError(`Camera list unavailable: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }
}

function dedupe(cameras: string[]): string[] {
  const seen = new Set<string>();
  for (const camera of cameras) {
    const name = camera.trim();
    if (name.length > 0) {
      seen.add(name);
    }
  }
  return [...seen];
}

function exportFailure(job: ExportJobEntity): RunFailure {
  return {
    stage: 'export',
    subject: `${job.camera} ${job.window.label()}`,
    reason: `${job.status.toString()}: ${job.errorMessage ?? 'no details'}`,
  };
}

function sweepFailure(failure: SweepFailure): RunFailure {
  return {
    stage: failure.kind === 'prune' ? 'retention' : 'record-cleanup',
    subject: failure.subject,
    reason: failure.reason,
  };
}
