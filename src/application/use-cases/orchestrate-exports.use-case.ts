import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import type {
  OrchestrateExportsCommand,
  OrchestrateExportsPort,
  OrchestrationSummary,
} from '../ports/input/orchestrate-exports.port';
import type { ExportApiPort, ExportStatusSnapshot } from '../ports/output/export-api.port';
import type { BackupStoragePort } from '../ports/output/backup-storage.port';
import type { ClockPort } from '../ports/output/clock.port';
import type { EventPublisherPort } from '../ports/output/event-publisher.port';
import {
  BACKUP_STORAGE_PORT,
  CLOCK_PORT,
  EVENT_PUBLISHER_PORT,
  EXPORT_API_PORT,
} from '../ports/output/injection-tokens';
import { AppConfig } from '../../config/configuration';
import { ExportJobEntity } from '../../domain/entities/export-job.entity';
import { ApiError, ApiUnavailableError } from '../../domain/errors/api.error';
import { IoError } from '../../domain/errors/io.error';
import {
  ExportCompletedEvent,
  ExportFailedEvent,
  ExportProgressEvent,
  ExportSubmittedEvent,
  ExportTimedOutEvent,
  type TimeoutCause,
} from '../../domain/events';
import { createLimiter, Limiter } from '../../shared/concurrency/limiter';

interface TrackedJob {
  job: ExportJobEntity;
  /** Epoch ms; the job is not polled before this */
  nextPollAt: number;
}

/** Cap on the poll backoff multiplier after consecutive errors */
const MAX_BACKOFF_FACTOR = 8;

/**
 * Orchestrate Exports Use Case
 *
 * Submits one export per (camera, window) in order, then runs a scheduler
 * tick loop until every job is terminal:
 * - each tick polls the jobs whose `nextPollAt` has passed, at most
 *   `maxConcurrentPolls` at a time
 * - between ticks it sleeps on the clock until the next poll, timeout or
 *   run deadline is due
 * - an aborted signal or the run deadline times out whatever is left
 *
 * Progress is reported exclusively through domain events.
 */
@Injectable()
export class OrchestrateExportsUseCase implements OrchestrateExportsPort {
  private readonly logger = new Logger(OrchestrateExportsUseCase.name);
  private readonly settings: AppConfig['orchestrator'];
  private readonly sourcePath: string;

  constructor(
    @Inject(EXPORT_API_PORT) private readonly exportApi: ExportApiPort,
    @Inject(BACKUP_STORAGE_PORT) private readonly storage: BackupStoragePort,
    @Inject(CLOCK_PORT) private readonly clock: ClockPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
  ) {
    this.settings = configService.get('orchestrator', { infer: true });
    this.sourcePath = configService.get('sourcePath', { infer: true });
  }

  async execute(command: OrchestrateExportsCommand): Promise<OrchestrationSummary> {
    const { signal } = command;
    const startedAt = this.clock.now().getTime();
    const deadline =
      this.settings.runDeadlineMs === undefined ? undefined : startedAt + this.settings.runDeadlineMs;

    this.logger.log(
      `Exporting ${command.windows.length} window(s) for ${command.cameras.length} camera(s)`,
    );

    const tracked = await this.submitAll(command);
    await this.runSchedule(tracked, deadline, signal);

    return this.summarize(tracked.map((entry) => entry.job));
  }

  // ===== Submission =====

  private async submitAll(command: OrchestrateExportsCommand): Promise<TrackedJob[]> {
    const tracked: TrackedJob[] = [];
    let attempts = 0;

    for (const camera of command.cameras) {
      for (const window of command.windows) {
        const now = this.clock.now();

        if (command.signal?.aborted) {
          tracked.push({
            job: ExportJobEntity.createCancelled({
              camera,
              window,
              submittedAt: now,
              errorMessage: 'Run cancelled before submission',
            }),
            nextPollAt: Number.POSITIVE_INFINITY,
          });
          continue;
        }

        attempts += 1;
        try {
          const jobId = await this.exportApi.submitExport(camera, window);
          const submittedAt = this.clock.now();
          const job = ExportJobEntity.create({ jobId, camera, window, submittedAt });

          tracked.push({ job, nextPollAt: submittedAt.getTime() + this.settings.pollIntervalMs });
          await this.eventPublisher.publish(
            new ExportSubmittedEvent(
              { key: job.key, jobId, camera, window: window.label() },
              submittedAt,
            ),
          );
        } catch (error) {
          if (!(error instanceof ApiError)) {
            throw error;
          }
          if (attempts === 1 && error.isTransport()) {
            throw new ApiUnavailableError(`NVR export API unreachable: ${error.message}`, {
              cause: error,
            });
          }

          const job = ExportJobEntity.createFailedSubmission({
            camera,
            window,
            submittedAt: now,
            errorMessage: error.message,
          });
          tracked.push({ job, nextPollAt: Number.POSITIVE_INFINITY });
          await this.eventPublisher.publish(
            new ExportFailedEvent(
              {
                key: job.key,
                camera,
                window: window.label(),
                stage: 'submission',
                reason: error.message,
              },
              now,
            ),
          );
        }
      }
    }

    return tracked;
  }

  // ===== Scheduling =====

  private async runSchedule(
    tracked: TrackedJob[],
    deadline: number | undefined,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const limit: Limiter = createLimiter(this.settings.maxConcurrentPolls);

    for (;;) {
      if (tracked.every((entry) => entry.job.isTerminal())) {
        return;
      }

      const now = this.clock.now().getTime();

      if (signal?.aborted) {
        this.logger.warn('Run cancelled, giving up on unfinished exports');
        await this.timeOutRemaining(tracked, 'aborted');
        return;
      }
      if (deadline !== undefined && now >= deadline) {
        this.logger.warn('Run deadline reached, giving up on unfinished exports');
        await this.timeOutRemaining(tracked, 'run_deadline');
        return;
      }

      for (const entry of tracked) {
        if (!entry.job.isTerminal() && entry.job.elapsedMs(new Date(now)) > this.settings.maxWaitMs) {
          await this.timeOut(entry, 'max_wait');
        }
      }

      const due = tracked.filter((entry) => !entry.job.isTerminal() && entry.nextPollAt <= now);

      if (due.length === 0) {
        const wakeAt = this.nextWakeAt(tracked, deadline);
        if (wakeAt !== undefined) {
          await this.clock.sleep(Math.max(0, wakeAt - now), signal);
        }
        continue;
      }

      await Promise.all(due.map((entry) => limit(() => this.poll(entry))));
    }
  }

  private nextWakeAt(tracked: TrackedJob[], deadline: number | undefined): number | undefined {
    const candidates: number[] = [];

    for (const entry of tracked) {
      if (entry.job.isTerminal()) continue;
      candidates.push(entry.nextPollAt);
      candidates.push(entry.job.submittedAt.getTime() + this.settings.maxWaitMs + 1);
    }
    if (deadline !== undefined) {
      candidates.push(deadline);
    }

    const finite = candidates.filter((candidate) => Number.isFinite(candidate));
    return finite.length === 0 ? undefined : Math.min(...finite);
  }

  // ===== Polling =====

  private async poll(entry: TrackedJob): Promise<void> {
    const { jobId } = entry.job;
    if (jobId === undefined || entry.job.isTerminal()) {
      return;
    }

    try {
      const snapshot = await this.exportApi.getJobStatus(jobId);
      const now = this.clock.now();
      entry.job = entry.job.recordPollSuccess(now);
      await this.applySnapshot(entry, jobId, snapshot);
      entry.nextPollAt = this.clock.now().getTime() + this.settings.pollIntervalMs;
    } catch (error) {
      if (!(error instanceof ApiError) && !(error instanceof IoError)) {
        throw error;
      }
      await this.handlePollError(entry, error);
    }
  }

  private async applySnapshot(
    entry: TrackedJob,
    jobId: string,
    snapshot: ExportStatusSnapshot,
  ): Promise<void> {
    const now = this.clock.now();
    const { job } = entry;

    if (snapshot.status.isNotFound()) {
      this.logger.debug(`Export ${jobId} (${job.camera}) not visible yet`);
      return;
    }

    if (snapshot.status.isFailed()) {
      const reason = snapshot.errorMessage ?? 'Export failed on the NVR';
      entry.job = job.fail(reason, now);
      await this.eventPublisher.publish(
        new ExportFailedEvent(
          { key: job.key, jobId, camera: job.camera, window: job.window.label(), stage: 'remote', reason },
          now,
        ),
      );
      return;
    }

    const artifactPath =
      snapshot.videoPath === undefined ? undefined : this.artifactPathFor(snapshot.videoPath);
    const artifact = artifactPath === undefined ? null : await this.storage.stat(artifactPath);
    const sizeBytes = artifact?.isFile ? artifact.sizeBytes : undefined;

    if (snapshot.status.isComplete() && artifactPath !== undefined && this.isReady(job, sizeBytes)) {
      const completed = job.markInProgress(now, snapshot.name).complete(artifactPath, sizeBytes ?? 0, now);
      entry.job = completed;
      await this.eventPublisher.publish(
        new ExportCompletedEvent(
          {
            key: completed.key,
            jobId,
            camera: completed.camera,
            name: completed.remoteName,
            artifactPath,
            sizeBytes: sizeBytes ?? 0,
            elapsedMs: completed.elapsedMs(now),
          },
          now,
        ),
      );
      return;
    }

    // Still being written, or finished remotely but not settled on disk yet
    entry.job = job.markInProgress(now, snapshot.name).recordObservation(sizeBytes, now);
    await this.eventPublisher.publish(
      new ExportProgressEvent(
        {
          key: job.key,
          jobId,
          camera: job.camera,
          name: entry.job.remoteName,
          sizeBytes,
          elapsedMs: entry.job.elapsedMs(now),
          reportedElapsedMs:
            snapshot.elapsedSeconds === undefined ? undefined : Math.round(snapshot.elapsedSeconds * 1000),
        },
        now,
      ),
    );
  }

  /**
   * A finished export is accepted once its file is visible and non-empty
   * and, with `requireStableSize`, has the size seen on the previous poll.
   * A first sighting has nothing to compare against and counts as stable.
   */
  private isReady(job: ExportJobEntity, sizeBytes: number | undefined): boolean {
    if (sizeBytes === undefined || sizeBytes === 0) {
      return false;
    }
    if (!this.settings.requireStableSize || job.lastObservedSize === undefined) {
      return true;
    }
    return job.lastObservedSize === sizeBytes;
  }

  private artifactPathFor(videoPath: string): string {
    return path.join(this.sourcePath, path.basename(videoPath));
  }

  private async handlePollError(entry: TrackedJob, error: ApiError | IoError): Promise<void> {
    const now = this.clock.now();
    const { job } = entry;
    entry.job = job.recordPollError(error.message, now);

    const errors = entry.job.consecutivePollErrors;
    this.logger.warn(
      `Polling ${job.camera} ${job.window.label()} failed (${errors}/${this.settings.maxConsecutivePollErrors}): ${error.message}`,
    );

    if (errors >= this.settings.maxConsecutivePollErrors) {
      const reason = `Status unavailable after ${errors} consecutive attempts: ${error.message}`;
      entry.job = entry.job.fail(reason, now);
      await this.eventPublisher.publish(
        new ExportFailedEvent(
          {
            key: job.key,
            jobId: job.jobId,
            camera: job.camera,
            window: job.window.label(),
            stage: 'polling',
            reason,
          },
          now,
        ),
      );
      return;
    }

    const backoff = Math.min(2 ** (errors - 1), MAX_BACKOFF_FACTOR);
    entry.nextPollAt = now.getTime() + this.settings.pollIntervalMs * backoff;
  }

  // ===== Timeouts =====

  private async timeOutRemaining(tracked: TrackedJob[], cause: TimeoutCause): Promise<void> {
    for (const entry of tracked) {
      if (!entry.job.isTerminal()) {
        await this.timeOut(entry, cause);
      }
    }
  }

  private async timeOut(entry: TrackedJob, cause: TimeoutCause): Promise<void> {
    const now = this.clock.now();
    const { job } = entry;
    const elapsedMs = job.elapsedMs(now);
    const reason =
      cause === 'max_wait'
        ? `Not finished within ${this.settings.maxWaitMs} ms`
        : cause === 'run_deadline'
          ? 'Run deadline reached'
          : 'Run cancelled';

    entry.job = job.timeOut(reason, now);
    await this.eventPublisher.publish(
      new ExportTimedOutEvent(
        { key: job.key, jobId: job.jobId, camera: job.camera, window: job.window.label(), cause, elapsedMs },
        now,
      ),
    );
  }

  private summarize(jobs: ExportJobEntity[]): OrchestrationSummary {
    const completed = jobs.filter((job) => job.status.isCompleted());
    const failed = jobs.filter((job) => job.status.isFailed());
    const timedOut = jobs.filter((job) => job.status.isTimedOut());

    this.logger.log(
      `Exports finished: ${completed.length} completed, ${failed.length} failed, ${timedOut.length} timed out`,
    );

    return {
      jobs,
      completed,
      failed,
      timedOut,
      counts: {
        total: jobs.length,
        completed: completed.length,
        failed: failed.length,
        timedOut: timedOut.length,
      },
    };
  }
}
