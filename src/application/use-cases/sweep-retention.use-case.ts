import * as path from 'path';
import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  RelocatedExport,
  SweepReport,
  SweepRetentionCommand,
  SweepRetentionPort,
} from '../ports/input/sweep-retention.port';
import type { BackupStoragePort, StoredFileInfo } from '../ports/output/backup-storage.port';
import type { ClockPort } from '../ports/output/clock.port';
import type { EventPublisherPort } from '../ports/output/event-publisher.port';
import type { ExportApiPort } from '../ports/output/export-api.port';
import {
  BACKUP_STORAGE_PORT,
  CLOCK_PORT,
  EVENT_PUBLISHER_PORT,
  EXPORT_API_PORT,
} from '../ports/output/injection-tokens';
import { ApiError } from '../../domain/errors/api.error';
import { IoError } from '../../domain/errors/io.error';
import { BackupPrunedEvent, ExportRecordDeletedEvent } from '../../domain/events';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Sweep Retention Use Case
 *
 * 1. Deletes the NVR export record of every relocated export whose backup
 *    is confirmed present and non-empty on disk. Never otherwise.
 * 2. Prunes backup files older than `maxAgeDays`, except the backups this
 *    run relocated or found already present.
 *
 * Every item is handled on its own; failures end up in the report.
 */
@Injectable()
export class SweepRetentionUseCase implements SweepRetentionPort {
  private readonly logger = new Logger(SweepRetentionUseCase.name);

  constructor(
    @Inject(EXPORT_API_PORT) private readonly exportApi: ExportApiPort,
    @Inject(BACKUP_STORAGE_PORT) private readonly storage: BackupStoragePort,
    @Inject(CLOCK_PORT) private readonly clock: ClockPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
  ) {}

  async execute(command: SweepRetentionCommand): Promise<SweepReport> {
    const report: SweepReport = {
      recordsDeleted: [],
      recordsSkipped: [],
      filesPruned: [],
      failures: [],
    };

    for (const item of command.relocated) {
      await this.deleteRecord(item, report);
    }

    const keep = new Set(command.relocated.map((item) => path.resolve(item.destPath)));
    await this.prune(command.destRoot, command.maxAgeDays, keep, report);

    this.logger.log(
      `Cleanup done: ${report.recordsDeleted.length} export record(s) removed, ` +
        `${report.filesPruned.length} expired backup(s) pruned, ${report.failures.length} problem(s)`,
    );
    return report;
  }

  private async deleteRecord(item: RelocatedExport, report: SweepReport): Promise<void> {
    const { jobId } = item;
    if (jobId === undefined) {
      return;
    }

    try {
      const backup = await this.storage.stat(item.destPath);
      if (!backup || !backup.isFile || backup.sizeBytes === 0) {
        report.recordsSkipped.push(jobId);
        report.failures.push({
          kind: 'record-missing-backup',
          subject: jobId,
          reason: `Backup ${item.destPath} not confirmed on disk; export record kept`,
        });
        return;
      }

      if (await this.exportApi.deleteExportRecord(jobId)) {
        report.recordsDeleted.push(jobId);
        await this.eventPublisher.publish(
          new ExportRecordDeletedEvent(
            { jobId, camera: item.camera, destPath: item.destPath },
            this.clock.now(),
          ),
        );
      } else {
        report.failures.push({
          kind: 'record-delete',
          subject: jobId,
          reason: 'NVR refused to delete the export record',
        });
      }
    } catch (error) {
      if (!(error instanceof ApiError) && !(error instanceof IoError)) {
        throw error;
      }
      this.logger.error(`Removing export record ${jobId} failed: ${error.message}`);
      report.failures.push({ kind: 'record-delete', subject: jobId, reason: error.message });
    }
  }

  private async prune(
    destRoot: string,
    maxAgeDays: number,
    keep: ReadonlySet<string>,
    report: SweepReport,
  ): Promise<void> {
    const maxAgeMs = maxAgeDays * MS_PER_DAY;
    const now = this.clock.now();

    let files: StoredFileInfo[] | null;
    try {
      files = await this.storage.listFiles(destRoot);
    } catch (error) {
      if (!(error instanceof IoError)) {
        throw error;
      }
      report.failures.push({ kind: 'prune', subject: destRoot, reason: error.message });
      return;
    }

    if (files === null) {
      this.logger.warn(`Backup directory ${destRoot} does not exist, nothing to prune`);
      return;
    }

    for (const file of files) {
      const ageMs = now.getTime() - file.modifiedAt.getTime();
      if (ageMs <= maxAgeMs) {
        continue;
      }
      if (keep.has(path.resolve(file.path))) {
        this.logger.debug(`Keeping ${file.path}: it backs an export of this run`);
        continue;
      }

      try {
        await this.storage.deleteFile(file.path);
        report.filesPruned.push(file.path);
        await this.eventPublisher.publish(
          new BackupPrunedEvent({ path: file.path, ageMs, sizeBytes: file.sizeBytes }, now),
        );
      } catch (error) {
        if (!(error instanceof IoError)) {
          throw error;
        }
        this.logger.error(`Pruning ${file.path} failed: ${error.message}`);
        report.failures.push({ kind: 'prune', subject: file.path, reason: error.message });
      }
    }
  }
}
