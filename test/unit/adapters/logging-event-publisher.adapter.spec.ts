import { describe, it, expect, afterEach, vi } from 'vitest';
import { Logger } from '@nestjs/common';
import {
  describeEvent,
  LoggingEventPublisherAdapter,
} from '../../../src/infrastructure/adapters/events/logging-event-publisher.adapter';
import {
  BackupPrunedEvent,
  BackupRelocatedEvent,
  ExportCompletedEvent,
  ExportFailedEvent,
  ExportProgressEvent,
  ExportRecordDeletedEvent,
  ExportSubmittedEvent,
  ExportTimedOutEvent,
} from '../../../src/domain/events';

describe('LoggingEventPublisherAdapter', () => {
  const window = '2025-11-15 00:00-04:00';

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('describeEvent', () => {
    it('should describe export lifecycle events', () => {
      expect(
        describeEvent(new ExportSubmittedEvent({ key: 'k', jobId: 'exp-1', camera: 'front', window })),
      ).toBe('front 2025-11-15 00:00-04:00 submitted as exp-1');

      expect(
        describeEvent(
          new ExportProgressEvent({
            key: 'k',
            jobId: 'exp-1',
            camera: 'front',
            name: 'front export',
            sizeBytes: 1536,
            elapsedMs: 65000,
          }),
        ),
      ).toBe('front front export in progress, size 1.5 KB, elapsed 1m 5s');

      expect(
        describeEvent(new ExportProgressEvent({ key: 'k', jobId: 'exp-1', camera: 'front', elapsedMs: 12000 })),
      ).toBe('front exp-1 in progress, size not on disk yet, elapsed 12s');

      expect(
        describeEvent(
          new ExportProgressEvent({
            key: 'k',
            jobId: 'exp-1',
            camera: 'front',
            elapsedMs: 12000,
            reportedElapsedMs: 95000,
          }),
        ),
      ).toBe('front exp-1 in progress, size not on disk yet, elapsed 12s (NVR reports 1m 35s)');

      expect(
        describeEvent(
          new ExportCompletedEvent({
            key: 'k',
            jobId: 'exp-1',
            camera: 'front',
            artifactPath: '/nvr/exports/exp-1.mp4',
            sizeBytes: 3 * 1024 * 1024,
            elapsedMs: 3723000,
          }),
        ),
      ).toBe('front /nvr/exports/exp-1.mp4 ready, size 3.0 MB, elapsed 1h 2m 3s');
    });

    it('should describe failures and timeouts', () => {
      expect(
        describeEvent(
          new ExportFailedEvent({
            key: 'k',
            jobId: 'exp-1',
            camera: 'front',
            window,
            stage: 'remote',
            reason: 'disk full',
          }),
        ),
      ).toBe('front 2025-11-15 00:00-04:00 failed during remote: disk full');

      expect(
        describeEvent(
          new ExportTimedOutEvent({ key: 'k', camera: 'front', window, cause: 'max_wait', elapsedMs: 7200000 }),
        ),
      ).toBe('front 2025-11-15 00:00-04:00 timed out (max wait) after 2h 0m 0s');

      expect(
        describeEvent(
          new ExportTimedOutEvent({ key: 'k', camera: 'front', window, cause: 'run_deadline', elapsedMs: 5000 }),
        ),
      ).toBe('front 2025-11-15 00:00-04:00 timed out (run deadline) after 5s');
    });

    it('should describe backup and cleanup events', () => {
      expect(
        describeEvent(
          new BackupRelocatedEvent({
            camera: 'front',
            sourcePath: '/nvr/exports/exp-1.mp4',
            destPath: '/backup/a.mp4',
            sizeBytes: 512,
            status: 'moved',
          }),
        ),
      ).toBe('/backup/a.mp4 stored, size 512 B');

      expect(
        describeEvent(
          new BackupRelocatedEvent({
            camera: 'front',
            sourcePath: '/nvr/exports/exp-1.mp4',
            destPath: '/backup/a.mp4',
            sizeBytes: 512,
            status: 'already-present',
          }),
        ),
      ).toBe('/backup/a.mp4 already present, size 512 B');

      expect(
        describeEvent(new ExportRecordDeletedEvent({ jobId: 'exp-1', camera: 'front', destPath: '/backup/a.mp4' })),
      ).toBe('front export record exp-1 removed from the NVR');

      expect(
        describeEvent(new BackupPrunedEvent({ path: '/backup/old.mp4', ageMs: 90061000, sizeBytes: 1 })),
      ).toBe('/backup/old.mp4 removed, age 25h 1m 1s');
    });
  });

  describe('publish', () => {
    it('should log each event at its severity', async () => {
      const log = vi.spyOn(Logger.prototype, 'log');
      const warn = vi.spyOn(Logger.prototype, 'warn');
      const error = vi.spyOn(Logger.prototype, 'error');
      const publisher = new LoggingEventPublisherAdapter();

      await publisher.publish(new ExportSubmittedEvent({ key: 'k', jobId: 'exp-1', camera: 'front', window }));
      await publisher.publish(
        new ExportTimedOutEvent({ key: 'k', camera: 'front', window, cause: 'aborted', elapsedMs: 0 }),
      );
      await publisher.publish(
        new ExportFailedEvent({ key: 'k', camera: 'front', window, stage: 'submission', reason: 'rejected' }),
      );

      expect(log).toHaveBeenCalledWith('[export.submitted] front 2025-11-15 00:00-04:00 submitted as exp-1');
      expect(warn).toHaveBeenCalledWith('[export.timed_out] front 2025-11-15 00:00-04:00 timed out (aborted) after 0s');
      expect(error).toHaveBeenCalledWith(
        '[export.failed] front 2025-11-15 00:00-04:00 failed during submission: rejected',
      );
    });
  });
});
