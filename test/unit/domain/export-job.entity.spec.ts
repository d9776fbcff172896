import { describe, it, expect } from 'vitest';
import { ExportJobEntity } from '../../../src/domain/entities/export-job.entity';
import { JobStatus } from '../../../src/domain/value-objects/job-status.vo';
import { windowOf } from '../helpers/mock-factories';

describe('ExportJobEntity', () => {
  const window = windowOf(0, 4);
  const t0 = new Date('2025-11-16T02:00:00.000Z');
  const at = (ms: number) => new Date(t0.getTime() + ms);

  const createJob = () =>
    ExportJobEntity.create({ jobId: 'exp-1', camera: 'front', window, submittedAt: t0 });

  describe('Creation', () => {
    it('should start pending and keyed by camera and window', () => {
      const job = createJob();

      expect(job.status.value).toBe(JobStatus.PENDING);
      expect(job.key).toBe(`front@${window.key()}`);
      expect(job.hasRemoteId()).toBe(true);
      expect(job.pollCount).toBe(0);
    });

    it('should require a camera and a job id', () => {
      expect(() =>
        ExportJobEntity.create({ jobId: 'exp-1', camera: ' ', window, submittedAt: t0 }),
      ).toThrow('Camera is required');
      expect(() =>
        ExportJobEntity.create({ jobId: '', camera: 'front', window, submittedAt: t0 }),
      ).toThrow('Job ID is required');
    });

    it('should create a terminal job for a rejected submission', () => {
      const job = ExportJobEntity.createFailedSubmission({
        camera: 'front',
        window,
        submittedAt: t0,
        errorMessage: 'Export rejected',
      });

      expect(job.status.value).toBe(JobStatus.FAILED);
      expect(job.isTerminal()).toBe(true);
      expect(job.hasRemoteId()).toBe(false);
      expect(job.jobId).toBeUndefined();
    });

    it('should create a timed out job for a cancelled submission', () => {
      const job = ExportJobEntity.createCancelled({
        camera: 'front',
        window,
        submittedAt: t0,
        errorMessage: 'Run cancelled before submission',
      });

      expect(job.status.value).toBe(JobStatus.TIMED_OUT);
    });
  });

  describe('Transitions', () => {
    it('should go through in progress to completed', () => {
      const completed = createJob()
        .markInProgress(at(1000), 'front export')
        .recordObservation(11, at(1000))
        .complete('/nvr/exports/exp-1.mp4', 11, at(2000));

      expect(completed.status.value).toBe(JobStatus.COMPLETED);
      expect(completed.remoteName).toBe('front export');
      expect(completed.artifactPath).toBe('/nvr/exports/exp-1.mp4');
      expect(completed.sizeBytes).toBe(11);
      expect(completed.elapsedMs(at(2000))).toBe(2000);
    });

    it('should not complete a job that never started', () => {
      expect(() => createJob().complete('/nvr/exports/exp-1.mp4', 11, at(1000))).toThrow(
        `Export job front@${window.key()} cannot move from PENDING to COMPLETED`,
      );
    });

    it('should not leave a terminal state', () => {
      const failed = createJob().fail('boom', at(1000));

      expect(() => failed.timeOut('late', at(2000))).toThrow();
      expect(() => failed.markInProgress(at(2000))).toThrow();
    });

    it('should keep the status when marked in progress again', () => {
      const started = createJob().markInProgress(at(1000));
      const named = started.markInProgress(at(2000), 'front export');

      expect(named.status.value).toBe(JobStatus.IN_PROGRESS);
      expect(named.remoteName).toBe('front export');
      expect(named.updatedAt).toEqual(at(1000));
    });

    it('should time out from pending or in progress', () => {
      expect(createJob().timeOut('Run cancelled', at(500)).errorMessage).toBe('Run cancelled');
      expect(
        createJob().markInProgress(at(1000)).timeOut('Run deadline reached', at(2000)).status.value,
      ).toBe(JobStatus.TIMED_OUT);
    });
  });

  describe('Poll bookkeeping', () => {
    it('should count consecutive errors and reset them on success', () => {
      const job = createJob()
        .recordPollError('timeout', at(1000))
        .recordPollError('timeout', at(2000));

      expect(job.consecutivePollErrors).toBe(2);
      expect(job.pollCount).toBe(2);
      expect(job.errorMessage).toBe('timeout');

      const recovered = job.recordPollSuccess(at(4000));
      expect(recovered.consecutivePollErrors).toBe(0);
      expect(recovered.pollCount).toBe(3);
      expect(recovered.lastPolledAt).toEqual(at(4000));
    });
  });

  describe('Immutability', () => {
    it('should leave the original untouched', () => {
      const job = createJob();
      const started = job.markInProgress(at(1000));

      expect(job.status.value).toBe(JobStatus.PENDING);
      expect(started).not.toBe(job);
    });

    it('should work on plain data through the namespace functions', () => {
      const started = createJob().markInProgress(at(1000));
      const data = ExportJobEntity.recordPollSuccess(started, at(2000));

      expect(data.pollCount).toBe(1);
      expect(started.pollCount).toBe(0);
    });
  });

  it('should serialize to plain JSON', () => {
    const json = createJob().toJSON();

    expect(json).toMatchObject({
      key: `front@${window.key()}`,
      jobId: 'exp-1',
      camera: 'front',
      status: 'PENDING',
      submittedAt: '2025-11-16T02:00:00.000Z',
      window: { start: '2025-11-14T16:00:00.000Z', end: '2025-11-14T20:00:00.000Z' },
    });
  });
});
