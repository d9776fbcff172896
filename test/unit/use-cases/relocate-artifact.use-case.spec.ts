import { describe, it, expect, beforeEach } from 'vitest';
import { RelocateArtifactUseCase } from '../../../src/application/use-cases/relocate-artifact.use-case';
import { ConflictError } from '../../../src/domain/errors/conflict.error';
import { IoError } from '../../../src/domain/errors/io.error';
import { BackupRelocatedEvent } from '../../../src/domain/events';
import {
  FakeClock,
  InMemoryBackupStorageAdapter,
  InMemoryEventPublisherAdapter,
} from '../../in-memory-adapters';
import { createConfigService, windowOf } from '../helpers/mock-factories';

describe('RelocateArtifactUseCase', () => {
  let storage: InMemoryBackupStorageAdapter;
  let clock: FakeClock;
  let events: InMemoryEventPublisherAdapter;
  let useCase: RelocateArtifactUseCase;

  const window = windowOf(0, 4);
  const source = '/nvr/exports/exp-1.mp4';
  const dest = '/backup/front%20door_20251115-000000_20251115-040000.mp4';
  const command = { artifactPath: source, camera: 'front door', window };

  beforeEach(() => {
    storage = new InMemoryBackupStorageAdapter();
    clock = new FakeClock('2025-11-16T02:30:00.000Z');
    events = new InMemoryEventPublisherAdapter();
    useCase = new RelocateArtifactUseCase(storage, clock, events, createConfigService());
  });

  it('should move the export under its deterministic backup name', async () => {
    storage.putFile(source, 'video-bytes');

    const result = await useCase.execute(command);

    expect(result.status).toBe('moved');
    expect(result.backupFile).toEqual({
      sourcePath: source,
      destPath: dest,
      camera: 'front door',
      window,
      sizeBytes: 11,
      createdAt: new Date('2025-11-16T02:30:00.000Z'),
    });
    expect(storage.hasFile(source)).toBe(false);
    expect(storage.readFile(dest)).toBe('video-bytes');

    const [event] = events.getEventsOf(BackupRelocatedEvent);
    expect(event.payload).toEqual({
      camera: 'front door',
      sourcePath: source,
      destPath: dest,
      sizeBytes: 11,
      status: 'moved',
    });
  });

  it('should keep the artifact extension in lower case', async () => {
    storage.putFile('/nvr/exports/exp-1.MKV', 'video-bytes');

    const result = await useCase.execute({ ...command, artifactPath: '/nvr/exports/exp-1.MKV' });

    expect(result.backupFile.destPath).toBe(
      '/backup/front%20door_20251115-000000_20251115-040000.mkv',
    );
  });

  it('should report an identical existing backup as already present', async () => {
    storage.putFile(source, 'video-bytes');
    storage.putFile(dest, 'video-bytes');

    const result = await useCase.execute(command);

    expect(result.status).toBe('already-present');
    expect(result.backupFile.sizeBytes).toBe(11);
    expect(storage.hasFile(source)).toBe(true);
    expect(events.getEventsOf(BackupRelocatedEvent)[0].payload.status).toBe('already-present');
  });

  it('should treat a rerun whose source is already gone as already present', async () => {
    storage.putFile(dest, 'video-bytes');

    const result = await useCase.execute(command);

    expect(result.status).toBe('already-present');
  });

  it('should refuse to overwrite a backup of a different size', async () => {
    storage.putFile(source, 'video-bytes');
    storage.putFile(dest, 'older');

    await expect(useCase.execute(command)).rejects.toBeInstanceOf(ConflictError);
    expect(storage.readFile(dest)).toBe('older');
    expect(storage.hasFile(source)).toBe(true);
  });

  it('should refuse to overwrite a backup of the same size but different content', async () => {
    storage.putFile(source, 'video-bytes');
    storage.putFile(dest, 'VIDEO-BYTES');

    const error = await useCase.execute(command).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({ sourcePath: source, destPath: dest });
    expect(events.getPublishedEvents()).toEqual([]);
  });

  it('should fail when the export artifact does not exist', async () => {
    const error = await useCase.execute(command).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(IoError);
    expect(error).toMatchObject({
      message: `Export artifact ${source} not found`,
      path: source,
      code: 'ENOENT',
    });
  });

  it('should surface a failed move and leave the source in place', async () => {
    storage.putFile(source, 'video-bytes');
    storage.failOn('moveAtomic', source);

    await expect(useCase.execute(command)).rejects.toBeInstanceOf(IoError);
    expect(storage.hasFile(source)).toBe(true);
    expect(storage.hasFile(dest)).toBe(false);
  });
});
