import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import type {
  RelocateArtifactCommand,
  RelocateArtifactPort,
  RelocationResult,
} from '../ports/input/relocate-artifact.port';
import type { BackupStoragePort, StoredFileInfo } from '../ports/output/backup-storage.port';
import type { ClockPort } from '../ports/output/clock.port';
import type { EventPublisherPort } from '../ports/output/event-publisher.port';
import { BACKUP_STORAGE_PORT, CLOCK_PORT, EVENT_PUBLISHER_PORT } from '../ports/output/injection-tokens';
import { AppConfig } from '../../config/configuration';
import { BackupFile } from '../../domain/entities/backup-file.entity';
import { ConflictError } from '../../domain/errors/conflict.error';
import { IoError } from '../../domain/errors/io.error';
import { BackupRelocatedEvent } from '../../domain/events';
import { artifactExtension, backupFileName } from '../../domain/services/backup-naming';

/**
 * Relocate Artifact Use Case
 * Moves one finished export into the backup directory. Safe to repeat: a
 * backup with identical content is reported as already present.
 */
@Injectable()
export class RelocateArtifactUseCase implements RelocateArtifactPort {
  private readonly logger = new Logger(RelocateArtifactUseCase.name);
  private readonly destRoot: string;

  constructor(
    @Inject(BACKUP_STORAGE_PORT) private readonly storage: BackupStoragePort,
    @Inject(CLOCK_PORT) private readonly clock: ClockPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
  ) {
    this.destRoot = configService.get('destPath', { infer: true });
  }

  async execute(command: RelocateArtifactCommand): Promise<RelocationResult> {
    const { artifactPath, camera, window } = command;
    const destPath = path.join(
      this.destRoot,
      backupFileName(camera, window, artifactExtension(artifactPath)),
    );

    await this.storage.ensureDir(this.destRoot);

    const [source, existing] = await Promise.all([
      this.storage.stat(artifactPath),
      this.storage.stat(destPath),
    ]);

    if (existing) {
      if (!existing.isFile) {
        throw new ConflictError(`${destPath} exists and is not a regular file`, artifactPath, destPath);
      }
      if (source && !(await this.sameContent(source, existing))) {
        throw new ConflictError(
          `${destPath} already exists with different content than ${artifactPath}`,
          artifactPath,
          destPath,
        );
      }

      this.logger.log(`${destPath} already backed up, leaving it untouched`);
      return this.finish('already-present', command, destPath, existing.sizeBytes);
    }

    if (!source || !source.isFile) {
      throw new IoError(`Export artifact ${artifactPath} not found`, artifactPath, 'ENOENT');
    }

    await this.storage.moveAtomic(artifactPath, destPath);

    const stored = await this.storage.stat(destPath);
    if (!stored) {
      throw new IoError(`${destPath} missing right after the move`, destPath, 'ENOENT');
    }

    return this.finish('moved', command, destPath, stored.sizeBytes);
  }

  /**
   * Size first, SHA-256 only when sizes match
   */
  private async sameContent(a: StoredFileInfo, b: StoredFileInfo): Promise<boolean> {
    if (a.sizeBytes !== b.sizeBytes) {
      return false;
    }
    const [hashA, hashB] = await Promise.all([
      this.storage.checksum(a.path),
      this.storage.checksum(b.path),
    ]);
    return hashA === hashB;
  }

  private async finish(
    status: RelocationResult['status'],
    command: RelocateArtifactCommand,
    destPath: string,
    sizeBytes: number,
  ): Promise<RelocationResult> {
    const now = this.clock.now();
    const backupFile: BackupFile = {
      sourcePath: command.artifactPath,
      destPath,
      camera: command.camera,
      window: command.window,
      sizeBytes,
      createdAt: now,
    };

    await this.eventPublisher.publish(
      new BackupRelocatedEvent(
        { camera: command.camera, sourcePath: command.artifactPath, destPath, sizeBytes, status },
        now,
      ),
    );

    return { status, backupFile };
  }
}
