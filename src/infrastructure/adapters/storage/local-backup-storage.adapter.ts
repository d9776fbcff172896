import { Injectable, Logger } from '@nestjs/common';
import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { copyFile, mkdir, open, readdir, rename, stat, unlink } from 'fs/promises';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import type {
  BackupStoragePort,
  StoredFileInfo,
} from '../../../application/ports/output/backup-storage.port';
import { partialFileName } from '../../../domain/services/backup-naming';
import { errnoCode, IoError } from '../../../domain/errors/io.error';

/**
 * Local Backup Storage Adapter
 * Implements BackupStoragePort on the local filesystem
 */
@Injectable()
export class LocalBackupStorageAdapter implements BackupStoragePort {
  private readonly logger = new Logger(LocalBackupStorageAdapter.name);

  async stat(filePath: string): Promise<StoredFileInfo | null> {
    try {
      const stats = await stat(filePath);
      return {
        path: filePath,
        sizeBytes: stats.size,
        modifiedAt: stats.mtime,
        isFile: stats.isFile(),
      };
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw IoError.from(error, filePath, 'stat');
    }
  }

  async ensureDir(dir: string): Promise<void> {
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw IoError.from(error, dir, 'create directory');
    }
  }

  /**
   * Two renames through a hidden temp file next to the destination. When
   * source and destination live on different filesystems the first step
   * becomes copy + fsync, and the source is only unlinked at the end.
   */
  async moveAtomic(sourcePath: string, destPath: string): Promise<void> {
    const tempPath = path.join(
      path.dirname(destPath),
      partialFileName(path.basename(destPath), uuidv4()),
    );

    let copied = false;
    try {
      await rename(sourcePath, tempPath);
    } catch (error) {
      if (errnoCode(error) !== 'EXDEV') {
        throw IoError.from(error, sourcePath, 'move');
      }
      this.logger.debug(`${sourcePath} is on another filesystem, copying`);
      await this.copyDurably(sourcePath, tempPath);
      copied = true;
    }

    try {
      await rename(tempPath, destPath);
    } catch (error) {
      await this.rollback(tempPath, sourcePath, copied);
      throw IoError.from(error, destPath, 'move into place');
    }

    if (copied) {
      try {
        await unlink(sourcePath);
      } catch (error) {
        if (errnoCode(error) !== 'ENOENT') {
          throw IoError.from(error, sourcePath, 'remove source after copy of');
        }
      }
    }
  }

  async checksum(filePath: string): Promise<string> {
    const hash = createHash('sha256');
    try {
      await pipeline(createReadStream(filePath), hash);
    } catch (error) {
      throw IoError.from(error, filePath, 'checksum');
    }
    return hash.digest('hex');
  }

  async listFiles(dir: string): Promise<StoredFileInfo[] | null> {
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw IoError.from(error, dir, 'list');
    }

    const files: StoredFileInfo[] = [];
    for (const name of names.sort()) {
      const info = await this.stat(path.join(dir, name));
      if (info?.isFile) {
        files.push(info);
      }
    }
    return files;
  }

  async deleteFile(filePath: string): Promise<boolean> {
    try {
      await unlink(filePath);
      return true;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw IoError.from(error, filePath, 'delete');
    }
  }

  private async copyDurably(sourcePath: string, tempPath: string): Promise<void> {
    try {
      await copyFile(sourcePath, tempPath);
      const handle = await open(tempPath, 'r+');
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (error) {
      await this.discard(tempPath);
      throw IoError.from(error, sourcePath, 'copy');
    }
  }

  private async rollback(tempPath: string, sourcePath: string, copied: boolean): Promise<void> {
    if (copied) {
      await this.discard(tempPath);
      return;
    }
    try {
      await rename(tempPath, sourcePath);
    } catch (error) {
      this.logger.error(
        `Could not restore ${sourcePath} from ${tempPath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async discard(tempPath: string): Promise<void> {
    try {
      await unlink(tempPath);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        this.logger.warn(`Could not remove temp file ${tempPath}: ${IoError.from(error, tempPath, 'remove').message}`);
      }
    }
  }
}
