import { createHash } from 'crypto';
import * as path from 'path';
import type {
  BackupStoragePort,
  StoredFileInfo,
} from '../../src/application/ports/output/backup-storage.port';
import { IoError } from '../../src/domain/errors/io.error';

interface StoredFile {
  content: string;
  modifiedAt: Date;
}

type StorageOperation = 'stat' | 'moveAtomic' | 'checksum' | 'listFiles' | 'deleteFile';

/**
 * In-Memory Backup Storage Adapter
 * A flat map of absolute paths to file contents
 */
export class InMemoryBackupStorageAdapter implements BackupStoragePort {
  private readonly files = new Map<string, StoredFile>();
  private readonly dirs = new Set<string>();
  private readonly failures = new Map<string, IoError>();
  private readonly deleted: string[] = [];

  async stat(filePath: string): Promise<StoredFileInfo | null> {
    this.maybeFail('stat', filePath);
    const file = this.files.get(filePath);
    if (!file) {
      return null;
    }
    return {
      path: filePath,
      sizeBytes: Buffer.byteLength(file.content),
      modifiedAt: file.modifiedAt,
      isFile: true,
    };
  }

  async ensureDir(dir: string): Promise<void> {
    this.dirs.add(dir);
  }

  async moveAtomic(sourcePath: string, destPath: string): Promise<void> {
    this.maybeFail('moveAtomic', sourcePath);
    const file = this.files.get(sourcePath);
    if (!file) {
      throw new IoError(`Failed to move ${sourcePath}: not found`, sourcePath, 'ENOENT');
    }
    this.files.set(destPath, file);
    this.files.delete(sourcePath);
  }

  async checksum(filePath: string): Promise<string> {
    this.maybeFail('checksum', filePath);
    const file = this.files.get(filePath);
    if (!file) {
      throw new IoError(`Failed to checksum ${filePath}: not found`, filePath, 'ENOENT');
    }
    return createHash('sha256').update(file.content).digest('hex');
  }

  async listFiles(dir: string): Promise<StoredFileInfo[] | null> {
    this.maybeFail('listFiles', dir);
    if (!this.dirs.has(dir)) {
      return null;
    }

    const entries: StoredFileInfo[] = [];
    for (const filePath of [...this.files.keys()].sort()) {
      if (path.dirname(filePath) === dir) {
        const info = await this.stat(filePath);
        if (info) entries.push(info);
      }
    }
    return entries;
  }

  async deleteFile(filePath: string): Promise<boolean> {
    this.maybeFail('deleteFile', filePath);
    const existed = this.files.delete(filePath);
    if (existed) {
      this.deleted.push(filePath);
    }
    return existed;
  }

  // Test helper methods

  /**
   * Create or overwrite a file; its directory starts to exist too
   */
  putFile(filePath: string, content: string, modifiedAt: Date = new Date('2025-11-16T00:00:00Z')): void {
    this.files.set(filePath, { content, modifiedAt });
    this.dirs.add(path.dirname(filePath));
  }

  readFile(filePath: string): string | undefined {
    return this.files.get(filePath)?.content;
  }

  hasFile(filePath: string): boolean {
    return this.files.has(filePath);
  }

  /**
   * Make one operation on one path throw an IoError
   */
  failOn(operation: StorageOperation, target: string, code = 'EACCES'): void {
    this.failures.set(
      `${operation}:${target}`,
      new IoError(`Failed to ${operation} ${target}: permission denied`, target, code),
    );
  }

  getDeleted(): string[] {
    return [...this.deleted];
  }

  private maybeFail(operation: StorageOperation, target: string): void {
    const failure = this.failures.get(`${operation}:${target}`);
    if (failure) {
      throw failure;
    }
  }
}
