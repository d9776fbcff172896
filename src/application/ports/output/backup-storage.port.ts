/**
 * File facts needed by relocation and retention
 */
export interface StoredFileInfo {
  path: string;
  sizeBytes: number;
  modifiedAt: Date;
  isFile: boolean;
}

/**
 * Backup Storage Port (Driven Port)
 * Interface for the local filesystem holding exports and backups.
 * Every failure surfaces as an IoError scoped to one path.
 */
export interface BackupStoragePort {
  /**
   * File facts, or null when nothing exists at `path`
   */
  stat(path: string): Promise<StoredFileInfo | null>;

  ensureDir(dir: string): Promise<void>;

  /**
   * Move `sourcePath` to `destPath` so that `destPath` never shows a
   * partially written file. Works across filesystems.
   */
  moveAtomic(sourcePath: string, destPath: string): Promise<void>;

  /**
   * Hex SHA-256 of the file content
   */
  checksum(path: string): Promise<string>;

  /**
   * Regular files directly inside `dir`, or null when `dir` does not exist
   */
  listFiles(dir: string): Promise<StoredFileInfo[] | null>;

  /**
   * Remove a file. Resolves false when it was already gone.
   */
  deleteFile(path: string): Promise<boolean>;
}
