/**
 * A backup with the same deterministic name already exists but its content
 * differs from the export being relocated.
 */
export class ConflictError extends Error {
  constructor(
    message: string,
    public readonly sourcePath: string,
    public readonly destPath: string,
  ) {
    super(message);
    this.name = 'ConflictError';
  }
}
