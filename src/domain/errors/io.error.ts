/**
 * Filesystem failure during relocation or cleanup. Scoped to a single file.
 */
export class IoError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'IoError';
  }

  static from(error: unknown, path: string, action: string): IoError {
    if (error instanceof IoError) {
      return error;
    }

    const code = errnoCode(error);
    const reason = error instanceof Error ? error.message : String(error);
    return new IoError(`Failed to ${action} ${path}: ${reason}`, path, code, { cause: error });
  }
}

export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
