/**
 * Invalid or contradictory run parameters.
 * Always fatal: raised before any call reaches the NVR.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
