/**
 * transport - no HTTP response (connection refused, timeout, DNS)
 * status    - the NVR answered with a non-success status
 * malformed - the NVR answered 2xx with a body we could not understand
 */
export type ApiErrorKind = 'transport' | 'status' | 'malformed';

/**
 * Failure talking to the NVR export API.
 * Recorded per job; never aborts the batch on its own.
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public readonly kind: ApiErrorKind,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ApiError';
  }

  isTransport(): boolean {
    return this.kind === 'transport';
  }
}

/**
 * The very first export submission could not reach the NVR at all.
 * Run-fatal.
 */
export class ApiUnavailableError extends ApiError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'transport', undefined, options);
    this.name = 'ApiUnavailableError';
  }
}
