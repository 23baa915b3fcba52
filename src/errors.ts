/**
 * Error taxonomy shared by the streaming service.
 *
 * Startup failures (`ConfigurationError`, `ResourceError`) propagate to the caller.
 * Steady-state failures (`TransientIOError`) are logged and absorbed by the capture loop.
 */
export class SeatstreamError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed seating file, calibration file, endpoint or option. */
export class ConfigurationError extends SeatstreamError {}

/** A socket, camera or provider could not be opened. */
export class ResourceError extends SeatstreamError {}

/** One dropped frame or connection; never fatal. */
export class TransientIOError extends SeatstreamError {}

/** A seat set or frame that violates the data model invariants. */
export class ValidationError extends SeatstreamError {}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}

export function isFileNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
