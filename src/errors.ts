export type OverlayErrorCode =
  | 'PROJECTION_FAILED'
  | 'INVALID_STATE'
  | 'PROBE_FAILED'
  | 'CONFIG_INVALID';

/**
 * Fatal failure raised by the overlay core or its configuration layer.
 * Discovery skips and path collisions never surface as an OverlayError.
 */
export class OverlayError extends Error {
  constructor(
    public readonly code: OverlayErrorCode,
    message: string,
    public readonly hint?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'OverlayError';
  }
}

/**
 * Node reports filesystem failures as objects carrying an errno `code`.
 * Checked structurally: errors from another realm (a test VM context) fail
 * `instanceof Error`.
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
