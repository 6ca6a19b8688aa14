export type LayoutActionErrorCode =
  | 'INVALID_LENGTH'
  | 'INVALID_FONT_INDEX'
  | 'SINK_WRITE_FAILED'
  | 'BUFFER_FINALIZED';

/**
 * Structured error raised by the layout action contracts and the action buffer.
 *
 * Consumers should prefer checking `error.code` over `instanceof` when the error may
 * cross package boundaries.
 */
export class LayoutActionError extends Error {
  readonly code: LayoutActionErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: LayoutActionErrorCode, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LayoutActionError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, LayoutActionError.prototype);
  }
}

export const isLayoutActionError = (error: unknown): error is LayoutActionError =>
  error instanceof LayoutActionError;
