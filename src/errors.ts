export type StitchErrorCode =
  | "INVALID_INPUT"
  | "UNSUPPORTED_FORMAT"
  | "RENAME_CONFLICT"
  | "PARTIAL_RENAME_FAILURE"
  | "IO_ERROR";

export type StitchErrorDetails = Record<string, unknown>;

export const EXIT_CODES: Record<StitchErrorCode, number> = {
  IO_ERROR: 1,
  INVALID_INPUT: 2,
  UNSUPPORTED_FORMAT: 3,
  RENAME_CONFLICT: 4,
  PARTIAL_RENAME_FAILURE: 5,
};

export class StitchError extends Error {
  readonly code: StitchErrorCode;
  readonly details?: StitchErrorDetails;

  constructor(message: string, options: { code: StitchErrorCode; details?: StitchErrorDetails; cause?: unknown }) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "StitchError";
    this.code = options.code;
    if (options.details) {
      this.details = options.details;
    }
  }
}

export function isStitchError(err: unknown): err is StitchError {
  return err instanceof StitchError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function exitCodeFor(err: unknown): number {
  return isStitchError(err) ? EXIT_CODES[err.code] : 1;
}

export function invalidInput(message: string, details?: StitchErrorDetails): StitchError {
  return new StitchError(message, { code: "INVALID_INPUT", details });
}

/** Wraps a failed file-system call, keeping StitchErrors as they are. */
export function toIoError(err: unknown, action: string): StitchError {
  if (isStitchError(err)) return err;
  return new StitchError(`Failed to ${action}: ${errorMessage(err)}`, {
    code: "IO_ERROR",
    cause: err,
  });
}
