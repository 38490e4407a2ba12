export enum ScreenflowErrorCode {
  UNKNOWN_SESSION = "UNKNOWN_SESSION",
  INVALID_FORMAT = "INVALID_FORMAT",
  UNSUPPORTED_SCHEMA_VERSION = "UNSUPPORTED_SCHEMA_VERSION",
}

export class ScreenflowError extends Error {
  code: ScreenflowErrorCode;

  constructor(code: ScreenflowErrorCode, message: string) {
    super(message);
    this.name = "ScreenflowError";
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A session end arrived for an id that was never started on this side of the
 * transport. Start events were lost or the id was corrupted in transit.
 */
export class UnknownSessionError extends ScreenflowError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(ScreenflowErrorCode.UNKNOWN_SESSION, `Session not found: ${sessionId}`);
    this.name = "UnknownSessionError";
    this.sessionId = sessionId;
  }
}

export class InvalidFormatError extends ScreenflowError {
  readonly fields: Record<string, string[]>;

  constructor(
    message: string,
    fields: Record<string, string[]> = {},
    code: ScreenflowErrorCode = ScreenflowErrorCode.INVALID_FORMAT
  ) {
    super(code, message);
    this.name = "InvalidFormatError";
    this.fields = fields;
  }
}

export function isScreenflowError(value: unknown): value is ScreenflowError {
  return value instanceof ScreenflowError;
}
