import type { ErrorResponse, JsonValue } from "./types.js";

export enum ErrorCode {
  INVALID_ARGS = "INVALID_ARGS",
  INVALID_IP = "INVALID_IP",
  LOOKUP_FAILED = "LOOKUP_FAILED",
  TIMEOUT = "TIMEOUT",
  INTERRUPTED = "INTERRUPTED",
  INTERNAL_ERROR = "INTERNAL_ERROR"
}

export const EXIT_CODE_BY_ERROR: Record<string, number> = {
  [ErrorCode.INVALID_ARGS]: 2,
  [ErrorCode.INVALID_IP]: 2,
  [ErrorCode.LOOKUP_FAILED]: 4,
  [ErrorCode.TIMEOUT]: 10,
  [ErrorCode.INTERRUPTED]: 1,
  [ErrorCode.INTERNAL_ERROR]: 1
};

export class LookupError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, JsonValue>;
  readonly suggestion?: string;

  constructor(
    code: ErrorCode,
    message: string,
    details: Record<string, JsonValue> = {},
    suggestion?: string | null
  ) {
    super(message);
    this.name = "LookupError";
    this.code = code;
    this.details = details;
    this.suggestion = suggestion ?? undefined;
  }

  get exitCode(): number {
    return EXIT_CODE_BY_ERROR[this.code] ?? 1;
  }

  toErrorPayload(): ErrorResponse {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      suggestion: this.suggestion
    };
  }
}

/** Wrap anything thrown so callers can always report a code. */
export function toLookupError(err: unknown): LookupError {
  if (err instanceof LookupError) {
    return err;
  }
  return new LookupError(ErrorCode.INTERNAL_ERROR, errorMessage(err));
}

export function interruptedError(): LookupError {
  return new LookupError(ErrorCode.INTERRUPTED, "Operation cancelled by user");
}

/** Human-readable message for anything thrown. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
