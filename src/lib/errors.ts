export const ErrorCode = {
  INVALID_INPUT: "INVALID_INPUT",
  MISSING_PRECONDITION: "MISSING_PRECONDITION",
  NOT_FOUND: "NOT_FOUND",
  PROVIDER_ERROR: "PROVIDER_ERROR",
  RATE_LIMITED: "RATE_LIMITED",
  TIMEOUT: "TIMEOUT",
  UNAUTHORIZED: "UNAUTHORIZED",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class DeskError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "DeskError";
  }
}

export function createError(code: ErrorCode, message: string, details?: Record<string, unknown>): DeskError {
  return new DeskError(code, message, details);
}

export function isDeskError(error: unknown, code?: ErrorCode): error is DeskError {
  if (!(error instanceof DeskError)) return false;
  return code === undefined || error.code === code;
}

/** Bad or missing caller input; the run aborts without a decision. */
export function isPreconditionError(error: unknown): error is DeskError {
  return isDeskError(error, ErrorCode.MISSING_PRECONDITION) || isDeskError(error, ErrorCode.INVALID_INPUT);
}

export function getErrorCode(error: unknown): string | null {
  if (!error || typeof error !== "object" || !("code" in error)) return null;
  return typeof error.code === "string" ? error.code : null;
}
