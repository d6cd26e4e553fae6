/** ---------- Error types shared by generators, engines and surfaces ---------- */

export type ErrorCode = "invalid_request" | "not_found" | "storage" | "internal";

export class HealthSimError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode = "internal") {
    super(message);
    this.name = "HealthSimError";
    this.code = code;
  }
}

/** Constraint or payload the caller can fix. */
export class InvalidRequestError extends HealthSimError {
  constructor(message: string) {
    super(message, "invalid_request");
    this.name = "InvalidRequestError";
  }
}

export class NotFoundError extends HealthSimError {
  constructor(message: string) {
    super(message, "not_found");
    this.name = "NotFoundError";
  }
}

export function httpStatusFor(err: unknown): 400 | 404 | 500 {
  if (err instanceof InvalidRequestError) return 400;
  if (err instanceof NotFoundError) return 404;
  return 500;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
