export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  constructor(
    public code: string,
    public status: number,
    message: string,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = "AppError";
  }
}

export function validationError(message: string, fields?: string[]) {
  return new AppError("VALIDATION_ERROR", 400, message, fields ? { fields } : undefined);
}

export function unauthorized(message = "Missing auth token") {
  return new AppError("UNAUTHORIZED", 401, message);
}

export function forbidden(message = "Only the commissioner can do this") {
  return new AppError("FORBIDDEN", 403, message);
}

export function notFound(message = "Draft not found") {
  return new AppError("DRAFT_NOT_FOUND", 404, message);
}

/** A version check lost to a concurrent write; the caller should refetch. */
export function staleTurn(details: ErrorDetails = {}) {
  return new AppError("STALE_TURN", 409, "Draft state changed; refresh and retry", {
    retryable: true,
    ...details
  });
}

export function rateLimited(retryAfterMs: number) {
  return new AppError("RATE_LIMITED", 429, "Too many pick attempts; slow down.", {
    retry_after_ms: retryAfterMs
  });
}

export function internalError() {
  return new AppError("INTERNAL_ERROR", 500, "Unexpected error");
}

export function errorBody(err: unknown) {
  const appErr = err instanceof AppError ? err : internalError();
  return {
    error: {
      code: appErr.code,
      message: appErr.message,
      ...(appErr.details ? { details: appErr.details } : {})
    }
  };
}
