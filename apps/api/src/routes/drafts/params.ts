import { AppError, validationError } from "../../errors.js";
import type { CommitFailure, ExpireFailureCode } from "../../services/drafting/draftEngine.js";

export function parseDraftIdParam(raw: string | undefined): number {
  const draftId = Number(raw);
  if (!Number.isInteger(draftId) || draftId <= 0) {
    throw validationError("Invalid draft id", ["id"]);
  }
  return draftId;
}

export function bodyField(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return undefined;
  return key in body ? Object.getOwnPropertyDescriptor(body, key)?.value : undefined;
}

export function parseVersion(value: unknown, required: true): number;
export function parseVersion(value: unknown, required: false): number | undefined;
export function parseVersion(value: unknown, required: boolean): number | undefined {
  if (value === undefined || value === null) {
    if (required) throw validationError("Missing expected_version", ["expected_version"]);
    return undefined;
  }
  const version = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof version !== "number" || !Number.isInteger(version) || version < 0) {
    throw validationError("Invalid expected_version", ["expected_version"]);
  }
  return version;
}

const failureStatus: Record<ExpireFailureCode, number> = {
  DRAFT_NOT_FOUND: 404,
  SESSION_NOT_ACTIVE: 409,
  STALE_TURN: 409,
  NOT_YOUR_TURN: 409,
  NOT_ELIGIBLE: 409,
  REQUEST_ID_CONFLICT: 409,
  TIMER_NOT_EXPIRED: 409,
  NO_ELIGIBLE_ITEM: 409
};

export function commitFailureError(failure: CommitFailure<ExpireFailureCode>): AppError {
  const details: Record<string, unknown> = {};
  if (failure.retryable) details.retryable = true;
  if (failure.reason) details.reason = failure.reason;
  return new AppError(
    failure.code,
    failureStatus[failure.code],
    failure.message,
    Object.keys(details).length > 0 ? details : undefined
  );
}
