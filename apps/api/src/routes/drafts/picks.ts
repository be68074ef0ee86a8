import express from "express";
import { participantOf, type AuthedRequest } from "../../auth/middleware.js";
import { rateLimited, validationError } from "../../errors.js";
import type { DraftEngine } from "../../services/drafting/draftEngine.js";
import { SlidingWindowRateLimiter } from "../../utils/rateLimiter.js";
import { bodyField, commitFailureError, parseDraftIdParam, parseVersion } from "./params.js";

export const PICK_RATE_LIMIT = { windowMs: 2000, max: 3 };

function parseRequestId(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  const requestId = String(value).trim();
  if (!requestId) return null;
  if (requestId.length > 128) {
    throw validationError("request_id too long", ["request_id"]);
  }
  return requestId;
}

export function buildSubmitPickHandler(
  engine: DraftEngine,
  limiter = new SlidingWindowRateLimiter(PICK_RATE_LIMIT)
) {
  return async function handleSubmitPick(
    req: AuthedRequest,
    res: express.Response,
    next: express.NextFunction
  ) {
    try {
      const draftId = parseDraftIdParam(req.params.id);
      const participantId = participantOf(req);
      const body: unknown = req.body;

      const itemId = bodyField(body, "item_id");
      if (typeof itemId !== "string" || itemId.trim() === "") {
        throw validationError("Missing item_id", ["item_id"]);
      }
      const expectedVersion = parseVersion(bodyField(body, "expected_version"), true);
      const requestId = parseRequestId(bodyField(body, "request_id"));

      const decision = limiter.attempt(`${draftId}:${participantId}`);
      if (!decision.allowed) {
        res.setHeader(
          "Retry-After",
          String(Math.max(1, Math.ceil(decision.retryAfterMs / 1000)))
        );
        throw rateLimited(decision.retryAfterMs);
      }

      const result = await engine.commit({
        draft_id: draftId,
        participant_id: participantId,
        item_id: itemId.trim(),
        expected_version: expectedVersion,
        request_id: requestId
      });
      if (!result.ok) throw commitFailureError(result);
      return res.status(result.reused ? 200 : 201).json({
        selection: result.selection,
        draft: result.session,
        reused: result.reused
      });
    } catch (err) {
      next(err);
    }
  };
}

export function buildListPicksHandler(engine: DraftEngine) {
  return async function handleListPicks(
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ) {
    try {
      const selections = await engine.listSelections(parseDraftIdParam(req.params.id));
      return res.status(200).json({ selections });
    } catch (err) {
      next(err);
    }
  };
}
