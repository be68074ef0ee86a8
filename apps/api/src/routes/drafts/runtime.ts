import { includesNormalized } from "@pickroom/shared";
import express from "express";
import { participantOf, type AuthedRequest } from "../../auth/middleware.js";
import type { DraftEngine } from "../../services/drafting/draftEngine.js";
import { bodyField, commitFailureError, parseDraftIdParam, parseVersion } from "./params.js";

/**
 * Any authenticated observer may report an expired turn; the version check
 * lets exactly one report per turn through.
 */
export function buildTickDraftHandler(engine: DraftEngine) {
  return async function handleTickDraft(
    req: AuthedRequest,
    res: express.Response,
    next: express.NextFunction
  ) {
    try {
      const draftId = parseDraftIdParam(req.params.id);
      const body: unknown = req.body;
      const result = await engine.expireTurn({
        draft_id: draftId,
        expected_version: parseVersion(bodyField(body, "expected_version"), true)
      });
      if (!result.ok) throw commitFailureError(result);
      return res.status(201).json({ selection: result.selection, draft: result.session });
    } catch (err) {
      next(err);
    }
  };
}

export function buildAvailableItemsHandler(engine: DraftEngine) {
  return async function handleAvailableItems(
    req: AuthedRequest,
    res: express.Response,
    next: express.NextFunction
  ) {
    try {
      const items = await engine.availableItems(
        parseDraftIdParam(req.params.id),
        participantOf(req)
      );
      // Optional label filter, case- and accent-insensitive.
      const q = typeof req.query.q === "string" ? req.query.q : "";
      return res
        .status(200)
        .json({ items: items.filter((item) => includesNormalized(item.label, q)) });
    } catch (err) {
      next(err);
    }
  };
}
