import express from "express";
import { participantOf, type AuthedRequest } from "../../auth/middleware.js";
import type { DraftEngine } from "../../services/drafting/draftEngine.js";

export function buildCreateDraftHandler(engine: DraftEngine) {
  return async function handleCreateDraft(
    req: AuthedRequest,
    res: express.Response,
    next: express.NextFunction
  ) {
    try {
      const draft = await engine.createSession(req.body, participantOf(req));
      return res.status(201).location(`${req.baseUrl}/${draft.id}`).json({ draft });
    } catch (err) {
      next(err);
    }
  };
}
