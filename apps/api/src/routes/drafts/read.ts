import express from "express";
import { participantOf, type AuthedRequest } from "../../auth/middleware.js";
import { validationError } from "../../errors.js";
import type { DraftEngine, ItemResultInput } from "../../services/drafting/draftEngine.js";
import { bodyField, parseDraftIdParam } from "./params.js";

export function buildGetDraftHandler(engine: DraftEngine) {
  return async function handleGetDraft(
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ) {
    try {
      const draft = await engine.getSession(parseDraftIdParam(req.params.id));
      return res.status(200).json({ draft });
    } catch (err) {
      next(err);
    }
  };
}

function parseResults(raw: unknown): ItemResultInput[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw validationError("results must be a non-empty list", ["results"]);
  }
  return raw.map((entry) => {
    const itemId = bodyField(entry, "item_id");
    const value = bodyField(entry, "value") ?? null;
    const won = bodyField(entry, "won") ?? null;
    if (typeof itemId !== "string" || itemId.trim() === "") {
      throw validationError("Each result needs an item_id", ["results.item_id"]);
    }
    if (value !== null && (typeof value !== "number" || !Number.isFinite(value))) {
      throw validationError("value must be a number or null", ["results.value"]);
    }
    if (won !== null && typeof won !== "boolean") {
      throw validationError("won must be a boolean or null", ["results.won"]);
    }
    return { item_id: itemId.trim(), value, won };
  });
}

export function buildDraftResultsHandler(engine: DraftEngine) {
  return async function handleDraftResults(
    req: AuthedRequest,
    res: express.Response,
    next: express.NextFunction
  ) {
    try {
      const body: unknown = req.body;
      const results = await engine.recordResults({
        draft_id: parseDraftIdParam(req.params.id),
        actor_id: participantOf(req),
        results: parseResults(bodyField(body, "results"))
      });
      return res.status(200).json({ results });
    } catch (err) {
      next(err);
    }
  };
}

export function buildDraftStandingsHandler(engine: DraftEngine) {
  return async function handleDraftStandings(
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ) {
    try {
      const standings = await engine.standings(parseDraftIdParam(req.params.id));
      return res.status(200).json({ standings });
    } catch (err) {
      next(err);
    }
  };
}
