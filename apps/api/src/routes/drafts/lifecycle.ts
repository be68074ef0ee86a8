import express from "express";
import { participantOf, type AuthedRequest } from "../../auth/middleware.js";
import { validationError } from "../../errors.js";
import type { DraftEngine, DraftSessionView } from "../../services/drafting/draftEngine.js";
import { bodyField, parseDraftIdParam, parseVersion } from "./params.js";

type LifecycleInput = { draft_id: number; actor_id: string; expected_version?: number };

function buildLifecycleHandler(run: (input: LifecycleInput) => Promise<DraftSessionView>) {
  return async function handleLifecycle(
    req: AuthedRequest,
    res: express.Response,
    next: express.NextFunction
  ) {
    try {
      const body: unknown = req.body;
      const draft = await run({
        draft_id: parseDraftIdParam(req.params.id),
        actor_id: participantOf(req),
        expected_version: parseVersion(bodyField(body, "expected_version"), false)
      });
      return res.status(200).json({ draft });
    } catch (err) {
      next(err);
    }
  };
}

function parseScheduledAt(value: unknown): Date | null {
  if (value === null) return null;
  if (typeof value !== "string" || value.trim() === "") {
    throw validationError("scheduled_at must be an ISO timestamp or null", ["scheduled_at"]);
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw validationError("scheduled_at must be an ISO timestamp or null", ["scheduled_at"]);
  }
  return date;
}

export function buildScheduleDraftHandler(engine: DraftEngine) {
  return async function handleScheduleDraft(
    req: AuthedRequest,
    res: express.Response,
    next: express.NextFunction
  ) {
    try {
      const body: unknown = req.body;
      const draft = await engine.scheduleSession({
        draft_id: parseDraftIdParam(req.params.id),
        actor_id: participantOf(req),
        scheduled_at: parseScheduledAt(bodyField(body, "scheduled_at")),
        expected_version: parseVersion(bodyField(body, "expected_version"), false)
      });
      return res.status(200).json({ draft });
    } catch (err) {
      next(err);
    }
  };
}

export function buildStartDraftHandler(engine: DraftEngine) {
  return buildLifecycleHandler((input) => engine.startSession(input));
}

export function buildPauseDraftHandler(engine: DraftEngine) {
  return buildLifecycleHandler((input) => engine.pauseSession(input));
}

export function buildResumeDraftHandler(engine: DraftEngine) {
  return buildLifecycleHandler((input) => engine.resumeSession(input));
}
