import express from "express";
import type { Router } from "express";
import { requireAuth } from "../auth/middleware.js";
import type { DraftEngine } from "../services/drafting/draftEngine.js";
import { SlidingWindowRateLimiter } from "../utils/rateLimiter.js";
import { buildCreateDraftHandler } from "./drafts/create.js";
import {
  buildPauseDraftHandler,
  buildResumeDraftHandler,
  buildScheduleDraftHandler,
  buildStartDraftHandler
} from "./drafts/lifecycle.js";
import { PICK_RATE_LIMIT, buildListPicksHandler, buildSubmitPickHandler } from "./drafts/picks.js";
import {
  buildDraftResultsHandler,
  buildDraftStandingsHandler,
  buildGetDraftHandler
} from "./drafts/read.js";
import { buildAvailableItemsHandler, buildTickDraftHandler } from "./drafts/runtime.js";

export function createDraftsRouter(
  engine: DraftEngine,
  authSecret: string,
  options: { pickLimiter?: SlidingWindowRateLimiter } = {}
): Router {
  const router = express.Router();
  router.use(requireAuth(authSecret));

  router.post("/", buildCreateDraftHandler(engine));
  router.get("/:id", buildGetDraftHandler(engine));
  router.post("/:id/schedule", buildScheduleDraftHandler(engine));
  router.post("/:id/start", buildStartDraftHandler(engine));
  router.post("/:id/pause", buildPauseDraftHandler(engine));
  router.post("/:id/resume", buildResumeDraftHandler(engine));
  router.post(
    "/:id/picks",
    buildSubmitPickHandler(
      engine,
      options.pickLimiter ?? new SlidingWindowRateLimiter(PICK_RATE_LIMIT)
    )
  );
  router.get("/:id/picks", buildListPicksHandler(engine));
  router.post("/:id/tick", buildTickDraftHandler(engine));
  router.get("/:id/available", buildAvailableItemsHandler(engine));
  router.post("/:id/results", buildDraftResultsHandler(engine));
  router.get("/:id/standings", buildDraftStandingsHandler(engine));

  return router;
}
