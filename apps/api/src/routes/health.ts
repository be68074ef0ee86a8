import express from "express";
import type { Router } from "express";

export type HealthOptions = {
  service?: string;
  clock?: () => Date;
};

/**
 * `server_time` lets clients line their countdowns up with the clock that
 * stamps `turn_started_at`.
 */
export function createHealthRouter(options: HealthOptions = {}): Router {
  const service = options.service ?? "pickroom-api";
  const clock = options.clock ?? (() => new Date());
  const router = express.Router();
  router.get("/", (_req, res) => {
    res.json({ ok: true, service, status: "healthy", server_time: clock().toISOString() });
  });
  return router;
}
