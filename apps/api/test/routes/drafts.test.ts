import request from "supertest";
import { describe, expect, it } from "vitest";
import { signToken } from "../../src/auth/token.js";
import { createServer } from "../../src/server.js";
import { SlidingWindowRateLimiter } from "../../src/utils/rateLimiter.js";
import { COMMISSIONER, createEngineHarness } from "../support/drafts.js";

const SECRET = "test-secret";

function bearer(participantId: string) {
  return `Bearer ${signToken({ sub: participantId }, SECRET)}`;
}

function setup(limit = 100) {
  const harness = createEngineHarness();
  const app = createServer({
    engine: harness.engine,
    authSecret: SECRET,
    pickLimiter: new SlidingWindowRateLimiter({ windowMs: 60_000, max: limit })
  });
  return { ...harness, app };
}

async function createAndStart(
  app: ReturnType<typeof setup>["app"],
  body: Record<string, unknown> = {}
): Promise<number> {
  const created = await request(app)
    .post("/drafts")
    .set("Authorization", bearer(COMMISSIONER))
    .send({ pool_id: "open", order: ["P1", "P2"], rounds_total: 2, ...body });
  expect(created.status).toBe(201);
  const id: number = created.body.draft.id;
  const started = await request(app)
    .post(`/drafts/${id}/start`)
    .set("Authorization", bearer(COMMISSIONER))
    .send({});
  expect(started.status).toBe(200);
  return id;
}

describe("drafts routes", () => {
  it("requires a token", async () => {
    const { app } = setup();
    const res = await request(app).get("/drafts/1");
    expect(res.status).toBe(401);
    expect(res.body.error.code).toBe("UNAUTHORIZED");
  });

  it("creates a pending draft owned by the caller", async () => {
    const { app } = setup();
    const res = await request(app)
      .post("/drafts")
      .set("Authorization", bearer(COMMISSIONER))
      .send({ pool_id: "open", order: ["P1", "P2"], rounds_total: 2 });
    expect(res.status).toBe(201);
    expect(res.headers.location).toBe("/drafts/1");
    expect(res.body.draft).toMatchObject({
      id: 1,
      status: "PENDING",
      version: 0,
      total_picks: 4,
      config: { commissioner_id: COMMISSIONER, discipline: "SERPENTINE" }
    });
  });

  it("rejects an invalid configuration", async () => {
    const { app } = setup();
    const res = await request(app)
      .post("/drafts")
      .set("Authorization", bearer(COMMISSIONER))
      .send({ pool_id: "open", order: ["P1", "P1"], rounds_total: 2 });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "order contains duplicate participants",
        details: { fields: ["order"] }
      }
    });
  });

  it("answers malformed JSON with a validation error", async () => {
    const { app } = setup();
    const res = await request(app)
      .post("/drafts")
      .set("Authorization", bearer(COMMISSIONER))
      .set("Content-Type", "application/json")
      .send("{ nope");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: { code: "VALIDATION_ERROR", message: "Malformed JSON body" }
    });
  });

  it("only lets the commissioner start the draft", async () => {
    const { app } = setup();
    const created = await request(app)
      .post("/drafts")
      .set("Authorization", bearer(COMMISSIONER))
      .send({ pool_id: "open", order: ["P1", "P2"], rounds_total: 2 });
    const res = await request(app)
      .post(`/drafts/${created.body.draft.id}/start`)
      .set("Authorization", bearer("P1"))
      .send({});
    expect(res.status).toBe(403);
    expect(res.body.error.code).toBe("FORBIDDEN");
  });

  it("reports missing drafts and bad ids", async () => {
    const { app } = setup();
    const missing = await request(app).get("/drafts/99").set("Authorization", bearer("P1"));
    expect(missing.status).toBe(404);
    expect(missing.body.error).toEqual({ code: "DRAFT_NOT_FOUND", message: "Draft not found" });

    const bad = await request(app).get("/drafts/abc").set("Authorization", bearer("P1"));
    expect(bad.status).toBe(400);
    expect(bad.body.error.message).toBe("Invalid draft id");
  });

  it("commits picks and maps rejections to 409 codes", async () => {
    const { app } = setup();
    const id = await createAndStart(app);

    const wrongTurn = await request(app)
      .post(`/drafts/${id}/picks`)
      .set("Authorization", bearer("P2"))
      .send({ item_id: "i1", expected_version: 1 });
    expect(wrongTurn.status).toBe(409);
    expect(wrongTurn.body).toEqual({
      error: { code: "NOT_YOUR_TURN", message: "It is not your turn" }
    });

    const stale = await request(app)
      .post(`/drafts/${id}/picks`)
      .set("Authorization", bearer("P1"))
      .send({ item_id: "i1", expected_version: 0 });
    expect(stale.status).toBe(409);
    expect(stale.body.error).toMatchObject({ code: "STALE_TURN", details: { retryable: true } });

    const pick = await request(app)
      .post(`/drafts/${id}/picks`)
      .set("Authorization", bearer("P1"))
      .send({ item_id: "i1", expected_version: 1, request_id: "r1" });
    expect(pick.status).toBe(201);
    expect(pick.body).toMatchObject({
      reused: false,
      selection: { overall_pick_number: 1, picker_id: "P1", item_id: "i1" },
      draft: { version: 2, current_picker_id: "P2", picks_made: 1 }
    });

    const retry = await request(app)
      .post(`/drafts/${id}/picks`)
      .set("Authorization", bearer("P1"))
      .send({ item_id: "i1", expected_version: 1, request_id: "r1" });
    expect(retry.status).toBe(200);
    expect(retry.body.reused).toBe(true);

    const taken = await request(app)
      .post(`/drafts/${id}/picks`)
      .set("Authorization", bearer("P2"))
      .send({ item_id: "i1", expected_version: 2 });
    expect(taken.status).toBe(409);
    expect(taken.body.error).toEqual({
      code: "NOT_ELIGIBLE",
      message: "Item has already been selected",
      details: { reason: "ALREADY_OWNED" }
    });

    const picks = await request(app).get(`/drafts/${id}/picks`).set("Authorization", bearer("P2"));
    expect(picks.body.selections).toHaveLength(1);

    const available = await request(app)
      .get(`/drafts/${id}/available`)
      .set("Authorization", bearer("P2"));
    expect(available.status).toBe(200);
    expect(available.body.items).toHaveLength(11);
    expect(available.body.items[0].id).toBe("i2");

    const filtered = await request(app)
      .get(`/drafts/${id}/available`)
      .query({ q: "item 1" })
      .set("Authorization", bearer("P2"));
    expect(filtered.body.items.map((item: { id: string }) => item.id)).toEqual([
      "i10",
      "i11",
      "i12"
    ]);
  });

  it("validates the pick body", async () => {
    const { app } = setup();
    const id = await createAndStart(app);
    const noVersion = await request(app)
      .post(`/drafts/${id}/picks`)
      .set("Authorization", bearer("P1"))
      .send({ item_id: "i1" });
    expect(noVersion.status).toBe(400);
    expect(noVersion.body.error.details).toEqual({ fields: ["expected_version"] });

    const longRequestId = await request(app)
      .post(`/drafts/${id}/picks`)
      .set("Authorization", bearer("P1"))
      .send({ item_id: "i1", expected_version: 1, request_id: "x".repeat(129) });
    expect(longRequestId.status).toBe(400);
    expect(longRequestId.body.error.details).toEqual({ fields: ["request_id"] });
  });

  it("rate limits pick attempts per participant", async () => {
    const { app } = setup(2);
    const id = await createAndStart(app);
    const attempt = () =>
      request(app)
        .post(`/drafts/${id}/picks`)
        .set("Authorization", bearer("P1"))
        .send({ item_id: "i1", expected_version: 0 });

    expect((await attempt()).status).toBe(409);
    expect((await attempt()).status).toBe(409);
    const limited = await attempt();
    expect(limited.status).toBe(429);
    expect(limited.body.error.code).toBe("RATE_LIMITED");
    expect(Number(limited.headers["retry-after"])).toBeGreaterThan(0);

    const other = await request(app)
      .post(`/drafts/${id}/picks`)
      .set("Authorization", bearer("P2"))
      .send({ item_id: "i1", expected_version: 1 });
    expect(other.status).toBe(409);
  });

  it("auto-selects through the tick endpoint once the turn expires", async () => {
    const { app, time } = setup();
    const id = await createAndStart(app, { turn_budget_seconds: 30 });

    const early = await request(app)
      .post(`/drafts/${id}/tick`)
      .set("Authorization", bearer("P2"))
      .send({ expected_version: 1 });
    expect(early.status).toBe(409);
    expect(early.body.error.code).toBe("TIMER_NOT_EXPIRED");

    time.advanceSeconds(30);
    const tick = await request(app)
      .post(`/drafts/${id}/tick`)
      .set("Authorization", bearer("P2"))
      .send({ expected_version: 1 });
    expect(tick.status).toBe(201);
    expect(tick.body.selection).toMatchObject({
      picker_id: "P1",
      item_id: "i1",
      was_auto_selected: true
    });
    expect(tick.body.draft.version).toBe(2);
  });

  it("pauses and resumes through the lifecycle endpoints", async () => {
    const { app } = setup();
    const id = await createAndStart(app, { turn_budget_seconds: 30 });
    const paused = await request(app)
      .post(`/drafts/${id}/pause`)
      .set("Authorization", bearer(COMMISSIONER))
      .send({ expected_version: 1 });
    expect(paused.status).toBe(200);
    expect(paused.body.draft).toMatchObject({ status: "PAUSED", remaining_seconds: 30 });

    const resumed = await request(app)
      .post(`/drafts/${id}/resume`)
      .set("Authorization", bearer(COMMISSIONER))
      .send({});
    expect(resumed.body.draft).toMatchObject({ status: "IN_PROGRESS", version: 3 });
  });

  it("schedules with an ISO timestamp", async () => {
    const { app } = setup();
    const created = await request(app)
      .post("/drafts")
      .set("Authorization", bearer(COMMISSIONER))
      .send({ pool_id: "open", order: ["P1", "P2"], rounds_total: 2 });
    const res = await request(app)
      .post(`/drafts/${created.body.draft.id}/schedule`)
      .set("Authorization", bearer(COMMISSIONER))
      .send({ scheduled_at: "2024-03-01T20:00:00.000Z" });
    expect(res.status).toBe(200);
    expect(res.body.draft).toMatchObject({
      status: "SCHEDULED",
      scheduled_at: "2024-03-01T20:00:00.000Z"
    });

    const bad = await request(app)
      .post(`/drafts/${created.body.draft.id}/schedule`)
      .set("Authorization", bearer(COMMISSIONER))
      .send({ scheduled_at: "soon" });
    expect(bad.status).toBe(400);
  });

  it("records results and serves standings", async () => {
    const { app } = setup();
    const id = await createAndStart(app, { rounds_total: 1 });
    for (const [participant, item, version] of [
      ["P1", "i1", 1],
      ["P2", "i2", 2]
    ] as const) {
      const res = await request(app)
        .post(`/drafts/${id}/picks`)
        .set("Authorization", bearer(participant))
        .send({ item_id: item, expected_version: version });
      expect(res.status).toBe(201);
    }

    const forbidden = await request(app)
      .post(`/drafts/${id}/results`)
      .set("Authorization", bearer("P1"))
      .send({ results: [{ item_id: "i1", value: 10 }] });
    expect(forbidden.status).toBe(403);

    const recorded = await request(app)
      .post(`/drafts/${id}/results`)
      .set("Authorization", bearer(COMMISSIONER))
      .send({
        results: [
          { item_id: "i1", value: 2 },
          { item_id: "i2", value: 7 }
        ]
      });
    expect(recorded.status).toBe(200);
    expect(recorded.body.results).toEqual([
      { draft_id: id, item_id: "i1", value: 2, won: null },
      { draft_id: id, item_id: "i2", value: 7, won: null }
    ]);

    const standings = await request(app)
      .get(`/drafts/${id}/standings`)
      .set("Authorization", bearer("P1"));
    expect(standings.status).toBe(200);
    expect(
      standings.body.standings.map((s: { participant_id: string; rank: number }) => [
        s.participant_id,
        s.rank
      ])
    ).toEqual([
      ["P2", 1],
      ["P1", 2]
    ]);
  });
});
