import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../../src/config/env.js";

const base = { PORT: "4000", AUTH_SECRET: "test-secret", DRAFT_STORE: "memory" };

describe("loadConfig", () => {
  it("loads required values and applies defaults", () => {
    const cfg = loadConfig(base);
    expect(cfg).toEqual({
      port: 4000,
      authSecret: "test-secret",
      realtimeEnabled: true,
      draftStore: "memory",
      databaseUrl: null,
      catalogFile: null,
      sweeper: { enabled: true, intervalMs: 1000, batchSize: 25 },
      corsAllowedOrigins: []
    });
  });

  it("throws when required vars are missing", () => {
    expect(() => loadConfig({ ...base, PORT: "" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...base, AUTH_SECRET: "" })).toThrow(ConfigError);
  });

  it("validates port as positive integer", () => {
    expect(() => loadConfig({ ...base, PORT: "not-a-number" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...base, PORT: "-1" })).toThrow(ConfigError);
  });

  it("requires DATABASE_URL for the postgres store", () => {
    expect(() => loadConfig({ PORT: "4000", AUTH_SECRET: "test-secret" })).toThrow(
      "Missing required environment variable: DATABASE_URL"
    );
    const cfg = loadConfig({
      PORT: "4000",
      AUTH_SECRET: "test-secret",
      DATABASE_URL: "postgres://localhost/pickroom"
    });
    expect(cfg.draftStore).toBe("postgres");
    expect(cfg.databaseUrl).toBe("postgres://localhost/pickroom");
  });

  it("rejects an unknown store kind", () => {
    expect(() => loadConfig({ ...base, DRAFT_STORE: "redis" })).toThrow(
      "DRAFT_STORE must be postgres or memory, received: redis"
    );
  });

  it("parses sweeper and realtime switches", () => {
    const cfg = loadConfig({
      ...base,
      REALTIME_ENABLED: "off",
      DRAFT_SWEEPER_ENABLED: "false",
      DRAFT_SWEEPER_INTERVAL_MS: "250",
      DRAFT_SWEEPER_BATCH_SIZE: "5",
      CORS_ALLOWED_ORIGINS: "http://a.test, http://b.test,"
    });
    expect(cfg.realtimeEnabled).toBe(false);
    expect(cfg.sweeper).toEqual({ enabled: false, intervalMs: 250, batchSize: 5 });
    expect(cfg.corsAllowedOrigins).toEqual(["http://a.test", "http://b.test"]);
  });

  it("names the variable in boolean and integer errors", () => {
    expect(() => loadConfig({ ...base, REALTIME_ENABLED: "maybe" })).toThrow(
      "REALTIME_ENABLED must be a boolean (true/false), received: maybe"
    );
    expect(() => loadConfig({ ...base, DRAFT_SWEEPER_INTERVAL_MS: "0" })).toThrow(
      "DRAFT_SWEEPER_INTERVAL_MS must be a positive integer, received: 0"
    );
  });
});
