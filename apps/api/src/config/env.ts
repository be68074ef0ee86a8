export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function requireEnv(env: NodeJS.ProcessEnv, key: string): string {
  const value = env[key];
  if (!value || value.trim() === "") {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function parsePort(portValue: string): number {
  const parsed = Number(portValue);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`PORT must be a positive integer, received: ${portValue}`);
  }
  return parsed;
}

export type DraftStoreKind = "postgres" | "memory";

export type ApiConfig = {
  port: number;
  authSecret: string;
  realtimeEnabled: boolean;
  draftStore: DraftStoreKind;
  databaseUrl: string | null;
  /** JSON catalog loaded by the in-memory store; bundled sample when unset. */
  catalogFile: string | null;
  sweeper: {
    enabled: boolean;
    intervalMs: number;
    batchSize: number;
  };
  corsAllowedOrigins: string[];
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const port = parsePort(requireEnv(env, "PORT"));
  const authSecret = requireEnv(env, "AUTH_SECRET");
  const realtimeEnabled = parseOptionalBool(env, "REALTIME_ENABLED", true);
  const draftStore = parseStoreKind(env.DRAFT_STORE);
  const databaseUrl =
    draftStore === "postgres" ? requireEnv(env, "DATABASE_URL") : (env.DATABASE_URL ?? null);
  return {
    port,
    authSecret,
    realtimeEnabled,
    draftStore,
    databaseUrl,
    catalogFile: env.CATALOG_FILE?.trim() || null,
    sweeper: {
      enabled: parseOptionalBool(env, "DRAFT_SWEEPER_ENABLED", true),
      intervalMs: parseOptionalPositiveInt(env, "DRAFT_SWEEPER_INTERVAL_MS", 1000),
      batchSize: parseOptionalPositiveInt(env, "DRAFT_SWEEPER_BATCH_SIZE", 25)
    },
    corsAllowedOrigins: parseList(env.CORS_ALLOWED_ORIGINS)
  };
}

function parseStoreKind(value: string | undefined): DraftStoreKind {
  if (value === undefined || value.trim() === "") return "postgres";
  const normalized = value.trim().toLowerCase();
  if (normalized === "postgres" || normalized === "memory") return normalized;
  throw new ConfigError(`DRAFT_STORE must be postgres or memory, received: ${value}`);
}

function parseList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function parseOptionalPositiveInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number
): number {
  const value = env[key];
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${key} must be a positive integer, received: ${value}`);
  }
  return parsed;
}

export function parseOptionalBool(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: boolean
): boolean {
  const value = env[key];
  if (value === undefined || value.trim() === "") return fallback;
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`${key} must be a boolean (true/false), received: ${value}`);
}
