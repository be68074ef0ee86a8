const LEVELS = ["error", "warn", "info", "debug"] as const;
type Level = (typeof LEVELS)[number];

export type DraftContext = {
  draft_id?: string | number;
  user_id?: string | number;
};

export type LogEntry = {
  level: Level;
  msg: string;
  [key: string]: unknown;
};

export function isTestRuntime(): boolean {
  return (
    process.env.NODE_ENV === "test" ||
    process.env.VITEST === "true" ||
    typeof process.env.VITEST_WORKER_ID === "string"
  );
}

/** Highest level index that prints; -1 is silent. */
function threshold(): number {
  const raw = String(process.env.LOG_LEVEL || "").toLowerCase();
  if (raw === "silent") return -1;
  const index = LEVELS.findIndex((level) => level === raw);
  if (index >= 0) return index;
  return isTestRuntime() ? -1 : LEVELS.indexOf("info");
}

export function shouldLog(level: Level): boolean {
  return LEVELS.indexOf(level) <= threshold();
}

function wantsPrettyOutput(): boolean {
  const raw = String(process.env.LOG_FORMAT || "").toLowerCase();
  if (raw === "json") return false;
  if (raw === "pretty") return true;
  return isTestRuntime();
}

function formatKeyValue(key: string, value: unknown): string {
  if (value === undefined) return "";
  if (value === null) return `${key}=null`;
  if (typeof value === "string") return `${key}="${value}"`;
  if (typeof value === "number" || typeof value === "boolean") return `${key}=${value}`;
  try {
    return `${key}=${JSON.stringify(value)}`;
  } catch {
    return `${key}=[unserializable]`;
  }
}

function field(rest: Record<string, unknown>, key: string, fallback = "?"): string {
  const value = rest[key];
  return value === undefined || value === null || value === "" ? fallback : String(value);
}

// Engine lines lead with draft, pick and version so a session reads top to bottom.
const DRAFT_LEAD_KEYS = ["draft_id", "pick_number", "user_id", "version"];

export function formatPrettyLine(entry: LogEntry): string {
  const { level, msg, ...rest } = entry;
  const head = level.toUpperCase();

  if (msg === "request") {
    const duration =
      typeof rest.duration_ms === "number" ? `${rest.duration_ms}ms` : "?ms";
    const extras = ["draft_id", "user_id"]
      .filter((key) => rest[key] !== undefined)
      .map((key) => formatKeyValue(key, rest[key]));
    return `${head} ${field(rest, "method")} ${field(rest, "path")} -> ${field(rest, "status")} (${duration})${extras.length ? ` ${extras.join(" ")}` : ""}`;
  }

  if (msg === "request_error") {
    return `${head} ${field(rest, "method")} ${field(rest, "path")} -> ${field(rest, "status")} code=${field(rest, "code", "UNKNOWN")} error="${field(rest, "error", "Unknown error")}"`;
  }

  const lead = msg.startsWith("draft_")
    ? DRAFT_LEAD_KEYS.filter((key) => rest[key] !== undefined)
    : [];
  const others = Object.keys(rest)
    .filter((key) => !lead.includes(key))
    .sort();
  const extras = [...lead, ...others]
    .map((key) => formatKeyValue(key, rest[key]))
    .filter(Boolean)
    .join(" ");
  return `${head} ${msg}${extras ? ` ${extras}` : ""}`;
}

export function log(entry: LogEntry) {
  if (!shouldLog(entry.level)) return;
  console.log(wantsPrettyOutput() ? formatPrettyLine(entry) : JSON.stringify(entry));
}

/** `error` / `error_name` fields for a caught value of any shape. */
export function errorFields(err: unknown): { error: string; error_name?: string } {
  if (err instanceof Error) return { error: err.message, error_name: err.name };
  return { error: String(err) };
}

function pickFirst(
  obj: Record<string, unknown>,
  keys: string[]
): string | number | undefined {
  for (const key of keys) {
    const value = obj[key];
    if (typeof value === "number") return value;
    if (typeof value === "string" && value) return value;
  }
  return undefined;
}

export function deriveDraftContext(body: unknown): DraftContext {
  if (!body || typeof body !== "object" || Array.isArray(body)) return {};
  const record: Record<string, unknown> = { ...body };
  const context: DraftContext = {};
  const draftId = pickFirst(record, ["draft_id", "draftId", "sessionId"]);
  const userId = pickFirst(record, ["user_id", "userId", "participant_id", "participantId"]);
  if (draftId !== undefined) context.draft_id = draftId;
  if (userId !== undefined) context.user_id = userId;
  return context;
}

export function buildRequestLog(input: {
  method: string;
  path: string;
  status: number;
  duration_ms: number;
  body?: unknown;
}): LogEntry {
  return {
    level: "info",
    msg: "request",
    method: input.method,
    path: input.path,
    status: input.status,
    duration_ms: input.duration_ms,
    ...deriveDraftContext(input.body)
  };
}
