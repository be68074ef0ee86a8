import { isDraftDiscipline } from "@pickroom/shared";
import { DEFAULT_RANDOM_SEED } from "./autoPickStrategies.js";
import type {
  AutoPickPolicy,
  DraftConfiguration,
  EligibilityPolicy,
  ScoringRules,
  TiebreakMetric
} from "../data/repositories/draftRepository/types.js";

export class DraftConfigError extends Error {
  constructor(
    message: string,
    public fields: string[]
  ) {
    super(message);
    this.name = "DraftConfigError";
  }
}

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(obj: UnknownRecord, key: string, field = key): string {
  const value = obj[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new DraftConfigError(`${field} must be a non-empty string`, [field]);
  }
  return value.trim();
}

function optionalBool(obj: UnknownRecord, key: string, field: string): boolean {
  const value = obj[key];
  if (value === undefined || value === null) return false;
  if (typeof value !== "boolean") {
    throw new DraftConfigError(`${field} must be a boolean`, [field]);
  }
  return value;
}

function parseOrder(raw: unknown): string[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new DraftConfigError("order must be a non-empty list", ["order"]);
  }
  const order: string[] = [];
  for (const entry of raw) {
    if (typeof entry !== "string" || entry.trim() === "") {
      throw new DraftConfigError("order entries must be participant ids", ["order"]);
    }
    order.push(entry.trim());
  }
  if (new Set(order).size !== order.length) {
    throw new DraftConfigError("order contains duplicate participants", ["order"]);
  }
  return order;
}

function parseEligibility(raw: unknown): EligibilityPolicy {
  if (!isRecord(raw)) {
    return { mode: "OPEN_POOL", allow_shared_ownership: false };
  }
  switch (raw.mode) {
    case undefined:
    case "OPEN_POOL":
      return {
        mode: "OPEN_POOL",
        allow_shared_ownership: optionalBool(
          raw,
          "allow_shared_ownership",
          "eligibility.allow_shared_ownership"
        )
      };
    case "CATEGORY_ANY":
    case "CATEGORY_ROUNDS":
      return {
        mode: raw.mode,
        allow_duplicate_picks: optionalBool(
          raw,
          "allow_duplicate_picks",
          "eligibility.allow_duplicate_picks"
        ),
        exclusive_items: optionalBool(raw, "exclusive_items", "eligibility.exclusive_items")
      };
    default:
      throw new DraftConfigError("Unknown eligibility mode", ["eligibility.mode"]);
  }
}

function parseTiebreak(raw: unknown, fallback: TiebreakMetric): TiebreakMetric {
  if (raw === undefined || raw === null) return fallback;
  if (raw === "CORRECT_COUNT" || raw === "ITEMS_HELD") return raw;
  throw new DraftConfigError("Unknown tiebreak metric", ["scoring.tiebreak"]);
}

function parseScoring(raw: unknown, eligibility: EligibilityPolicy): ScoringRules {
  const predictionDefault: ScoringRules = {
    kind: "CORRECT_PREDICTIONS",
    points_per_correct: 1,
    tiebreak: "CORRECT_COUNT"
  };
  if (!isRecord(raw)) {
    return eligibility.mode === "OPEN_POOL"
      ? { kind: "ITEM_VALUE", direction: "HIGHEST", tiebreak: "ITEMS_HELD" }
      : predictionDefault;
  }
  if (raw.kind === "ITEM_VALUE") {
    const direction = raw.direction ?? "HIGHEST";
    if (direction !== "HIGHEST" && direction !== "LOWEST") {
      throw new DraftConfigError("Unknown scoring direction", ["scoring.direction"]);
    }
    return {
      kind: "ITEM_VALUE",
      direction,
      tiebreak: parseTiebreak(raw.tiebreak, "ITEMS_HELD")
    };
  }
  if (raw.kind === "CORRECT_PREDICTIONS") {
    const points = raw.points_per_correct ?? 1;
    if (typeof points !== "number" || !Number.isFinite(points)) {
      throw new DraftConfigError("points_per_correct must be a number", [
        "scoring.points_per_correct"
      ]);
    }
    return {
      kind: "CORRECT_PREDICTIONS",
      points_per_correct: points,
      tiebreak: parseTiebreak(raw.tiebreak, "CORRECT_COUNT")
    };
  }
  throw new DraftConfigError("Unknown scoring kind", ["scoring.kind"]);
}

function parseRankings(raw: unknown): Record<string, string[]> {
  if (!isRecord(raw)) {
    throw new DraftConfigError("rankings must map participants to item lists", [
      "auto_pick.rankings"
    ]);
  }
  const rankings: Record<string, string[]> = {};
  for (const [participantId, list] of Object.entries(raw)) {
    if (!Array.isArray(list) || list.some((id) => typeof id !== "string")) {
      throw new DraftConfigError("rankings entries must be item id lists", [
        "auto_pick.rankings"
      ]);
    }
    rankings[participantId] = list.filter((id): id is string => typeof id === "string");
  }
  return rankings;
}

function parseAutoPick(raw: unknown): AutoPickPolicy {
  if (!isRecord(raw)) return { strategy: "NEXT_AVAILABLE" };
  switch (raw.strategy) {
    case undefined:
    case "NEXT_AVAILABLE":
      return { strategy: "NEXT_AVAILABLE" };
    case "ALPHABETICAL":
      return { strategy: "ALPHABETICAL" };
    case "RANDOM_SEED":
      return {
        strategy: "RANDOM_SEED",
        seed:
          typeof raw.seed === "string" && raw.seed.trim()
            ? raw.seed.trim()
            : DEFAULT_RANDOM_SEED
      };
    case "CUSTOM_RANKING":
      return { strategy: "CUSTOM_RANKING", rankings: parseRankings(raw.rankings) };
    default:
      throw new DraftConfigError("Unknown auto-pick strategy", ["auto_pick.strategy"]);
  }
}

function parsePositiveInt(raw: unknown, field: string, allowZero: boolean): number {
  const value = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
  const min = allowZero ? 0 : 1;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new DraftConfigError(
      `${field} must be an integer >= ${min}`,
      [field]
    );
  }
  return value;
}

/**
 * Validates an untrusted configuration payload (request body or stored JSON).
 * `commissioner_id` may be supplied separately by the caller.
 */
export function parseDraftConfiguration(
  raw: unknown,
  defaults: { commissioner_id?: string } = {}
): DraftConfiguration {
  if (!isRecord(raw)) {
    throw new DraftConfigError("Draft configuration must be an object", ["config"]);
  }
  const commissioner_id =
    defaults.commissioner_id ?? requireString(raw, "commissioner_id");
  const discipline = raw.discipline ?? "SERPENTINE";
  if (!isDraftDiscipline(discipline)) {
    throw new DraftConfigError("discipline must be FIXED or SERPENTINE", ["discipline"]);
  }
  const eligibility = parseEligibility(raw.eligibility);
  return {
    commissioner_id,
    pool_id: requireString(raw, "pool_id"),
    order: parseOrder(raw.order),
    discipline,
    rounds_total: parsePositiveInt(raw.rounds_total, "rounds_total", false),
    turn_budget_seconds: parsePositiveInt(
      raw.turn_budget_seconds ?? 0,
      "turn_budget_seconds",
      true
    ),
    eligibility,
    scoring: parseScoring(raw.scoring, eligibility),
    auto_pick: parseAutoPick(raw.auto_pick)
  };
}
