import { isValidDraftState } from "@pickroom/shared";
import { DbClient, query } from "../../db.js";
import { parseDraftConfiguration } from "../../../domain/draftConfig.js";
import type {
  DraftConfiguration,
  DraftSessionPatch,
  DraftSessionRecord
} from "./types.js";

type DraftSessionRow = Omit<DraftSessionRecord, "config" | "status"> & {
  config: unknown;
  status: string;
};

const SESSION_COLUMNS = `
  id::int,
  config,
  status,
  current_overall_pick::int,
  current_picker_id,
  turn_started_at,
  turn_remaining_ms::int,
  scheduled_at,
  version::int,
  created_at,
  started_at,
  completed_at`;

// Only these columns may be written through a patch.
const PATCHABLE_COLUMNS = [
  "status",
  "current_overall_pick",
  "current_picker_id",
  "turn_started_at",
  "turn_remaining_ms",
  "scheduled_at",
  "started_at",
  "completed_at"
] as const satisfies ReadonlyArray<keyof DraftSessionPatch>;

export class CorruptDraftRowError extends Error {
  constructor(
    message: string,
    public draftId: number
  ) {
    super(message);
    this.name = "CorruptDraftRowError";
  }
}

export function mapDraftSessionRow(row: DraftSessionRow): DraftSessionRecord {
  if (!isValidDraftState(row.status)) {
    throw new CorruptDraftRowError(`Unknown draft status ${row.status}`, row.id);
  }
  return {
    ...row,
    status: row.status,
    config: parseDraftConfiguration(row.config)
  };
}

export async function insertDraftSession(
  client: DbClient,
  input: { config: DraftConfiguration; created_at: Date }
): Promise<DraftSessionRecord> {
  const { rows } = await query<DraftSessionRow>(
    client,
    `INSERT INTO draft_session (config, status, current_overall_pick, version, created_at)
     VALUES ($1::jsonb, 'PENDING', 1, 0, $2)
     RETURNING ${SESSION_COLUMNS}`,
    [JSON.stringify(input.config), input.created_at]
  );
  return mapDraftSessionRow(rows[0]);
}

export async function getDraftSessionById(
  client: DbClient,
  id: number
): Promise<DraftSessionRecord | null> {
  const { rows } = await query<DraftSessionRow>(
    client,
    `SELECT ${SESSION_COLUMNS} FROM draft_session WHERE id = $1`,
    [id]
  );
  return rows[0] ? mapDraftSessionRow(rows[0]) : null;
}

/**
 * Compare-and-swap write: applies the patch and bumps `version` only when the
 * stored version still equals `expectedVersion`. Resolves null on a lost race.
 */
export async function updateDraftSessionIfVersion(
  client: DbClient,
  id: number,
  expectedVersion: number,
  patch: DraftSessionPatch
): Promise<DraftSessionRecord | null> {
  const sets: string[] = ["version = version + 1"];
  const params: unknown[] = [id, expectedVersion];
  for (const column of PATCHABLE_COLUMNS) {
    if (!(column in patch)) continue;
    params.push(patch[column] ?? null);
    sets.push(`${column} = $${params.length}`);
  }
  const { rows } = await query<DraftSessionRow>(
    client,
    `UPDATE draft_session
     SET ${sets.join(", ")}
     WHERE id = $1 AND version = $2
     RETURNING ${SESSION_COLUMNS}`,
    params
  );
  return rows[0] ? mapDraftSessionRow(rows[0]) : null;
}

/**
 * Timed, in-progress sessions whose turn deadline has passed, oldest first.
 * The budget lives in the config document, so the deadline is computed here.
 */
export async function listExpiredDraftTurns(
  client: DbClient,
  now: Date,
  limit: number
): Promise<Array<{ id: number; version: number }>> {
  const { rows } = await query<{ id: number; version: number }>(
    client,
    `SELECT id::int, version::int
     FROM draft_session
     WHERE status = 'IN_PROGRESS'
       AND turn_started_at IS NOT NULL
       AND (config->>'turn_budget_seconds')::int > 0
       AND turn_started_at + make_interval(secs => (config->>'turn_budget_seconds')::int) <= $1
     ORDER BY turn_started_at + make_interval(secs => (config->>'turn_budget_seconds')::int) ASC, id ASC
     LIMIT $2`,
    [now, limit]
  );
  return rows;
}
