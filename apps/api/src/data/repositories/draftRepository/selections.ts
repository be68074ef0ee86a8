import { DbClient, query } from "../../db.js";
import type { SelectionRecord } from "./types.js";

const SELECTION_COLUMNS = `
  draft_id::int,
  overall_pick_number::int,
  round_number::int,
  position_in_round::int,
  picker_id,
  item_id,
  committed_at,
  was_auto_selected,
  seconds_taken::int,
  request_id`;

export async function listSelections(
  client: DbClient,
  draftId: number
): Promise<SelectionRecord[]> {
  const { rows } = await query<SelectionRecord>(
    client,
    `SELECT ${SELECTION_COLUMNS}
     FROM draft_selection
     WHERE draft_id = $1
     ORDER BY overall_pick_number ASC`,
    [draftId]
  );
  return rows;
}

export async function getSelectionByRequestId(
  client: DbClient,
  draftId: number,
  requestId: string
): Promise<SelectionRecord | null> {
  const { rows } = await query<SelectionRecord>(
    client,
    `SELECT ${SELECTION_COLUMNS}
     FROM draft_selection
     WHERE draft_id = $1 AND request_id = $2`,
    [draftId, requestId]
  );
  return rows[0] ?? null;
}

export async function insertSelection(
  client: DbClient,
  selection: SelectionRecord
): Promise<SelectionRecord> {
  const { rows } = await query<SelectionRecord>(
    client,
    `INSERT INTO draft_selection
     (draft_id, overall_pick_number, round_number, position_in_round, picker_id, item_id, committed_at, was_auto_selected, seconds_taken, request_id)
     VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10)
     RETURNING ${SELECTION_COLUMNS}`,
    [
      selection.draft_id,
      selection.overall_pick_number,
      selection.round_number,
      selection.position_in_round,
      selection.picker_id,
      selection.item_id,
      selection.committed_at,
      selection.was_auto_selected,
      selection.seconds_taken,
      selection.request_id
    ]
  );
  return rows[0];
}
