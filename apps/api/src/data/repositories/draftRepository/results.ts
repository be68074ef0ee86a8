import { DbClient, query } from "../../db.js";
import type { ItemResultRecord } from "./types.js";

export async function listItemResults(
  client: DbClient,
  draftId: number
): Promise<ItemResultRecord[]> {
  const { rows } = await query<ItemResultRecord>(
    client,
    `SELECT
       draft_id::int,
       item_id,
       value::float8 AS value,
       won
     FROM draft_item_result
     WHERE draft_id = $1
     ORDER BY item_id ASC`,
    [draftId]
  );
  return rows;
}

export async function upsertItemResults(
  client: DbClient,
  draftId: number,
  results: Array<Omit<ItemResultRecord, "draft_id">>
): Promise<void> {
  if (results.length === 0) return;
  for (const result of results) {
    await query(
      client,
      `INSERT INTO draft_item_result (draft_id, item_id, value, won)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (draft_id, item_id)
       DO UPDATE SET value = EXCLUDED.value, won = EXCLUDED.won, updated_at = now()`,
      [draftId, result.item_id, result.value, result.won]
    );
  }
}
