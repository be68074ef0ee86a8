import type { Pool } from "pg";
import { isUniqueViolation, runInTransaction } from "./db.js";
import type { DraftStore, ExpiredTurn } from "./draftStore.js";
import {
  getDraftSessionById,
  insertDraftSession,
  listExpiredDraftTurns,
  updateDraftSessionIfVersion
} from "./repositories/draftRepository/drafts.js";
import { listItemResults, upsertItemResults } from "./repositories/draftRepository/results.js";
import {
  getSelectionByRequestId,
  insertSelection,
  listSelections
} from "./repositories/draftRepository/selections.js";
import type {
  DraftConfiguration,
  DraftSessionPatch,
  DraftSessionRecord,
  ItemResultRecord,
  SelectionRecord
} from "./repositories/draftRepository/types.js";

class LostCommitRace extends Error {
  constructor() {
    super("Selection conflicts with an existing pick");
    this.name = "LostCommitRace";
  }
}

export class PgDraftStore implements DraftStore {
  constructor(private readonly pool: Pool) {}

  createSession(input: {
    config: DraftConfiguration;
    created_at: Date;
  }): Promise<DraftSessionRecord> {
    return insertDraftSession(this.pool, input);
  }

  getSession(draftId: number): Promise<DraftSessionRecord | null> {
    return getDraftSessionById(this.pool, draftId);
  }

  updateSession(input: {
    draft_id: number;
    expected_version: number;
    patch: DraftSessionPatch;
  }): Promise<DraftSessionRecord | null> {
    return updateDraftSessionIfVersion(
      this.pool,
      input.draft_id,
      input.expected_version,
      input.patch
    );
  }

  async commitSelection(input: {
    draft_id: number;
    expected_version: number;
    selection: SelectionRecord;
    patch: DraftSessionPatch;
  }): Promise<DraftSessionRecord | null> {
    try {
      return await runInTransaction(this.pool, async (client) => {
        // The CAS takes the row lock; a concurrent committer blocks here and
        // then misses on version.
        const updated = await updateDraftSessionIfVersion(
          client,
          input.draft_id,
          input.expected_version,
          input.patch
        );
        if (!updated) return null;
        try {
          await insertSelection(client, input.selection);
        } catch (err) {
          if (isUniqueViolation(err)) throw new LostCommitRace();
          throw err;
        }
        return updated;
      });
    } catch (err) {
      if (err instanceof LostCommitRace) return null;
      throw err;
    }
  }

  listSelections(draftId: number): Promise<SelectionRecord[]> {
    return listSelections(this.pool, draftId);
  }

  getSelectionByRequestId(
    draftId: number,
    requestId: string
  ): Promise<SelectionRecord | null> {
    return getSelectionByRequestId(this.pool, draftId, requestId);
  }

  listExpiredTurns(now: Date, limit: number): Promise<ExpiredTurn[]> {
    return listExpiredDraftTurns(this.pool, now, limit);
  }

  upsertItemResults(
    draftId: number,
    results: Array<Omit<ItemResultRecord, "draft_id">>
  ): Promise<void> {
    return runInTransaction(this.pool, (client) =>
      upsertItemResults(client, draftId, results)
    );
  }

  listItemResults(draftId: number): Promise<ItemResultRecord[]> {
    return listItemResults(this.pool, draftId);
  }
}
