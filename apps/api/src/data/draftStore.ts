import type {
  DraftConfiguration,
  DraftSessionPatch,
  DraftSessionRecord,
  ItemResultRecord,
  SelectionRecord
} from "./repositories/draftRepository/types.js";

export type ExpiredTurn = { id: number; version: number };

/**
 * Session-keyed persistence for drafts. Every write that changes a session is a
 * compare-and-swap on `version`: it applies only when the stored version equals
 * `expected_version`, bumps the version by one, and resolves `null` otherwise.
 */
export interface DraftStore {
  createSession(input: {
    config: DraftConfiguration;
    created_at: Date;
  }): Promise<DraftSessionRecord>;
  getSession(draftId: number): Promise<DraftSessionRecord | null>;
  updateSession(input: {
    draft_id: number;
    expected_version: number;
    patch: DraftSessionPatch;
  }): Promise<DraftSessionRecord | null>;
  /** Appends the selection and applies the patch as one unit, or neither. */
  commitSelection(input: {
    draft_id: number;
    expected_version: number;
    selection: SelectionRecord;
    patch: DraftSessionPatch;
  }): Promise<DraftSessionRecord | null>;
  listSelections(draftId: number): Promise<SelectionRecord[]>;
  getSelectionByRequestId(
    draftId: number,
    requestId: string
  ): Promise<SelectionRecord | null>;
  listExpiredTurns(now: Date, limit: number): Promise<ExpiredTurn[]>;
  upsertItemResults(
    draftId: number,
    results: Array<Omit<ItemResultRecord, "draft_id">>
  ): Promise<void>;
  listItemResults(draftId: number): Promise<ItemResultRecord[]>;
}
