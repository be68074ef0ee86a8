import type { DraftStore, ExpiredTurn } from "./draftStore.js";
import type {
  DraftConfiguration,
  DraftSessionPatch,
  DraftSessionRecord,
  ItemResultRecord,
  SelectionRecord
} from "./repositories/draftRepository/types.js";

type DraftEntry = {
  session: DraftSessionRecord;
  selections: SelectionRecord[];
  results: Map<string, ItemResultRecord>;
};

/**
 * In-process store. Each compare-and-swap runs without an intervening await, so
 * on a single event loop it is atomic; records are copied on the way in and out.
 */
export class InMemoryDraftStore implements DraftStore {
  private readonly drafts = new Map<number, DraftEntry>();
  private nextId = 1;

  async createSession(input: {
    config: DraftConfiguration;
    created_at: Date;
  }): Promise<DraftSessionRecord> {
    const session: DraftSessionRecord = {
      id: this.nextId++,
      config: structuredClone(input.config),
      status: "PENDING",
      current_overall_pick: 1,
      current_picker_id: null,
      turn_started_at: null,
      turn_remaining_ms: null,
      scheduled_at: null,
      version: 0,
      created_at: input.created_at,
      started_at: null,
      completed_at: null
    };
    this.drafts.set(session.id, { session, selections: [], results: new Map() });
    return structuredClone(session);
  }

  async getSession(draftId: number): Promise<DraftSessionRecord | null> {
    const entry = this.drafts.get(draftId);
    return entry ? structuredClone(entry.session) : null;
  }

  async updateSession(input: {
    draft_id: number;
    expected_version: number;
    patch: DraftSessionPatch;
  }): Promise<DraftSessionRecord | null> {
    const entry = this.drafts.get(input.draft_id);
    if (!entry || entry.session.version !== input.expected_version) return null;
    entry.session = applyPatch(entry.session, input.patch);
    return structuredClone(entry.session);
  }

  async commitSelection(input: {
    draft_id: number;
    expected_version: number;
    selection: SelectionRecord;
    patch: DraftSessionPatch;
  }): Promise<DraftSessionRecord | null> {
    const entry = this.drafts.get(input.draft_id);
    if (!entry || entry.session.version !== input.expected_version) return null;
    const { selection } = input;
    const clash = entry.selections.some(
      (s) =>
        s.overall_pick_number === selection.overall_pick_number ||
        (selection.request_id !== null && s.request_id === selection.request_id)
    );
    if (clash) return null;
    entry.selections.push(structuredClone(selection));
    entry.session = applyPatch(entry.session, input.patch);
    return structuredClone(entry.session);
  }

  async listSelections(draftId: number): Promise<SelectionRecord[]> {
    const entry = this.drafts.get(draftId);
    if (!entry) return [];
    return entry.selections
      .map((s) => structuredClone(s))
      .sort((a, b) => a.overall_pick_number - b.overall_pick_number);
  }

  async getSelectionByRequestId(
    draftId: number,
    requestId: string
  ): Promise<SelectionRecord | null> {
    const match = this.drafts
      .get(draftId)
      ?.selections.find((s) => s.request_id === requestId);
    return match ? structuredClone(match) : null;
  }

  async listExpiredTurns(now: Date, limit: number): Promise<ExpiredTurn[]> {
    const expired: Array<ExpiredTurn & { deadline: number }> = [];
    for (const { session } of this.drafts.values()) {
      const budget = session.config.turn_budget_seconds;
      if (session.status !== "IN_PROGRESS" || budget <= 0 || !session.turn_started_at) {
        continue;
      }
      const deadline = session.turn_started_at.getTime() + budget * 1000;
      if (deadline <= now.getTime()) {
        expired.push({ id: session.id, version: session.version, deadline });
      }
    }
    return expired
      .sort((a, b) => a.deadline - b.deadline)
      .slice(0, limit)
      .map(({ id, version }) => ({ id, version }));
  }

  async upsertItemResults(
    draftId: number,
    results: Array<Omit<ItemResultRecord, "draft_id">>
  ): Promise<void> {
    const entry = this.drafts.get(draftId);
    if (!entry) return;
    for (const result of results) {
      entry.results.set(result.item_id, { draft_id: draftId, ...result });
    }
  }

  async listItemResults(draftId: number): Promise<ItemResultRecord[]> {
    const entry = this.drafts.get(draftId);
    if (!entry) return [];
    return [...entry.results.values()]
      .map((r) => ({ ...r }))
      .sort((a, b) => (a.item_id < b.item_id ? -1 : a.item_id > b.item_id ? 1 : 0));
  }
}

function applyPatch(
  session: DraftSessionRecord,
  patch: DraftSessionPatch
): DraftSessionRecord {
  return { ...session, ...patch, version: session.version + 1 };
}
