import { DraftStateError, pickerFor, type DraftState } from "@pickroom/shared";
import type { CatalogItem, ItemCatalog, ItemPool } from "../../data/catalog.js";
import type { DraftStore } from "../../data/draftStore.js";
import type {
  DraftConfiguration,
  DraftSessionPatch,
  DraftSessionRecord,
  ItemResultRecord,
  SelectionRecord
} from "../../data/repositories/draftRepository/types.js";
import { chooseAutoPick } from "../../domain/autoPickStrategies.js";
import { DraftConfigError, parseDraftConfiguration } from "../../domain/draftConfig.js";
import {
  computePickAssignment,
  draftTotalPicks,
  isFinalPick
} from "../../domain/draftOrder.js";
import { allowedTransitions, transitionDraftState } from "../../domain/draftState.js";
import {
  activeCategoryForRound,
  checkEligibility,
  ineligibleMessages,
  selectableItems,
  validateConfigAgainstPool,
  type IneligibleReason
} from "../../domain/eligibility.js";
import { computeStandings, type StandingEntry } from "../../domain/standings.js";
import {
  remainingMs,
  remainingSeconds,
  resumedTurnStart,
  timerPhase,
  turnDeadline,
  type TimerPhase
} from "../../domain/turnTimer.js";
import { AppError, forbidden, notFound, staleTurn, validationError } from "../../errors.js";
import { log } from "../../logger.js";
import type {
  DraftEventHub,
  DraftEventType,
  PickCommittedPayload
} from "../../realtime/draftEvents.js";

export type Clock = () => Date;

export type DraftSessionView = DraftSessionRecord & {
  remaining_seconds: number | null;
  timer_phase: TimerPhase;
  turn_deadline_at: Date | null;
  active_category_id: string | null;
  round_number: number | null;
  total_picks: number;
  picks_made: number;
  picks_remaining: number;
};

export type CommitFailureCode =
  | "DRAFT_NOT_FOUND"
  | "SESSION_NOT_ACTIVE"
  | "STALE_TURN"
  | "NOT_YOUR_TURN"
  | "NOT_ELIGIBLE"
  | "REQUEST_ID_CONFLICT";

export type ExpireFailureCode = CommitFailureCode | "TIMER_NOT_EXPIRED" | "NO_ELIGIBLE_ITEM";

export type CommitSuccess = {
  ok: true;
  selection: SelectionRecord;
  session: DraftSessionView;
  /** True when a retried request id matched an earlier selection. */
  reused: boolean;
};

export type CommitFailure<Code extends string = CommitFailureCode> = {
  ok: false;
  code: Code;
  message: string;
  retryable: boolean;
  reason?: IneligibleReason;
};

export type CommitResult = CommitSuccess | CommitFailure;
export type ExpireResult = CommitSuccess | CommitFailure<ExpireFailureCode>;

export type CommitInput = {
  draft_id: number;
  participant_id: string;
  item_id: string;
  expected_version: number;
  request_id?: string | null;
};

export type ItemResultInput = Omit<ItemResultRecord, "draft_id">;

function fail<Code extends string>(
  code: Code,
  message: string,
  extra: { retryable?: boolean; reason?: IneligibleReason } = {}
): CommitFailure<Code> {
  return {
    ok: false,
    code,
    message,
    retryable: extra.retryable ?? false,
    ...(extra.reason ? { reason: extra.reason } : {})
  };
}

function isTimed(config: DraftConfiguration) {
  return config.turn_budget_seconds > 0;
}

/**
 * Sole writer of draft sessions. Every write is a compare-and-swap on the
 * session version; commits report failures as typed results while lifecycle
 * operations throw `AppError`.
 */
export class DraftEngine {
  private readonly store: DraftStore;
  private readonly catalog: ItemCatalog;
  private readonly clock: Clock;
  private readonly events: DraftEventHub | null;

  constructor(deps: {
    store: DraftStore;
    catalog: ItemCatalog;
    clock?: Clock;
    events?: DraftEventHub;
  }) {
    this.store = deps.store;
    this.catalog = deps.catalog;
    this.clock = deps.clock ?? (() => new Date());
    this.events = deps.events ?? null;
  }

  async createSession(rawConfig: unknown, actorId: string): Promise<DraftSessionView> {
    let config: DraftConfiguration;
    try {
      config = parseDraftConfiguration(rawConfig, { commissioner_id: actorId });
    } catch (err) {
      if (err instanceof DraftConfigError) throw validationError(err.message, err.fields);
      throw err;
    }
    await this.requireRunnablePool(config);
    const session = await this.store.createSession({ config, created_at: this.clock() });
    log({
      level: "info",
      msg: "draft_created",
      draft_id: session.id,
      user_id: actorId,
      pool_id: config.pool_id
    });
    this.publish(session, "draft.created", { draft_id: session.id });
    return this.toView(session, 0);
  }

  async getSession(draftId: number): Promise<DraftSessionView> {
    const session = await this.requireSession(draftId);
    const selections = await this.store.listSelections(draftId);
    return this.toView(session, selections.length);
  }

  /** A null `scheduledAt` clears the schedule and returns the draft to PENDING. */
  async scheduleSession(input: {
    draft_id: number;
    actor_id: string;
    scheduled_at: Date | null;
    expected_version?: number;
  }): Promise<DraftSessionView> {
    const session = await this.requireCommissioner(input.draft_id, input.actor_id);
    const target: DraftState = input.scheduled_at ? "SCHEDULED" : "PENDING";
    const patch: DraftSessionPatch =
      session.status === target && target === "SCHEDULED"
        ? { scheduled_at: input.scheduled_at }
        : { ...this.transition(session, target), scheduled_at: input.scheduled_at };
    const updated = await this.writeLifecycle(session, patch, input.expected_version);
    this.publish(updated, "draft.scheduled", {
      scheduled_at: updated.scheduled_at ? updated.scheduled_at.toISOString() : null
    });
    return this.toView(updated, 0);
  }

  async startSession(input: {
    draft_id: number;
    actor_id: string;
    expected_version?: number;
  }): Promise<DraftSessionView> {
    const session = await this.requireCommissioner(input.draft_id, input.actor_id);
    if (session.status !== "PENDING" && session.status !== "SCHEDULED") {
      throw new AppError("ALREADY_STARTED", 409, "Draft has already started", {
        status: session.status
      });
    }
    await this.requireRunnablePool(session.config);
    const now = this.clock();
    const updated = await this.writeLifecycle(
      session,
      {
        ...this.transition(session, "IN_PROGRESS"),
        current_overall_pick: 1,
        current_picker_id: pickerFor(session.config, 1),
        turn_started_at: isTimed(session.config) ? now : null,
        turn_remaining_ms: null
      },
      input.expected_version
    );
    log({ level: "info", msg: "draft_started", draft_id: updated.id, user_id: input.actor_id });
    this.publish(updated, "draft.started", {
      current_picker_id: updated.current_picker_id
    });
    return this.toView(updated, 0);
  }

  async pauseSession(input: {
    draft_id: number;
    actor_id: string;
    expected_version?: number;
  }): Promise<DraftSessionView> {
    const session = await this.requireCommissioner(input.draft_id, input.actor_id);
    const now = this.clock();
    const updated = await this.writeLifecycle(
      session,
      {
        ...this.transition(session, "PAUSED"),
        turn_remaining_ms: remainingMs(session, session.config.turn_budget_seconds, now),
        turn_started_at: null
      },
      input.expected_version
    );
    this.publish(updated, "draft.paused", {
      remaining_ms: updated.turn_remaining_ms
    });
    return this.getSession(updated.id);
  }

  async resumeSession(input: {
    draft_id: number;
    actor_id: string;
    expected_version?: number;
  }): Promise<DraftSessionView> {
    const session = await this.requireCommissioner(input.draft_id, input.actor_id);
    const now = this.clock();
    const updated = await this.writeLifecycle(
      session,
      {
        ...this.transition(session, "IN_PROGRESS"),
        turn_started_at: resumedTurnStart(
          now,
          session.config.turn_budget_seconds,
          session.turn_remaining_ms
        ),
        turn_remaining_ms: null
      },
      input.expected_version
    );
    this.publish(updated, "draft.resumed", {
      turn_started_at: updated.turn_started_at ? updated.turn_started_at.toISOString() : null
    });
    return this.getSession(updated.id);
  }

  commit(input: CommitInput): Promise<CommitResult> {
    return this.applyCommit({ ...input, was_auto_selected: false });
  }

  /**
   * Timer-expiry trigger. Chooses an item through the configured auto-pick
   * policy and re-enters the commit path as the current picker. When no item
   * is eligible the draft is paused instead.
   */
  async expireTurn(input: {
    draft_id: number;
    expected_version: number;
  }): Promise<ExpireResult> {
    const session = await this.store.getSession(input.draft_id);
    if (!session) return fail("DRAFT_NOT_FOUND", "Draft not found");
    if (session.status !== "IN_PROGRESS") {
      return fail("SESSION_NOT_ACTIVE", "Draft is not in progress");
    }
    if (session.version !== input.expected_version) {
      return fail("STALE_TURN", "Draft state changed; refresh and retry", {
        retryable: true
      });
    }
    const now = this.clock();
    if (timerPhase(session, session.config.turn_budget_seconds, now) !== "EXPIRED") {
      return fail("TIMER_NOT_EXPIRED", "Turn timer has not expired");
    }

    const assignment = computePickAssignment(session.config, session.current_overall_pick);
    const pool = await this.requirePool(session.config.pool_id);
    const selections = await this.store.listSelections(session.id);
    const eligible = selectableItems({
      policy: session.config.eligibility,
      pool,
      participant_id: assignment.picker_id,
      round_number: assignment.round_number,
      selections
    });
    const itemId = chooseAutoPick({
      policy: session.config.auto_pick,
      participant_id: assignment.picker_id,
      overall_pick: assignment.overall_pick_number,
      available: pool.items.filter((item) => eligible.has(item.id))
    });
    if (!itemId) {
      // Pause so the turn leaves the expired set until the commissioner acts.
      const paused = await this.store.updateSession({
        draft_id: session.id,
        expected_version: session.version,
        patch: {
          ...this.transition(session, "PAUSED"),
          turn_started_at: null,
          turn_remaining_ms: null
        }
      });
      log({
        level: "warn",
        msg: "draft_auto_pick_unavailable",
        draft_id: session.id,
        user_id: assignment.picker_id,
        pick_number: assignment.overall_pick_number,
        paused: paused !== null
      });
      if (!paused) {
        return fail("STALE_TURN", "Draft state changed; refresh and retry", { retryable: true });
      }
      this.publish(paused, "draft.paused", { remaining_ms: null, reason: "NO_ELIGIBLE_ITEM" });
      return fail("NO_ELIGIBLE_ITEM", "No eligible item is left for this turn; draft paused");
    }

    log({
      level: "info",
      msg: "draft_turn_expired",
      draft_id: session.id,
      user_id: assignment.picker_id,
      pick_number: assignment.overall_pick_number,
      strategy: session.config.auto_pick.strategy
    });
    return this.applyCommit({
      draft_id: session.id,
      participant_id: assignment.picker_id,
      item_id: itemId,
      expected_version: input.expected_version,
      was_auto_selected: true
    });
  }

  /** Items the participant could take in the current round. */
  async availableItems(draftId: number, participantId: string): Promise<CatalogItem[]> {
    const session = await this.requireSession(draftId);
    if (session.status === "COMPLETED") return [];
    const pool = await this.requirePool(session.config.pool_id);
    const selections = await this.store.listSelections(draftId);
    const eligible = selectableItems({
      policy: session.config.eligibility,
      pool,
      participant_id: participantId,
      round_number: computePickAssignment(session.config, session.current_overall_pick)
        .round_number,
      selections
    });
    return pool.items.filter((item) => eligible.has(item.id));
  }

  async listSelections(draftId: number): Promise<SelectionRecord[]> {
    await this.requireSession(draftId);
    return this.store.listSelections(draftId);
  }

  async recordResults(input: {
    draft_id: number;
    actor_id: string;
    results: ItemResultInput[];
  }): Promise<ItemResultRecord[]> {
    const session = await this.requireCommissioner(input.draft_id, input.actor_id);
    const pool = await this.requirePool(session.config.pool_id);
    const known = new Set(pool.items.map((item) => item.id));
    const unknown = input.results.filter((r) => !known.has(r.item_id)).map((r) => r.item_id);
    if (unknown.length > 0) {
      throw new AppError("VALIDATION_ERROR", 400, "Results name items outside the pool", {
        item_ids: unknown
      });
    }
    await this.store.upsertItemResults(session.id, input.results);
    return this.store.listItemResults(session.id);
  }

  async standings(draftId: number): Promise<StandingEntry[]> {
    const session = await this.requireSession(draftId);
    const [selections, results] = await Promise.all([
      this.store.listSelections(draftId),
      this.store.listItemResults(draftId)
    ]);
    return computeStandings({
      selections,
      results,
      rules: session.config.scoring,
      participants: session.config.order
    });
  }

  private async applyCommit(
    input: CommitInput & { was_auto_selected: boolean }
  ): Promise<CommitResult> {
    const session = await this.store.getSession(input.draft_id);
    if (!session) return fail("DRAFT_NOT_FOUND", "Draft not found");

    if (input.request_id) {
      const prior = await this.store.getSelectionByRequestId(session.id, input.request_id);
      if (prior && prior.picker_id !== input.participant_id) {
        return this.reject(
          session,
          input,
          fail("REQUEST_ID_CONFLICT", "request_id already belongs to another participant's pick")
        );
      }
      if (prior) {
        const selections = await this.store.listSelections(session.id);
        return {
          ok: true,
          selection: prior,
          session: await this.toView(session, selections.length),
          reused: true
        };
      }
    }

    if (session.status !== "IN_PROGRESS") {
      return this.reject(session, input, fail("SESSION_NOT_ACTIVE", "Draft is not in progress"));
    }
    if (session.version !== input.expected_version) {
      return this.reject(
        session,
        input,
        fail("STALE_TURN", "Draft state changed; refresh and retry", { retryable: true })
      );
    }
    // Out of range here means the session invariant is already broken: let it throw.
    const assignment = computePickAssignment(session.config, session.current_overall_pick);
    if (assignment.picker_id !== input.participant_id) {
      return this.reject(session, input, fail("NOT_YOUR_TURN", "It is not your turn"));
    }

    const pool = await this.requirePool(session.config.pool_id);
    const selections = await this.store.listSelections(session.id);
    const eligibility = checkEligibility({
      policy: session.config.eligibility,
      pool,
      participant_id: input.participant_id,
      round_number: assignment.round_number,
      selections,
      item_id: input.item_id
    });
    if (!eligibility.ok) {
      return this.reject(
        session,
        input,
        fail("NOT_ELIGIBLE", ineligibleMessages[eligibility.reason], {
          reason: eligibility.reason
        })
      );
    }

    const now = this.clock();
    const selection: SelectionRecord = {
      draft_id: session.id,
      overall_pick_number: assignment.overall_pick_number,
      round_number: assignment.round_number,
      position_in_round: assignment.position_in_round,
      picker_id: input.participant_id,
      item_id: input.item_id,
      committed_at: now,
      was_auto_selected: input.was_auto_selected,
      seconds_taken:
        isTimed(session.config) && session.turn_started_at
          ? Math.max(
              0,
              Math.round((now.getTime() - session.turn_started_at.getTime()) / 1000)
            )
          : null,
      request_id: input.request_id ?? null
    };

    const updated = await this.store.commitSelection({
      draft_id: session.id,
      expected_version: input.expected_version,
      selection,
      patch: this.advancePatch(session, now)
    });
    if (!updated) {
      return this.reject(
        session,
        input,
        fail("STALE_TURN", "Draft state changed; refresh and retry", { retryable: true })
      );
    }

    log({
      level: "info",
      msg: "draft_pick_committed",
      draft_id: updated.id,
      user_id: selection.picker_id,
      pick_number: selection.overall_pick_number,
      item_id: selection.item_id,
      auto: selection.was_auto_selected,
      version: updated.version
    });
    const committed: PickCommittedPayload = {
      overall_pick_number: selection.overall_pick_number,
      picker_id: selection.picker_id,
      item_id: selection.item_id,
      was_auto_selected: selection.was_auto_selected
    };
    this.publish(updated, "draft.pick.committed", committed);
    if (updated.status === "COMPLETED") {
      log({ level: "info", msg: "draft_completed", draft_id: updated.id });
      this.publish(updated, "draft.completed", { draft_id: updated.id });
    }

    return {
      ok: true,
      selection,
      session: await this.toView(updated, selections.length + 1),
      reused: false
    };
  }

  private advancePatch(session: DraftSessionRecord, now: Date): DraftSessionPatch {
    const nextPick = session.current_overall_pick + 1;
    if (isFinalPick(session.config, session.current_overall_pick)) {
      return {
        ...this.transition(session, "COMPLETED"),
        current_overall_pick: nextPick,
        current_picker_id: null,
        turn_started_at: null,
        turn_remaining_ms: null
      };
    }
    return {
      current_overall_pick: nextPick,
      current_picker_id: pickerFor(session.config, nextPick),
      turn_started_at: isTimed(session.config) ? now : null
    };
  }

  private reject(
    session: DraftSessionRecord,
    input: CommitInput & { was_auto_selected: boolean },
    failure: CommitFailure
  ): CommitFailure {
    log({
      level: "info",
      msg: "draft_pick_rejected",
      draft_id: session.id,
      user_id: input.participant_id,
      item_id: input.item_id,
      code: failure.code,
      reason: failure.reason,
      expected_version: input.expected_version,
      version: session.version,
      auto: input.was_auto_selected
    });
    return failure;
  }

  private transition(session: DraftSessionRecord, to: DraftState) {
    try {
      return transitionDraftState(session, to, this.clock);
    } catch (err) {
      if (err instanceof DraftStateError) {
        throw new AppError(
          "INVALID_TRANSITION",
          409,
          `Cannot move draft from ${session.status} to ${to}`,
          { from: session.status, to, allowed: allowedTransitions(session.status) }
        );
      }
      throw err;
    }
  }

  private async writeLifecycle(
    session: DraftSessionRecord,
    patch: DraftSessionPatch,
    expectedVersion: number | undefined
  ): Promise<DraftSessionRecord> {
    if (expectedVersion !== undefined && expectedVersion !== session.version) {
      throw staleTurn();
    }
    const updated = await this.store.updateSession({
      draft_id: session.id,
      expected_version: session.version,
      patch
    });
    if (!updated) throw staleTurn();
    return updated;
  }

  private async requireSession(draftId: number): Promise<DraftSessionRecord> {
    const session = await this.store.getSession(draftId);
    if (!session) throw notFound();
    return session;
  }

  private async requireCommissioner(
    draftId: number,
    actorId: string
  ): Promise<DraftSessionRecord> {
    const session = await this.requireSession(draftId);
    if (session.config.commissioner_id !== actorId) throw forbidden();
    return session;
  }

  private async requirePool(poolId: string): Promise<ItemPool> {
    const pool = await this.catalog.getPool(poolId);
    if (!pool) {
      throw new AppError("POOL_NOT_FOUND", 500, `Item pool ${poolId} is missing`);
    }
    return pool;
  }

  private async requireRunnablePool(config: DraftConfiguration): Promise<void> {
    const pool = await this.catalog.getPool(config.pool_id);
    if (!pool) throw validationError("Unknown item pool", ["pool_id"]);
    const issues = validateConfigAgainstPool(config, pool);
    if (issues.length > 0) {
      throw new AppError("VALIDATION_ERROR", 400, issues[0], { issues });
    }
  }

  private async toView(
    session: DraftSessionRecord,
    picksMade: number
  ): Promise<DraftSessionView> {
    const now = this.clock();
    const budget = session.config.turn_budget_seconds;
    const total = draftTotalPicks(session.config);
    const round =
      session.current_overall_pick <= total
        ? computePickAssignment(session.config, session.current_overall_pick).round_number
        : null;
    let activeCategoryId: string | null = null;
    if (round !== null && session.config.eligibility.mode === "CATEGORY_ROUNDS") {
      const pool = await this.catalog.getPool(session.config.pool_id);
      activeCategoryId = pool ? (activeCategoryForRound(pool, round)?.id ?? null) : null;
    }
    return {
      ...session,
      remaining_seconds: remainingSeconds(session, budget, now),
      timer_phase: timerPhase(session, budget, now),
      turn_deadline_at:
        session.status === "IN_PROGRESS" ? turnDeadline(session.turn_started_at, budget) : null,
      active_category_id: activeCategoryId,
      round_number: round,
      total_picks: total,
      picks_made: picksMade,
      picks_remaining: Math.max(0, total - picksMade)
    };
  }

  private publish(session: DraftSessionRecord, eventType: DraftEventType, payload: unknown) {
    this.events?.publish({
      draft_id: session.id,
      version: session.version,
      event_type: eventType,
      payload,
      created_at: this.clock()
    });
  }
}
