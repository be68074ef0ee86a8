import type { DraftDiscipline, DraftState } from "@pickroom/shared";

export type EligibilityPolicy =
  | { mode: "OPEN_POOL"; allow_shared_ownership: boolean }
  | {
      mode: "CATEGORY_ANY" | "CATEGORY_ROUNDS";
      /** A participant may hold more than one item from the same category. */
      allow_duplicate_picks: boolean;
      /** An item held by one participant is unavailable to everyone else. */
      exclusive_items: boolean;
    };

export type TiebreakMetric = "CORRECT_COUNT" | "ITEMS_HELD";

export type ScoringRules =
  | {
      kind: "ITEM_VALUE";
      direction: "HIGHEST" | "LOWEST";
      tiebreak: TiebreakMetric;
    }
  | {
      kind: "CORRECT_PREDICTIONS";
      points_per_correct: number;
      tiebreak: TiebreakMetric;
    };

export type AutoPickPolicy =
  | { strategy: "NEXT_AVAILABLE" }
  | { strategy: "ALPHABETICAL" }
  | { strategy: "RANDOM_SEED"; seed: string }
  | { strategy: "CUSTOM_RANKING"; rankings: Record<string, string[]> };

/** Immutable once the draft leaves PENDING/SCHEDULED. */
export type DraftConfiguration = {
  commissioner_id: string;
  pool_id: string;
  order: string[];
  discipline: DraftDiscipline;
  rounds_total: number;
  turn_budget_seconds: number;
  eligibility: EligibilityPolicy;
  scoring: ScoringRules;
  auto_pick: AutoPickPolicy;
};

export type DraftSessionRecord = {
  id: number;
  config: DraftConfiguration;
  status: DraftState;
  current_overall_pick: number;
  current_picker_id: string | null;
  turn_started_at: Date | null;
  turn_remaining_ms: number | null;
  scheduled_at: Date | null;
  version: number;
  created_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
};

export type DraftSessionPatch = Partial<
  Pick<
    DraftSessionRecord,
    | "status"
    | "current_overall_pick"
    | "current_picker_id"
    | "turn_started_at"
    | "turn_remaining_ms"
    | "scheduled_at"
    | "started_at"
    | "completed_at"
  >
>;

export type SelectionRecord = {
  draft_id: number;
  overall_pick_number: number;
  round_number: number;
  position_in_round: number;
  picker_id: string;
  item_id: string;
  committed_at: Date;
  was_auto_selected: boolean;
  seconds_taken: number | null;
  request_id: string | null;
};

export type ItemResultRecord = {
  draft_id: number;
  item_id: string;
  value: number | null;
  won: boolean | null;
};
