import type { ScoringRules } from "../data/repositories/draftRepository/types.js";
import {
  scoreSelections,
  type ItemResult,
  type ParticipantTally,
  type ScoredSelection,
  type ScoringStrategy
} from "./scoring.js";

export type StandingEntry = {
  participant_id: string;
  rank: number;
  primary_score: number;
  secondary_tiebreak_metric: number;
  correct_count: number;
  items_held: number;
};

function tiebreakValue(tally: ParticipantTally, rules: ScoringRules): number {
  return rules.tiebreak === "CORRECT_COUNT" ? tally.correct_count : tally.items_held;
}

/**
 * Ranks every participant from the full selection log. Order: primary score
 * (descending, or ascending for lowest-wins value leagues), then the configured
 * tiebreak metric descending, then draft-order position. Ranks are positions;
 * equal scores never share a rank.
 */
export function computeStandings(input: {
  selections: readonly ScoredSelection[];
  results: readonly ItemResult[];
  rules: ScoringRules;
  /** Draft order; also the final tiebreak. */
  participants: readonly string[];
  strategy?: ScoringStrategy;
}): StandingEntry[] {
  const { rules } = input;
  const tallies = scoreSelections({
    selections: input.selections,
    results: input.results,
    participants: input.participants,
    rules,
    strategy: input.strategy
  });

  const seatIndex = new Map(input.participants.map((id, index) => [id, index]));
  const seatOf = (id: string) => seatIndex.get(id) ?? Number.MAX_SAFE_INTEGER;
  const ascending = rules.kind === "ITEM_VALUE" && rules.direction === "LOWEST";

  const sorted = [...tallies].sort((a, b) => {
    if (a.primary_score !== b.primary_score) {
      return ascending
        ? a.primary_score - b.primary_score
        : b.primary_score - a.primary_score;
    }
    const tieA = tiebreakValue(a, rules);
    const tieB = tiebreakValue(b, rules);
    if (tieA !== tieB) return tieB - tieA;
    const seatDiff = seatOf(a.participant_id) - seatOf(b.participant_id);
    if (seatDiff !== 0) return seatDiff;
    return a.participant_id < b.participant_id ? -1 : a.participant_id > b.participant_id ? 1 : 0;
  });

  return sorted.map((tally, index) => ({
    participant_id: tally.participant_id,
    rank: index + 1,
    primary_score: tally.primary_score,
    secondary_tiebreak_metric: tiebreakValue(tally, rules),
    correct_count: tally.correct_count,
    items_held: tally.items_held
  }));
}
