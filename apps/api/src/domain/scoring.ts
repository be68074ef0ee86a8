import type { ScoringRules } from "../data/repositories/draftRepository/types.js";

export type ScoredSelection = {
  picker_id: string;
  item_id: string;
};

export type ItemResult = {
  item_id: string;
  /** Per-item value for value leagues (box office, rating, ...). */
  value: number | null;
  /** Outcome for prediction leagues; null until announced. */
  won: boolean | null;
};

export type ParticipantTally = {
  participant_id: string;
  primary_score: number;
  correct_count: number;
  items_held: number;
};

export type ScoringInput = {
  selections: readonly ScoredSelection[];
  results: readonly ItemResult[];
  participants: readonly string[];
};

export interface ScoringStrategy {
  score(input: ScoringInput): ParticipantTally[];
}

export class ScoringError extends Error {
  constructor(
    message: string,
    public code: "INVALID_INPUT"
  ) {
    super(message);
    this.name = "ScoringError";
  }
}

function tallyBy(
  input: ScoringInput,
  pointsFor: (result: ItemResult | undefined) => number
): ParticipantTally[] {
  const resultByItem = new Map(input.results.map((r) => [r.item_id, r]));
  const tallies = new Map<string, ParticipantTally>();
  const tallyFor = (participant_id: string) => {
    let tally = tallies.get(participant_id);
    if (!tally) {
      tally = { participant_id, primary_score: 0, correct_count: 0, items_held: 0 };
      tallies.set(participant_id, tally);
    }
    return tally;
  };

  for (const participant of input.participants) tallyFor(participant);
  for (const selection of input.selections) {
    const tally = tallyFor(selection.picker_id);
    const result = resultByItem.get(selection.item_id);
    tally.items_held += 1;
    if (result?.won === true) tally.correct_count += 1;
    tally.primary_score += pointsFor(result);
  }
  return [...tallies.values()];
}

/** Sum of the per-item values a participant holds; unknown values count as 0. */
export const itemValueStrategy: ScoringStrategy = {
  score: (input) => tallyBy(input, (result) => result?.value ?? 0)
};

export function correctPredictionStrategy(pointsPerCorrect: number): ScoringStrategy {
  return {
    score: (input) =>
      tallyBy(input, (result) => (result?.won === true ? pointsPerCorrect : 0))
  };
}

export function resolveScoringStrategy(rules: ScoringRules): ScoringStrategy {
  switch (rules.kind) {
    case "ITEM_VALUE":
      return itemValueStrategy;
    case "CORRECT_PREDICTIONS":
      return correctPredictionStrategy(rules.points_per_correct);
  }
}

/**
 * Entrypoint for scoring selections. Delegates to a pluggable strategy so callers
 * stay stable while strategies can change.
 */
export function scoreSelections(
  input: ScoringInput & { rules: ScoringRules; strategy?: ScoringStrategy }
): ParticipantTally[] {
  if (!Array.isArray(input.selections) || !Array.isArray(input.results)) {
    throw new ScoringError("Selections and results must be arrays", "INVALID_INPUT");
  }
  const strategy = input.strategy ?? resolveScoringStrategy(input.rules);
  return strategy.score({
    selections: input.selections,
    results: input.results,
    participants: input.participants
  });
}
