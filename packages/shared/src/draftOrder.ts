export const draftDisciplines = ["FIXED", "SERPENTINE"] as const;
export type DraftDiscipline = (typeof draftDisciplines)[number];

export type DraftOrderConfig = {
  order: readonly string[];
  discipline: DraftDiscipline;
  rounds_total: number;
};

export type PickAssignment = {
  overall_pick_number: number;
  round_number: number;
  position_in_round: number;
  picker_id: string;
};

export class OutOfRangeError extends Error {
  constructor(
    message: string,
    public details: { overall_pick: number; total_picks: number }
  ) {
    super(message);
    this.name = "OutOfRangeError";
  }
}

export function isDraftDiscipline(value: unknown): value is DraftDiscipline {
  return (
    typeof value === "string" && draftDisciplines.some((d) => d === value)
  );
}

export function totalPicks(config: DraftOrderConfig): number {
  return config.order.length * config.rounds_total;
}

/**
 * Maps a 1-based overall pick to a 1-based seat. Serpentine mirrors the seat on
 * every even round, so the last seat of round R picks first in round R+1.
 */
export function getSeatForPick(
  discipline: DraftDiscipline,
  seatCount: number,
  pickNumber: number
): number {
  if (!Number.isInteger(seatCount) || seatCount <= 0) {
    throw new Error("seatCount must be a positive integer");
  }
  if (!Number.isInteger(pickNumber) || pickNumber <= 0) {
    throw new Error("pickNumber must be a positive integer");
  }

  const roundIndex = Math.floor((pickNumber - 1) / seatCount); // 0-based round
  const indexInRound = (pickNumber - 1) % seatCount; // 0-based position within round

  if (discipline === "FIXED" || roundIndex % 2 === 0) {
    return indexInRound + 1;
  }
  return seatCount - indexInRound;
}

export function pickAssignment(
  config: DraftOrderConfig,
  overallPick: number
): PickAssignment {
  const total = totalPicks(config);
  if (!Number.isInteger(overallPick) || overallPick < 1 || overallPick > total) {
    throw new OutOfRangeError(`Pick ${overallPick} is outside 1..${total}`, {
      overall_pick: overallPick,
      total_picks: total
    });
  }
  const seatCount = config.order.length;
  const seat = getSeatForPick(config.discipline, seatCount, overallPick);
  return {
    overall_pick_number: overallPick,
    round_number: Math.floor((overallPick - 1) / seatCount) + 1,
    position_in_round: ((overallPick - 1) % seatCount) + 1,
    picker_id: config.order[seat - 1]
  };
}

export function pickerFor(config: DraftOrderConfig, overallPick: number): string {
  return pickAssignment(config, overallPick).picker_id;
}
