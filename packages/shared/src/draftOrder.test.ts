import { describe, expect, it } from "vitest";
import {
  OutOfRangeError,
  getSeatForPick,
  pickAssignment,
  pickerFor,
  totalPicks,
  type DraftOrderConfig
} from "./draftOrder.js";

function config(
  overrides: Partial<DraftOrderConfig> = {}
): DraftOrderConfig {
  return {
    order: ["P1", "P2", "P3", "P4"],
    discipline: "SERPENTINE",
    rounds_total: 2,
    ...overrides
  };
}

describe("getSeatForPick", () => {
  it("throws on invalid inputs", () => {
    expect(() => getSeatForPick("SERPENTINE", 0, 1)).toThrow();
    expect(() => getSeatForPick("SERPENTINE", 2, 0)).toThrow();
    expect(() => getSeatForPick("FIXED", -1, 1)).toThrow();
  });

  it("mirrors even rounds for serpentine (4 seats)", () => {
    const seats = [1, 2, 3, 4];
    const picksRound1 = seats.map((_, i) => getSeatForPick("SERPENTINE", 4, i + 1));
    expect(picksRound1).toEqual([1, 2, 3, 4]);

    const picksRound2 = seats.map((_, i) => getSeatForPick("SERPENTINE", 4, 4 + i + 1));
    expect(picksRound2).toEqual([4, 3, 2, 1]);
  });

  it("alternates correctly across multiple rounds (3 seats)", () => {
    const expected = [
      1,
      2,
      3, // round 1
      3,
      2,
      1, // round 2
      1,
      2,
      3 // round 3
    ];
    const results = expected.map((_, i) => getSeatForPick("SERPENTINE", 3, i + 1));
    expect(results).toEqual(expected);
  });

  it("repeats the same order every round for fixed", () => {
    const results = [1, 2, 3, 4, 5, 6].map((pick) => getSeatForPick("FIXED", 3, pick));
    expect(results).toEqual([1, 2, 3, 1, 2, 3]);
  });

  it("works for large pick numbers", () => {
    // Round 5 runs forward and ends on seat 5; mirrored round 6 starts there.
    expect(getSeatForPick("SERPENTINE", 5, 25)).toBe(5);
    expect(getSeatForPick("SERPENTINE", 5, 26)).toBe(5);
    expect(getSeatForPick("SERPENTINE", 5, 30)).toBe(1);
  });
});

describe("pickerFor", () => {
  it("produces P1,P2,P3,P4,P4,P3,P2,P1 for a two-round serpentine draft", () => {
    const cfg = config();
    const picks = Array.from({ length: totalPicks(cfg) }, (_, i) => pickerFor(cfg, i + 1));
    expect(picks).toEqual(["P1", "P2", "P3", "P4", "P4", "P3", "P2", "P1"]);
  });

  it("maps mirrored picks within a round pair to the same participant", () => {
    const cfg = config({ order: ["A", "B", "C"], rounds_total: 6 });
    const n = cfg.order.length;
    for (const r of [1, 3, 5]) {
      for (let k = (r - 1) * n + 1; k <= r * n; k += 1) {
        expect(pickerFor(cfg, k)).toBe(pickerFor(cfg, 2 * n * r - k + 1));
      }
    }
  });

  it("rejects picks outside 1..N×R", () => {
    const cfg = config();
    expect(() => pickerFor(cfg, 0)).toThrow(OutOfRangeError);
    expect(() => pickerFor(cfg, 9)).toThrow(OutOfRangeError);
    expect(() => pickerFor(cfg, 1.5)).toThrow(OutOfRangeError);
  });

  it("is deterministic across repeated calls", () => {
    const cfg = config({ discipline: "FIXED", rounds_total: 3 });
    const first = [1, 5, 9, 12].map((pick) => pickerFor(cfg, pick));
    const second = [1, 5, 9, 12].map((pick) => pickerFor(cfg, pick));
    expect(first).toEqual(["P1", "P1", "P1", "P4"]);
    expect(second).toEqual(first);
  });
});

describe("pickAssignment", () => {
  it("reports round and position in round", () => {
    expect(pickAssignment(config(), 6)).toEqual({
      overall_pick_number: 6,
      round_number: 2,
      position_in_round: 2,
      picker_id: "P3"
    });
  });

  it("carries the range in the error details", () => {
    try {
      pickAssignment(config(), 42);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(OutOfRangeError);
      expect(err).toMatchObject({ details: { overall_pick: 42, total_picks: 8 } });
    }
  });
});
