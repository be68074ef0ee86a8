import { describe, expect, it } from "vitest";
import {
  activeCategoryForRound,
  checkEligibility,
  selectableItems,
  validateConfigAgainstPool
} from "../../src/domain/eligibility.js";
import type { EligibilityPolicy } from "../../src/data/repositories/draftRepository/types.js";
import { categoryPool, draftConfig, openPool } from "../support/drafts.js";

const openPolicy: EligibilityPolicy = { mode: "OPEN_POOL", allow_shared_ownership: false };

function categoryPolicy(
  mode: "CATEGORY_ANY" | "CATEGORY_ROUNDS",
  flags: { allow_duplicate_picks?: boolean; exclusive_items?: boolean } = {}
): EligibilityPolicy {
  return {
    mode,
    allow_duplicate_picks: flags.allow_duplicate_picks ?? false,
    exclusive_items: flags.exclusive_items ?? false
  };
}

describe("open pool", () => {
  const selections = [
    { picker_id: "P1", item_id: "i1" },
    { picker_id: "P2", item_id: "i2" },
    { picker_id: "P1", item_id: "i3" }
  ];

  it("rejects an item another participant already committed", () => {
    const check = checkEligibility({
      policy: openPolicy,
      pool: openPool(),
      participant_id: "P2",
      round_number: 1,
      selections,
      item_id: "i3"
    });
    expect(check).toEqual({ ok: false, reason: "ALREADY_OWNED" });
  });

  it("subtracts every owned item from the selectable set", () => {
    const items = selectableItems({
      policy: openPolicy,
      pool: openPool(),
      participant_id: "P4",
      round_number: 1,
      selections
    });
    expect(items.size).toBe(9);
    expect(items.has("i1")).toBe(false);
    expect(items.has("i4")).toBe(true);
  });

  it("lets others share an item when shared ownership is on", () => {
    const policy: EligibilityPolicy = { mode: "OPEN_POOL", allow_shared_ownership: true };
    const input = { policy, pool: openPool(), round_number: 1, selections, item_id: "i3" };
    expect(checkEligibility({ ...input, participant_id: "P2" })).toEqual({ ok: true });
    expect(checkEligibility({ ...input, participant_id: "P1" })).toEqual({
      ok: false,
      reason: "ALREADY_OWNED"
    });
  });

  it("rejects items outside the pool", () => {
    expect(
      checkEligibility({
        policy: openPolicy,
        pool: openPool(),
        participant_id: "P1",
        round_number: 1,
        selections: [],
        item_id: "missing"
      })
    ).toEqual({ ok: false, reason: "NOT_IN_POOL" });
  });
});

describe("category rounds", () => {
  it("binds round 3 to the third catalog category for every picker", () => {
    const pool = categoryPool();
    expect(activeCategoryForRound(pool, 3)?.id).toBe("c3");
    for (const participant of ["P1", "P2", "P3"]) {
      const items = selectableItems({
        policy: categoryPolicy("CATEGORY_ROUNDS"),
        pool,
        participant_id: participant,
        round_number: 3,
        selections: []
      });
      expect([...items]).toEqual(["c3-a", "c3-b", "c3-c"]);
    }
  });

  it("clamps at the last category once rounds outnumber categories", () => {
    expect(activeCategoryForRound(categoryPool(), 7)?.id).toBe("c5");
  });

  it("reports picks outside the round's category", () => {
    expect(
      checkEligibility({
        policy: categoryPolicy("CATEGORY_ROUNDS"),
        pool: categoryPool(),
        participant_id: "P1",
        round_number: 1,
        selections: [],
        item_id: "c2-a"
      })
    ).toEqual({ ok: false, reason: "WRONG_CATEGORY_FOR_ROUND" });
  });
});

describe("category any", () => {
  const selections = [{ picker_id: "P1", item_id: "c1-a" }];

  it("blocks a second pick in a category the participant filled", () => {
    const items = selectableItems({
      policy: categoryPolicy("CATEGORY_ANY"),
      pool: categoryPool(),
      participant_id: "P1",
      round_number: 2,
      selections
    });
    expect(items.has("c1-b")).toBe(false);
    expect(items.has("c2-a")).toBe(true);
    expect(
      checkEligibility({
        policy: categoryPolicy("CATEGORY_ANY"),
        pool: categoryPool(),
        participant_id: "P1",
        round_number: 2,
        selections,
        item_id: "c1-b"
      })
    ).toEqual({ ok: false, reason: "CATEGORY_FILLED" });
  });

  it("lets other participants hold the same item unless items are exclusive", () => {
    const input = {
      pool: categoryPool(),
      participant_id: "P2",
      round_number: 1,
      selections,
      item_id: "c1-a"
    };
    expect(checkEligibility({ ...input, policy: categoryPolicy("CATEGORY_ANY") })).toEqual({
      ok: true
    });
    expect(
      checkEligibility({
        ...input,
        policy: categoryPolicy("CATEGORY_ANY", { exclusive_items: true })
      })
    ).toEqual({ ok: false, reason: "ALREADY_OWNED" });
  });

  it("allows several picks per category with duplicates on, but never the same item", () => {
    const policy = categoryPolicy("CATEGORY_ANY", { allow_duplicate_picks: true });
    const input = { policy, pool: categoryPool(), participant_id: "P1", round_number: 2, selections };
    expect(checkEligibility({ ...input, item_id: "c1-b" })).toEqual({ ok: true });
    expect(checkEligibility({ ...input, item_id: "c1-a" })).toEqual({
      ok: false,
      reason: "ALREADY_OWNED"
    });
  });

  it("treats uncategorized items as outside a category draft", () => {
    const pool = categoryPool();
    pool.items.push({ id: "loose", label: "Loose", category_id: null, rank: 99 });
    expect(
      checkEligibility({
        policy: categoryPolicy("CATEGORY_ANY"),
        pool,
        participant_id: "P1",
        round_number: 1,
        selections: [],
        item_id: "loose"
      })
    ).toEqual({ ok: false, reason: "NOT_IN_POOL" });
  });
});

describe("validateConfigAgainstPool", () => {
  it("needs enough items for an exclusive open pool", () => {
    const config = draftConfig({ rounds_total: 4 });
    expect(validateConfigAgainstPool(config, openPool())).toEqual([
      "Pool has 12 items but the draft needs 16"
    ]);
    expect(validateConfigAgainstPool(draftConfig({ rounds_total: 3 }), openPool())).toEqual([]);
  });

  it("needs a category per round unless duplicates are allowed", () => {
    const rounds = draftConfig({
      pool_id: "awards",
      rounds_total: 6,
      eligibility: { mode: "CATEGORY_ROUNDS" }
    });
    expect(validateConfigAgainstPool(rounds, categoryPool())).toEqual([
      "Draft has 6 rounds but only 5 categories"
    ]);
    const duplicates = draftConfig({
      pool_id: "awards",
      rounds_total: 6,
      eligibility: { mode: "CATEGORY_ROUNDS", allow_duplicate_picks: true }
    });
    expect(validateConfigAgainstPool(duplicates, categoryPool())).toEqual([]);
  });

  it("rejects category modes over a pool without categories", () => {
    const config = draftConfig({ eligibility: { mode: "CATEGORY_ANY" } });
    expect(validateConfigAgainstPool(config, openPool())).toEqual([
      "Category drafts need a pool with categories"
    ]);
  });

  it("needs rounds_total distinct items when ownership is shared", () => {
    const config = draftConfig({
      order: ["P1", "P2"],
      rounds_total: 3,
      eligibility: { mode: "OPEN_POOL", allow_shared_ownership: true }
    });
    const small = { ...openPool(), items: openPool().items.slice(0, 2) };
    expect(validateConfigAgainstPool(config, small)).toEqual([
      "Pool has 2 items but the draft needs 3"
    ]);
    expect(validateConfigAgainstPool(config, openPool())).toEqual([]);
  });

  it("rejects categories with no items", () => {
    const pool = categoryPool();
    pool.items = pool.items.filter((item) => item.category_id !== "c3");
    const config = draftConfig({ pool_id: "awards", eligibility: { mode: "CATEGORY_ANY" } });
    expect(validateConfigAgainstPool(config, pool)).toEqual(["Categories without items: c3"]);
  });

  it("needs one item per seat in each round's category when items are exclusive", () => {
    const eligibility = { mode: "CATEGORY_ROUNDS", exclusive_items: true };
    expect(
      validateConfigAgainstPool(draftConfig({ pool_id: "awards", eligibility }), categoryPool())
    ).toEqual([
      "Category c1 has 3 items but its rounds need 4",
      "Category c2 has 3 items but its rounds need 4"
    ]);
    expect(
      validateConfigAgainstPool(
        draftConfig({ pool_id: "awards", order: ["P1", "P2", "P3"], eligibility }),
        categoryPool()
      )
    ).toEqual([]);
  });

  it("counts repeated rounds of the last category", () => {
    const config = draftConfig({
      pool_id: "awards",
      order: ["P1", "P2"],
      rounds_total: 6,
      eligibility: { mode: "CATEGORY_ROUNDS", allow_duplicate_picks: true, exclusive_items: true }
    });
    expect(validateConfigAgainstPool(config, categoryPool())).toEqual([
      "Category c5 has 3 items but its rounds need 4"
    ]);
  });

  it("checks exclusive capacity for unrestricted category drafts", () => {
    const exclusive = draftConfig({
      pool_id: "awards",
      eligibility: { mode: "CATEGORY_ANY", exclusive_items: true }
    });
    const issues = validateConfigAgainstPool(exclusive, categoryPool());
    expect(issues).toHaveLength(5);
    expect(issues[0]).toBe("Category c1 has 3 items but 4 participants may take one");

    const duplicates = (rounds: number) =>
      draftConfig({
        pool_id: "awards",
        rounds_total: rounds,
        eligibility: { mode: "CATEGORY_ANY", allow_duplicate_picks: true, exclusive_items: true }
      });
    expect(validateConfigAgainstPool(duplicates(4), categoryPool())).toEqual([
      "Pool has 15 categorized items but the draft needs 16"
    ]);
    expect(validateConfigAgainstPool(duplicates(3), categoryPool())).toEqual([]);
  });
});
