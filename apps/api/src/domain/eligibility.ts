import type { CatalogCategory, CatalogItem, ItemPool } from "../data/catalog.js";
import type {
  DraftConfiguration,
  EligibilityPolicy
} from "../data/repositories/draftRepository/types.js";

export type IneligibleReason =
  | "NOT_IN_POOL"
  | "ALREADY_OWNED"
  | "CATEGORY_FILLED"
  | "WRONG_CATEGORY_FOR_ROUND";

export type EligibilityCheck = { ok: true } | { ok: false; reason: IneligibleReason };

type SelectionLike = { picker_id: string; item_id: string };

export type EligibilityInput = {
  policy: EligibilityPolicy;
  pool: ItemPool;
  participant_id: string;
  round_number: number;
  /** Every committed selection in the draft, any picker. */
  selections: readonly SelectionLike[];
};

type EligibilityContext = {
  input: EligibilityInput;
  ownedGlobally: Set<string>;
  ownedByParticipant: Set<string>;
  filledCategories: Set<string>;
  activeCategoryId: string | null;
  categoryByItem: Map<string, string | null>;
};

/**
 * The category bound to a round in category-rounds drafts: catalog order,
 * advancing one per round and clamped at the last category.
 */
export function activeCategoryForRound(
  pool: ItemPool,
  roundNumber: number
): CatalogCategory | null {
  if (pool.categories.length === 0) return null;
  const index = Math.min(Math.max(roundNumber, 1) - 1, pool.categories.length - 1);
  return pool.categories[index];
}

function buildContext(input: EligibilityInput): EligibilityContext {
  const categoryByItem = new Map(
    input.pool.items.map((item) => [item.id, item.category_id])
  );
  const ownedGlobally = new Set(input.selections.map((s) => s.item_id));
  const mine = input.selections.filter((s) => s.picker_id === input.participant_id);
  const ownedByParticipant = new Set(mine.map((s) => s.item_id));
  const filledCategories = new Set<string>();
  for (const s of mine) {
    const categoryId = categoryByItem.get(s.item_id);
    if (categoryId) filledCategories.add(categoryId);
  }
  const activeCategoryId =
    input.policy.mode === "CATEGORY_ROUNDS"
      ? (activeCategoryForRound(input.pool, input.round_number)?.id ?? null)
      : null;
  return {
    input,
    ownedGlobally,
    ownedByParticipant,
    filledCategories,
    activeCategoryId,
    categoryByItem
  };
}

function reasonFor(item: CatalogItem, ctx: EligibilityContext): IneligibleReason | null {
  const { policy } = ctx.input;
  if (ctx.ownedByParticipant.has(item.id)) return "ALREADY_OWNED";

  switch (policy.mode) {
    case "OPEN_POOL":
      if (!policy.allow_shared_ownership && ctx.ownedGlobally.has(item.id)) {
        return "ALREADY_OWNED";
      }
      return null;
    case "CATEGORY_ANY":
    case "CATEGORY_ROUNDS": {
      if (!item.category_id) return "NOT_IN_POOL";
      if (policy.mode === "CATEGORY_ROUNDS" && item.category_id !== ctx.activeCategoryId) {
        return "WRONG_CATEGORY_FOR_ROUND";
      }
      if (policy.exclusive_items && ctx.ownedGlobally.has(item.id)) {
        return "ALREADY_OWNED";
      }
      if (!policy.allow_duplicate_picks && ctx.filledCategories.has(item.category_id)) {
        return "CATEGORY_FILLED";
      }
      return null;
    }
  }
}

/** Item ids the participant may take on this turn, in catalog order. */
export function selectableItems(input: EligibilityInput): Set<string> {
  const ctx = buildContext(input);
  return new Set(
    input.pool.items.filter((item) => reasonFor(item, ctx) === null).map((i) => i.id)
  );
}

/** Same rule as `selectableItems`, with the cause for a rejection. */
export function checkEligibility(
  input: EligibilityInput & { item_id: string }
): EligibilityCheck {
  const item = input.pool.items.find((i) => i.id === input.item_id);
  if (!item) return { ok: false, reason: "NOT_IN_POOL" };
  const reason = reasonFor(item, buildContext(input));
  return reason ? { ok: false, reason } : { ok: true };
}

export const ineligibleMessages: Record<IneligibleReason, string> = {
  NOT_IN_POOL: "Item is not part of this draft",
  ALREADY_OWNED: "Item has already been selected",
  CATEGORY_FILLED: "You already hold a pick in this category",
  WRONG_CATEGORY_FOR_ROUND: "Item is not in this round's category"
};

/** How many rounds each category is active for in a category-rounds draft. */
function roundsPerCategory(pool: ItemPool, roundsTotal: number): Map<string, number> {
  const counts = new Map<string, number>();
  for (let round = 1; round <= roundsTotal; round += 1) {
    const category = activeCategoryForRound(pool, round);
    if (category) counts.set(category.id, (counts.get(category.id) ?? 0) + 1);
  }
  return counts;
}

/**
 * Checks that a pool can carry a full draft under the configuration, whatever
 * the participants pick; returns the problems found (empty when every turn is
 * guaranteed an eligible item).
 */
export function validateConfigAgainstPool(
  config: DraftConfiguration,
  pool: ItemPool
): string[] {
  const issues: string[] = [];
  const seats = config.order.length;
  const rounds = config.rounds_total;
  const policy = config.eligibility;

  if (policy.mode === "OPEN_POOL") {
    // A participant never takes the same item twice, shared or not.
    const needed = policy.allow_shared_ownership ? rounds : seats * rounds;
    if (pool.items.length < needed) {
      issues.push(`Pool has ${pool.items.length} items but the draft needs ${needed}`);
    }
    return issues;
  }

  if (pool.categories.length === 0) {
    issues.push("Category drafts need a pool with categories");
    return issues;
  }
  const sizes = new Map(pool.categories.map((c) => [c.id, 0]));
  for (const item of pool.items) {
    if (item.category_id === null) continue;
    const size = sizes.get(item.category_id);
    if (size !== undefined) sizes.set(item.category_id, size + 1);
  }
  const empty = pool.categories.filter((c) => sizes.get(c.id) === 0).map((c) => c.id);
  if (empty.length > 0) {
    issues.push(`Categories without items: ${empty.join(", ")}`);
    return issues;
  }
  // Exclusive items are shared out between every seat; otherwise each seat has its own copy.
  const takers = policy.exclusive_items ? seats : 1;

  if (policy.mode === "CATEGORY_ROUNDS") {
    if (!policy.allow_duplicate_picks && rounds > pool.categories.length) {
      issues.push(`Draft has ${rounds} rounds but only ${pool.categories.length} categories`);
      return issues;
    }
    for (const [categoryId, activeRounds] of roundsPerCategory(pool, rounds)) {
      const needed = takers * activeRounds;
      const size = sizes.get(categoryId) ?? 0;
      if (size < needed) {
        issues.push(`Category ${categoryId} has ${size} items but its rounds need ${needed}`);
      }
    }
    return issues;
  }

  if (policy.allow_duplicate_picks) {
    const categorized = [...sizes.values()].reduce((sum, n) => sum + n, 0);
    const needed = takers * rounds;
    if (categorized < needed) {
      issues.push(`Pool has ${categorized} categorized items but the draft needs ${needed}`);
    }
    return issues;
  }
  if (rounds > pool.categories.length) {
    issues.push(`Draft has ${rounds} rounds but only ${pool.categories.length} categories`);
  }
  for (const [categoryId, size] of sizes) {
    if (size < takers) {
      issues.push(`Category ${categoryId} has ${size} items but ${takers} participants may take one`);
    }
  }
  return issues;
}
