import { normalizeTitle } from "@pickroom/shared";
import type { CatalogItem } from "../data/catalog.js";
import type { AutoPickPolicy } from "../data/repositories/draftRepository/types.js";

export const DEFAULT_RANDOM_SEED = "draft-random-default";

function createSeededRandom(seed: string) {
  let h = 0;
  for (let i = 0; i < seed.length; i++) {
    h = Math.imul(31, h) + seed.charCodeAt(i);
    h |= 0;
  }
  // Lehmer generators stick at zero; nudge an all-zero hash.
  if (h === 0) h = 1;
  return () => {
    h = Math.imul(48271, h) % 0x7fffffff;
    const result = h / 0x7fffffff;
    return result < 0 ? result * -1 : result;
  };
}

/** `available` is expected in catalog order (rank ascending). */
export function chooseNextAvailable(available: readonly CatalogItem[]) {
  return available[0]?.id;
}

export function chooseAlphabetical(available: readonly CatalogItem[]) {
  return [...available]
    .sort((a, b) => {
      const nameA = normalizeTitle(a.label);
      const nameB = normalizeTitle(b.label);
      if (nameA === nameB) return a.rank - b.rank || a.id.localeCompare(b.id);
      return nameA.localeCompare(nameB);
    })
    .map((item) => item.id)[0];
}

/**
 * Seeded shuffle; the seed is mixed with the pick number so each turn of the
 * draft draws independently while staying reproducible.
 */
export function chooseRandomized(
  availableIds: readonly string[],
  seed: string,
  overallPick: number
): string | undefined {
  const rand = createSeededRandom(`${seed}:${overallPick}`);
  const ids = [...availableIds];
  for (let i = ids.length - 1; i > 0; i--) {
    const j = Math.floor(rand() * (i + 1));
    [ids[i], ids[j]] = [ids[j], ids[i]];
  }
  return ids[0];
}

export function chooseCustomRanking(
  participantId: string,
  availableIds: readonly string[],
  rankings: Record<string, string[]>
) {
  const queue = rankings[participantId] ?? [];
  return queue.find((id) => availableIds.includes(id));
}

/**
 * Picks an item for a participant whose turn expired. Returns undefined only
 * when nothing is selectable.
 */
export function chooseAutoPick(input: {
  policy: AutoPickPolicy;
  participant_id: string;
  overall_pick: number;
  available: readonly CatalogItem[];
}): string | undefined {
  const { policy, available } = input;
  const ids = available.map((item) => item.id);
  switch (policy.strategy) {
    case "NEXT_AVAILABLE":
      return chooseNextAvailable(available);
    case "ALPHABETICAL":
      return chooseAlphabetical(available);
    case "RANDOM_SEED":
      return chooseRandomized(ids, policy.seed || DEFAULT_RANDOM_SEED, input.overall_pick);
    case "CUSTOM_RANKING":
      return (
        chooseCustomRanking(input.participant_id, ids, policy.rankings) ??
        chooseNextAvailable(available)
      );
  }
}
