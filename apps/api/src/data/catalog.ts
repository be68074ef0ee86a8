export type CatalogCategory = {
  id: string;
  name: string;
  sort_index: number;
};

export type CatalogItem = {
  id: string;
  label: string;
  category_id: string | null;
  /** Lower is better; drives the default auto-pick. */
  rank: number;
};

export type ItemPool = {
  id: string;
  categories: CatalogCategory[];
  items: CatalogItem[];
};

/** Read-only view of the item catalog; pools come back in catalog order. */
export interface ItemCatalog {
  getPool(poolId: string): Promise<ItemPool | null>;
}

export function sortPool(pool: ItemPool): ItemPool {
  return {
    id: pool.id,
    categories: [...pool.categories].sort(
      (a, b) => a.sort_index - b.sort_index || a.id.localeCompare(b.id)
    ),
    items: [...pool.items].sort((a, b) => a.rank - b.rank || a.id.localeCompare(b.id))
  };
}

export class InMemoryItemCatalog implements ItemCatalog {
  private readonly pools = new Map<string, ItemPool>();

  constructor(pools: ItemPool[] = []) {
    for (const pool of pools) this.setPool(pool);
  }

  setPool(pool: ItemPool) {
    this.pools.set(pool.id, sortPool(pool));
  }

  async getPool(poolId: string): Promise<ItemPool | null> {
    return this.pools.get(poolId) ?? null;
  }
}

export class CatalogFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogFormatError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseCategory(raw: unknown, index: number): CatalogCategory {
  if (!isRecord(raw) || typeof raw.id !== "string") {
    throw new CatalogFormatError(`Category ${index} is missing an id`);
  }
  return {
    id: raw.id,
    name: typeof raw.name === "string" ? raw.name : raw.id,
    sort_index: typeof raw.sort_index === "number" ? raw.sort_index : index
  };
}

function parseItem(raw: unknown, index: number): CatalogItem {
  if (!isRecord(raw) || typeof raw.id !== "string") {
    throw new CatalogFormatError(`Item ${index} is missing an id`);
  }
  return {
    id: raw.id,
    label: typeof raw.label === "string" ? raw.label : raw.id,
    category_id: typeof raw.category_id === "string" ? raw.category_id : null,
    rank: typeof raw.rank === "number" ? raw.rank : index + 1
  };
}

/** Parses a `{ pools: [...] }` catalog document. */
export function parseItemPools(raw: unknown): ItemPool[] {
  if (!isRecord(raw) || !Array.isArray(raw.pools)) {
    throw new CatalogFormatError("Catalog must have a pools array");
  }
  return raw.pools.map((pool, poolIndex) => {
    if (!isRecord(pool) || typeof pool.id !== "string") {
      throw new CatalogFormatError(`Pool ${poolIndex} is missing an id`);
    }
    const categories = Array.isArray(pool.categories) ? pool.categories : [];
    const items = Array.isArray(pool.items) ? pool.items : [];
    return sortPool({
      id: pool.id,
      categories: categories.map(parseCategory),
      items: items.map(parseItem)
    });
  });
}
