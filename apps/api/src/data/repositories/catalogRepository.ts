import { DbClient, query } from "../db.js";
import type { CatalogCategory, CatalogItem, ItemCatalog, ItemPool } from "../catalog.js";

export async function getItemPool(client: DbClient, poolId: string): Promise<ItemPool | null> {
  const { rows: categories } = await query<CatalogCategory>(
    client,
    `SELECT id, name, sort_index::int
     FROM catalog_category
     WHERE pool_id = $1
     ORDER BY sort_index ASC, id ASC`,
    [poolId]
  );
  const { rows: items } = await query<CatalogItem>(
    client,
    `SELECT id, label, category_id, rank::int
     FROM catalog_item
     WHERE pool_id = $1
     ORDER BY rank ASC, id ASC`,
    [poolId]
  );
  if (categories.length === 0 && items.length === 0) return null;
  return { id: poolId, categories, items };
}

export class PgItemCatalog implements ItemCatalog {
  constructor(private readonly client: DbClient) {}

  getPool(poolId: string): Promise<ItemPool | null> {
    return getItemPool(this.client, poolId);
  }
}
