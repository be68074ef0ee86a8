import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from "pg";
import { errorFields, log } from "../logger.js";

export type DbClient = Pool | PoolClient;

export function createPool(connectionString: string, options: { max?: number } = {}) {
  return new Pool({
    connectionString,
    max: options.max ?? 10,
    application_name: "pickroom-api"
  });
}

/** SQLSTATE of a driver error, when it carries one. */
export function pgErrorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function isUniqueViolation(err: unknown): boolean {
  return pgErrorCode(err) === "23505";
}

/**
 * Runs `fn` inside BEGIN/COMMIT on one pooled client. A failed ROLLBACK is
 * logged; the caller always sees the original error.
 */
export async function runInTransaction<T>(
  pool: Pool,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      log({
        level: "error",
        msg: "db_rollback_failed",
        ...errorFields(rollbackErr)
      });
    }
    throw err;
  } finally {
    client.release();
  }
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  client: DbClient,
  text: string,
  params: unknown[] = []
): Promise<QueryResult<T>> {
  return client.query<T>(text, params);
}
