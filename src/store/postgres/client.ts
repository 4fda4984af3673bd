import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from "pg";

import { ConfigError, errorMessage } from "../../errors";
import { createLogger } from "../../logging/logger";
import { SCHEMA_SQL } from "./schema";

export type QueryFn = <T extends QueryResultRow>(text: string, values?: unknown[]) => Promise<QueryResult<T>>;

const logger = createLogger("store/postgres");

let pool: Pool | null = null;
let schemaReady: Promise<void> | null = null;

function getPool(): Pool {
  if (pool) {
    return pool;
  }

  const connectionString = process.env.POSTGRES_URL;
  if (!connectionString) {
    throw new ConfigError("POSTGRES_URL is required");
  }

  pool = new Pool({ connectionString });
  pool.on("error", (error) => {
    logger.warn("Idle client error", { error: error.message });
  });
  return pool;
}

async function ensureSchema(): Promise<void> {
  if (!schemaReady) {
    schemaReady = getPool()
      .query(SCHEMA_SQL)
      .then(() => undefined);
  }

  try {
    await schemaReady;
  } catch (error) {
    schemaReady = null;
    throw error;
  }
}

export async function query<T extends QueryResultRow>(text: string, values: unknown[] = []): Promise<QueryResult<T>> {
  await ensureSchema();
  return getPool().query<T>(text, values);
}

/**
 * Runs `work` on one pooled connection inside BEGIN/COMMIT; rolls back when it throws.
 */
export async function withTransaction<T>(work: (tx: QueryFn) => Promise<T>): Promise<T> {
  await ensureSchema();
  const client: PoolClient = await getPool().connect();
  const tx: QueryFn = <R extends QueryResultRow>(text: string, values: unknown[] = []) => client.query<R>(text, values);

  try {
    await client.query("BEGIN");
    const result = await work(tx);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK").catch((rollbackError: unknown) => {
      logger.error("Rollback failed", { error: errorMessage(rollbackError) });
    });
    throw error;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (!pool) {
    return;
  }

  const current = pool;
  pool = null;
  schemaReady = null;
  await current.end();
}
