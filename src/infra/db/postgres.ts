import pg from "pg";
import { TransientProviderError } from "../../domain/errors.js";
import { getLogger } from "../log/logger.js";

const log = getLogger({ module: "postgres" });

export function createPostgresPool(connectionString: string): pg.Pool {
  const pool = new pg.Pool({ connectionString, max: 10 });
  pool.on("error", (error) => {
    log.error({ err: error }, "idle postgres client error");
  });
  return pool;
}

export async function withTransaction<T>(
  pool: pg.Pool,
  work: (client: pg.PoolClient) => Promise<T>,
): Promise<T> {
  const client = await connect(pool);
  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw toStoreError(error);
  } finally {
    client.release();
  }
}

export async function connect(pool: pg.Pool): Promise<pg.PoolClient> {
  try {
    return await pool.connect();
  } catch (error) {
    throw toStoreError(error);
  }
}

const TRANSIENT_NODE_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EPIPE"]);

/** Connection-level failures become transient; SQL errors pass through unchanged. */
export function toStoreError(error: unknown): unknown {
  if (!(error instanceof Error) || !("code" in error) || typeof error.code !== "string") {
    return error;
  }
  const code = error.code;
  if (TRANSIENT_NODE_CODES.has(code) || code.startsWith("08") || code === "57P01") {
    return new TransientProviderError(`Database unavailable: ${error.message}`, { code });
  }
  return error;
}
