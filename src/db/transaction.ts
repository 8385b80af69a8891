import type { PoolClient } from "pg";
import pool from "./connection.js";

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client. Any error rolls the
 * whole unit back and is rethrown; the client is always released.
 */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}
