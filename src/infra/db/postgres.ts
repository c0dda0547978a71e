import { Pool, PoolClient } from "pg";

export type SqlRow = Record<string, unknown>;

export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<SqlRow[]>;
}

export interface SqlDatabase extends SqlExecutor {
  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  end(): Promise<void>;
}

export function createPostgresPool(connectionString: string): Pool {
  return new Pool({ connectionString, max: 10 });
}

/** Thin row-returning facade over a pg pool, with BEGIN/COMMIT handling. */
export function createPostgresDatabase(pool: Pool): SqlDatabase {
  return {
    async query(text: string, values?: unknown[]): Promise<SqlRow[]> {
      const result = await pool.query(text, values);
      return result.rows;
    },

    async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        const result = await work(clientExecutor(client));
        await client.query("COMMIT");
        return result;
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      } finally {
        client.release();
      }
    },

    async end(): Promise<void> {
      await pool.end();
    },
  };
}

function clientExecutor(client: PoolClient): SqlExecutor {
  return {
    async query(text: string, values?: unknown[]): Promise<SqlRow[]> {
      const result = await client.query(text, values);
      return result.rows;
    },
  };
}
