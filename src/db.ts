// src/db.ts
import { Pool } from "pg";

export function createPool(connectionString: string | undefined): Pool {
  return new Pool({
    connectionString,
    ssl: connectionString?.includes("neon.tech") ? { rejectUnauthorized: false } : undefined,
  });
}

/** The slice of a pg client the record store needs; tests hand in an in-memory stand-in. */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface ConnectionSource {
  connect(): Promise<Queryable & { release(): void }>;
}

export function poolSource(pool: Pool): ConnectionSource {
  return {
    async connect() {
      const client = await pool.connect();
      return {
        query: async (text: string, params?: unknown[]) => {
          const res = await client.query(text, params);
          return { rows: res.rows };
        },
        release: () => client.release(),
      };
    },
  };
}

export async function query(source: ConnectionSource, text: string, params?: unknown[]): Promise<{ rows: unknown[] }> {
  const client = await source.connect();
  try {
    return await client.query(text, params);
  } finally {
    client.release();
  }
}
