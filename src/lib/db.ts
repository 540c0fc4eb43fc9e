import pg from "pg";
import { getSettings } from "@/lib/config";

export type Row = Record<string, unknown>;

/** The narrow slice of a Postgres client the repositories need. */
export type QueryClient = {
  query<T extends Row>(sql: string, values?: unknown[]): Promise<T[]>;
};

export function createQueryClient(pool: pg.Pool): QueryClient {
  return {
    async query<T extends Row>(sql: string, values: unknown[] = []): Promise<T[]> {
      const result = await pool.query<T>(sql, values);
      return result.rows;
    }
  };
}

export function createPool(databaseUrl: string | null = getSettings().databaseUrl): pg.Pool {
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required");
  }

  return new pg.Pool({ connectionString: databaseUrl, max: 10 });
}

export function embeddingToVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(",")}]`;
}
