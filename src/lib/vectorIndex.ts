import { z } from "zod";
import { embeddingToVectorLiteral, type QueryClient } from "@/lib/db";

export const DOC_TYPES = ["overview", "target", "support", "process", "contact", "other"] as const;

export type DocType = (typeof DOC_TYPES)[number];

export function toDocType(value: unknown): DocType {
  return DOC_TYPES.find((docType) => docType === value) ?? "other";
}

export type VectorPayload = {
  policyId: number;
  docType: DocType;
  content: string;
  chunkIndex: number;
  documentId?: number;
  region?: string | null;
  category?: string | null;
};

export type VectorFilter = {
  policyId?: number;
  region?: string;
  category?: string;
};

export type VectorHit = {
  id: string;
  score: number;
  payload: VectorPayload;
};

export interface VectorIndex {
  upsert(id: string, vector: number[], payload: VectorPayload): Promise<void>;
  search(vector: number[], limit: number, scoreThreshold: number, filter?: VectorFilter): Promise<VectorHit[]>;
  count(): Promise<number>;
}

export const UPSERT_VECTOR_SQL = `
INSERT INTO "VectorPoint" ("id", "embedding", "payload")
VALUES ($1, $2::vector, $3::jsonb)
ON CONFLICT ("id") DO UPDATE
SET "embedding" = EXCLUDED."embedding", "payload" = EXCLUDED."payload"
`;

type VectorRow = {
  id: string;
  payload: unknown;
  similarity: number | string;
};

const VectorPayloadSchema = z.object({
  policyId: z.coerce.number().int(),
  docType: z.unknown().transform(toDocType),
  content: z.string(),
  chunkIndex: z.coerce.number().int().default(0),
  documentId: z.number().int().optional(),
  region: z.string().nullish(),
  category: z.string().nullish()
});

function readPayload(raw: unknown): VectorPayload | null {
  const parsed = VectorPayloadSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function buildVectorSearchQuery(
  vector: number[],
  limit: number,
  scoreThreshold: number,
  filter: VectorFilter = {}
): { sql: string; values: unknown[] } {
  const values: unknown[] = [embeddingToVectorLiteral(vector), scoreThreshold];
  const conditions = [`1 - ("embedding" <=> $1::vector) >= $2`];

  if (filter.policyId !== undefined) {
    values.push(String(filter.policyId));
    conditions.push(`"payload" ->> 'policyId' = $${values.length}`);
  }

  if (filter.region) {
    values.push(filter.region);
    conditions.push(`"payload" ->> 'region' = $${values.length}`);
  }

  if (filter.category) {
    values.push(filter.category);
    conditions.push(`"payload" ->> 'category' = $${values.length}`);
  }

  values.push(limit);

  const sql = `
SELECT
  "id",
  "payload",
  1 - ("embedding" <=> $1::vector) AS "similarity"
FROM "VectorPoint"
WHERE ${conditions.join("\n  AND ")}
ORDER BY "embedding" <=> $1::vector ASC, "id" ASC
LIMIT $${values.length}
`;

  return { sql, values };
}

/** Cosine-similarity index over the `VectorPoint` table (pgvector). */
export class PgVectorIndex implements VectorIndex {
  constructor(private readonly db: QueryClient) {}

  async upsert(id: string, vector: number[], payload: VectorPayload): Promise<void> {
    await this.db.query(UPSERT_VECTOR_SQL, [id, embeddingToVectorLiteral(vector), JSON.stringify(payload)]);
  }

  async search(
    vector: number[],
    limit: number,
    scoreThreshold: number,
    filter?: VectorFilter
  ): Promise<VectorHit[]> {
    if (limit <= 0) {
      return [];
    }

    const { sql, values } = buildVectorSearchQuery(vector, limit, scoreThreshold, filter);
    const rows = await this.db.query<VectorRow>(sql, values);

    const hits: VectorHit[] = [];
    for (const row of rows) {
      const payload = readPayload(row.payload);
      if (!payload) {
        continue;
      }

      hits.push({ id: row.id, score: Number(row.similarity), payload });
    }

    return hits;
  }

  async count(): Promise<number> {
    const rows = await this.db.query<{ count: number | string }>(`SELECT COUNT(*)::int AS "count" FROM "VectorPoint"`);
    return Number(rows[0]?.count ?? 0);
  }
}
