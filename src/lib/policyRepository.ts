import type { QueryClient } from "@/lib/db";
import { toStringList, toStringOrNull } from "@/lib/textNormalization";
import { toDocType, type DocType } from "@/lib/vectorIndex";

export type PolicyRecord = {
  id: number;
  programId: number;
  region: string | null;
  category: string | null;
  programName: string;
  programOverview: string | null;
  supportDescription: string | null;
  supportBudget: number | null;
  supportScale: string | null;
  supervisingMinistry: string | null;
  applyTarget: string | null;
  announcementDate: string | null;
  bizProcess: string | null;
  applicationMethod: string[];
  contactAgency: string[];
  contactNumber: string[];
  requiredDocuments: string[];
  collectedDate: string | null;
  createdAt: string | null;
};

export type NewPolicy = Omit<PolicyRecord, "id" | "createdAt">;

export type PolicyFilters = {
  region?: string | null;
  category?: string | null;
};

export type PolicyDocumentRecord = {
  id: number;
  policyId: number;
  docType: DocType;
  content: string;
  metadata: Record<string, unknown>;
};

export type NewPolicyDocument = Omit<PolicyDocumentRecord, "id">;

export type PolicyGroupField = "region" | "category";

export interface PolicyStore {
  search(filters: PolicyFilters, limit: number, offset: number): Promise<PolicyRecord[]>;
  count(filters: PolicyFilters): Promise<number>;
  findByIds(ids: number[]): Promise<PolicyRecord[]>;
  getById(id: number): Promise<PolicyRecord | null>;
  findByProgramId(programId: number): Promise<PolicyRecord | null>;
  listRegions(): Promise<string[]>;
  listCategories(): Promise<string[]>;
  insertPolicy(policy: NewPolicy): Promise<PolicyRecord>;
  insertDocument(document: NewPolicyDocument): Promise<PolicyDocumentRecord>;
  listDocuments(policyId: number): Promise<PolicyDocumentRecord[]>;
  countBy(field: PolicyGroupField): Promise<Record<string, number>>;
}

const POLICY_COLUMNS = `
  "id", "programId", "region", "category", "programName", "programOverview", "supportDescription",
  "supportBudget", "supportScale", "supervisingMinistry", "applyTarget", "announcementDate", "bizProcess",
  "applicationMethod", "contactAgency", "contactNumber", "requiredDocuments",
  to_char("collectedDate", 'YYYY-MM-DD') AS "collectedDate", "createdAt"
`;

type PolicyRow = Record<string, unknown>;

function toNumberOrNull(value: unknown): number | null {
  if (value === null || value === undefined || value === "") {
    return null;
  }

  const numeric = Number(value);
  return Number.isFinite(numeric) ? numeric : null;
}

function toTimestamp(value: unknown): string | null {
  if (value instanceof Date) {
    return value.toISOString();
  }

  return toStringOrNull(value);
}

export function normalizePolicyRow(row: PolicyRow): PolicyRecord {
  return {
    id: Number(row.id),
    programId: Number(row.programId),
    region: toStringOrNull(row.region),
    category: toStringOrNull(row.category),
    programName: toStringOrNull(row.programName) ?? "",
    programOverview: toStringOrNull(row.programOverview),
    supportDescription: toStringOrNull(row.supportDescription),
    supportBudget: toNumberOrNull(row.supportBudget),
    supportScale: toStringOrNull(row.supportScale),
    supervisingMinistry: toStringOrNull(row.supervisingMinistry),
    applyTarget: toStringOrNull(row.applyTarget),
    announcementDate: toStringOrNull(row.announcementDate),
    bizProcess: toStringOrNull(row.bizProcess),
    applicationMethod: toStringList(row.applicationMethod),
    contactAgency: toStringList(row.contactAgency),
    contactNumber: toStringList(row.contactNumber),
    requiredDocuments: toStringList(row.requiredDocuments),
    collectedDate: toStringOrNull(row.collectedDate),
    createdAt: toTimestamp(row.createdAt)
  };
}

function normalizeDocumentRow(row: PolicyRow): PolicyDocumentRecord {
  const metadata = row.metadata;
  const entries = metadata && typeof metadata === "object" ? Object.entries(metadata) : [];

  return {
    id: Number(row.id),
    policyId: Number(row.policyId),
    docType: toDocType(row.docType),
    content: toStringOrNull(row.content) ?? "",
    metadata: Object.fromEntries(entries)
  };
}

export function buildFilterClause(filters: PolicyFilters, values: unknown[]): string {
  const conditions: string[] = [];

  if (filters.region) {
    values.push(filters.region);
    conditions.push(`"region" = $${values.length}`);
  }

  if (filters.category) {
    values.push(filters.category);
    conditions.push(`"category" = $${values.length}`);
  }

  return conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
}

export class PgPolicyRepository implements PolicyStore {
  constructor(private readonly db: QueryClient) {}

  async search(filters: PolicyFilters, limit: number, offset: number): Promise<PolicyRecord[]> {
    const values: unknown[] = [];
    const where = buildFilterClause(filters, values);
    values.push(limit, offset);

    const rows = await this.db.query<PolicyRow>(
      `SELECT ${POLICY_COLUMNS} FROM "Policy" ${where}
       ORDER BY "createdAt" DESC, "id" DESC
       LIMIT $${values.length - 1} OFFSET $${values.length}`,
      values
    );

    return rows.map(normalizePolicyRow);
  }

  async count(filters: PolicyFilters): Promise<number> {
    const values: unknown[] = [];
    const where = buildFilterClause(filters, values);
    const rows = await this.db.query<{ count: number | string }>(
      `SELECT COUNT(*)::int AS "count" FROM "Policy" ${where}`,
      values
    );

    return Number(rows[0]?.count ?? 0);
  }

  async findByIds(ids: number[]): Promise<PolicyRecord[]> {
    if (ids.length === 0) {
      return [];
    }

    const rows = await this.db.query<PolicyRow>(`SELECT ${POLICY_COLUMNS} FROM "Policy" WHERE "id" = ANY($1::int[])`, [
      ids
    ]);

    return rows.map(normalizePolicyRow);
  }

  async getById(id: number): Promise<PolicyRecord | null> {
    const rows = await this.db.query<PolicyRow>(`SELECT ${POLICY_COLUMNS} FROM "Policy" WHERE "id" = $1`, [id]);
    return rows[0] ? normalizePolicyRow(rows[0]) : null;
  }

  async findByProgramId(programId: number): Promise<PolicyRecord | null> {
    const rows = await this.db.query<PolicyRow>(`SELECT ${POLICY_COLUMNS} FROM "Policy" WHERE "programId" = $1`, [
      programId
    ]);
    return rows[0] ? normalizePolicyRow(rows[0]) : null;
  }

  async listRegions(): Promise<string[]> {
    const rows = await this.db.query<{ value: string }>(
      `SELECT DISTINCT "region" AS "value" FROM "Policy" WHERE "region" IS NOT NULL ORDER BY "region" ASC`
    );
    return rows.map((row) => row.value);
  }

  async listCategories(): Promise<string[]> {
    const rows = await this.db.query<{ value: string }>(
      `SELECT DISTINCT "category" AS "value" FROM "Policy" WHERE "category" IS NOT NULL ORDER BY "category" ASC`
    );
    return rows.map((row) => row.value);
  }

  async insertPolicy(policy: NewPolicy): Promise<PolicyRecord> {
    const rows = await this.db.query<PolicyRow>(
      `INSERT INTO "Policy" (
        "programId", "region", "category", "programName", "programOverview", "supportDescription",
        "supportBudget", "supportScale", "supervisingMinistry", "applyTarget", "announcementDate", "bizProcess",
        "applicationMethod", "contactAgency", "contactNumber", "requiredDocuments", "collectedDate"
      ) VALUES (
        $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12,
        $13::jsonb, $14::jsonb, $15::jsonb, $16::jsonb, $17::date
      )
      RETURNING ${POLICY_COLUMNS}`,
      [
        policy.programId,
        policy.region,
        policy.category,
        policy.programName,
        policy.programOverview,
        policy.supportDescription,
        policy.supportBudget,
        policy.supportScale,
        policy.supervisingMinistry,
        policy.applyTarget,
        policy.announcementDate,
        policy.bizProcess,
        JSON.stringify(policy.applicationMethod),
        JSON.stringify(policy.contactAgency),
        JSON.stringify(policy.contactNumber),
        JSON.stringify(policy.requiredDocuments),
        policy.collectedDate
      ]
    );

    return normalizePolicyRow(rows[0]);
  }

  async insertDocument(document: NewPolicyDocument): Promise<PolicyDocumentRecord> {
    const rows = await this.db.query<PolicyRow>(
      `INSERT INTO "PolicyDocument" ("policyId", "docType", "content", "metadata")
       VALUES ($1, $2, $3, $4::jsonb)
       RETURNING "id", "policyId", "docType", "content", "metadata"`,
      [document.policyId, document.docType, document.content, JSON.stringify(document.metadata)]
    );

    return normalizeDocumentRow(rows[0]);
  }

  async listDocuments(policyId: number): Promise<PolicyDocumentRecord[]> {
    const rows = await this.db.query<PolicyRow>(
      `SELECT "id", "policyId", "docType", "content", "metadata"
       FROM "PolicyDocument" WHERE "policyId" = $1 ORDER BY "id" ASC`,
      [policyId]
    );

    return rows.map(normalizeDocumentRow);
  }

  /** Policy counts per non-null value of `field`. */
  async countBy(field: PolicyGroupField): Promise<Record<string, number>> {
    const column = field === "region" ? `"region"` : `"category"`;
    const rows = await this.db.query<{ value: string; count: number | string }>(
      `SELECT ${column} AS "value", COUNT(*)::int AS "count" FROM "Policy"
       WHERE ${column} IS NOT NULL
       GROUP BY ${column}
       ORDER BY ${column} ASC`
    );

    return Object.fromEntries(rows.map((row) => [row.value, Number(row.count)]));
  }
}
