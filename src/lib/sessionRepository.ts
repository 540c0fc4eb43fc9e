import type { QueryClient } from "@/lib/db";
import { toStringOrNull } from "@/lib/textNormalization";
import type { WebProviderName, WebResult } from "@/lib/webSearch";

export type ChatRole = "USER" | "ASSISTANT" | "SYSTEM";

export type WorkflowType = "QA";

export type ChatSession = {
  id: string;
  policyId: number | null;
  workflowType: WorkflowType;
  createdAt: string | null;
};

export type ChatMessage = {
  role: ChatRole;
  content: string;
  metadata: Record<string, unknown> | null;
  createdAt: string | null;
};

export type WebSourceRecord = {
  id: number;
  sessionId: string | null;
  policyId: number | null;
  url: string | null;
  title: string | null;
  snippet: string | null;
  fetchedDate: string | null;
  sourceType: WebProviderName;
  createdAt: string | null;
};

export interface SessionStore {
  getSession(sessionId: string): Promise<ChatSession | null>;
  createSession(params: { sessionId: string; policyId: number | null; workflowType: WorkflowType }): Promise<ChatSession>;
  getChatHistory(sessionId: string, limit: number): Promise<ChatMessage[]>;
  addChatMessage(params: {
    sessionId: string;
    role: ChatRole;
    content: string;
    metadata?: Record<string, unknown> | null;
  }): Promise<void>;
  deleteSession(sessionId: string): Promise<boolean>;
  saveWebSources(params: { sessionId: string; policyId: number | null; results: WebResult[] }): Promise<number>;
  listWebSources(params: { sessionId?: string | null; limit: number }): Promise<WebSourceRecord[]>;
  getWebSource(id: number): Promise<WebSourceRecord | null>;
  countSessions(): Promise<number>;
  countMessages(): Promise<number>;
}

type SessionRow = Record<string, unknown>;

function toIso(value: unknown): string | null {
  if (value instanceof Date) {
    return value.toISOString();
  }

  return toStringOrNull(value);
}

function toNullableNumber(value: unknown): number | null {
  return value === null || value === undefined ? null : Number(value);
}

function toChatRole(value: unknown): ChatRole {
  return value === "ASSISTANT" || value === "SYSTEM" ? value : "USER";
}

function toMetadata(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }

  return Object.fromEntries(Object.entries(value));
}

function normalizeSessionRow(row: SessionRow): ChatSession {
  return {
    id: String(row.id),
    policyId: toNullableNumber(row.policyId),
    workflowType: "QA",
    createdAt: toIso(row.createdAt)
  };
}

function normalizeWebSourceRow(row: SessionRow): WebSourceRecord {
  return {
    id: Number(row.id),
    sessionId: toStringOrNull(row.sessionId),
    policyId: toNullableNumber(row.policyId),
    url: toStringOrNull(row.url),
    title: toStringOrNull(row.title),
    snippet: toStringOrNull(row.snippet),
    fetchedDate: toStringOrNull(row.fetchedDate),
    sourceType: row.sourceType === "duckduckgo" ? "duckduckgo" : "tavily",
    createdAt: toIso(row.createdAt)
  };
}

const WEB_SOURCE_COLUMNS = `"id", "sessionId", "policyId", "url", "title", "snippet",
  to_char("fetchedDate", 'YYYY-MM-DD') AS "fetchedDate", "sourceType", "createdAt"`;

export class PgSessionRepository implements SessionStore {
  constructor(private readonly db: QueryClient) {}

  async getSession(sessionId: string): Promise<ChatSession | null> {
    const rows = await this.db.query<SessionRow>(
      `SELECT "id", "policyId", "workflowType", "createdAt" FROM "ChatSession" WHERE "id" = $1`,
      [sessionId]
    );
    return rows[0] ? normalizeSessionRow(rows[0]) : null;
  }

  async createSession(params: {
    sessionId: string;
    policyId: number | null;
    workflowType: WorkflowType;
  }): Promise<ChatSession> {
    const rows = await this.db.query<SessionRow>(
      `INSERT INTO "ChatSession" ("id", "policyId", "workflowType")
       VALUES ($1, $2, $3)
       RETURNING "id", "policyId", "workflowType", "createdAt"`,
      [params.sessionId, params.policyId, params.workflowType]
    );
    return normalizeSessionRow(rows[0]);
  }

  /** The latest `limit` messages, oldest first. */
  async getChatHistory(sessionId: string, limit: number): Promise<ChatMessage[]> {
    if (limit <= 0) {
      return [];
    }

    const rows = await this.db.query<SessionRow>(
      `SELECT "role", "content", "metadata", "createdAt" FROM (
         SELECT "id", "role", "content", "metadata", "createdAt"
         FROM "ChatMessage"
         WHERE "sessionId" = $1
         ORDER BY "createdAt" DESC, "id" DESC
         LIMIT $2
       ) recent
       ORDER BY "createdAt" ASC, "id" ASC`,
      [sessionId, limit]
    );

    return rows.map((row) => ({
      role: toChatRole(row.role),
      content: typeof row.content === "string" ? row.content : "",
      metadata: toMetadata(row.metadata),
      createdAt: toIso(row.createdAt)
    }));
  }

  async addChatMessage(params: {
    sessionId: string;
    role: ChatRole;
    content: string;
    metadata?: Record<string, unknown> | null;
  }): Promise<void> {
    await this.db.query(
      `INSERT INTO "ChatMessage" ("sessionId", "role", "content", "metadata") VALUES ($1, $2, $3, $4::jsonb)`,
      [params.sessionId, params.role, params.content, params.metadata ? JSON.stringify(params.metadata) : null]
    );
    await this.db.query(`UPDATE "ChatSession" SET "updatedAt" = NOW() WHERE "id" = $1`, [params.sessionId]);
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    const rows = await this.db.query<{ id: string }>(`DELETE FROM "ChatSession" WHERE "id" = $1 RETURNING "id"`, [
      sessionId
    ]);
    return rows.length > 0;
  }

  async saveWebSources(params: { sessionId: string; policyId: number | null; results: WebResult[] }): Promise<number> {
    for (const result of params.results) {
      await this.db.query(
        `INSERT INTO "WebSource" ("sessionId", "policyId", "url", "title", "snippet", "fetchedDate", "sourceType")
         VALUES ($1, $2, $3, $4, $5, $6::date, $7)`,
        [
          params.sessionId,
          params.policyId,
          result.url.slice(0, 512),
          result.title.slice(0, 512),
          result.snippet,
          result.fetchedDate,
          result.provider
        ]
      );
    }

    return params.results.length;
  }

  async listWebSources(params: { sessionId?: string | null; limit: number }): Promise<WebSourceRecord[]> {
    const values: unknown[] = [];
    let where = "";
    if (params.sessionId) {
      values.push(params.sessionId);
      where = `WHERE "sessionId" = $1`;
    }
    values.push(params.limit);

    const rows = await this.db.query<SessionRow>(
      `SELECT ${WEB_SOURCE_COLUMNS}
       FROM "WebSource" ${where}
       ORDER BY "createdAt" DESC, "id" DESC
       LIMIT $${values.length}`,
      values
    );

    return rows.map(normalizeWebSourceRow);
  }

  async getWebSource(id: number): Promise<WebSourceRecord | null> {
    const rows = await this.db.query<SessionRow>(`SELECT ${WEB_SOURCE_COLUMNS} FROM "WebSource" WHERE "id" = $1`, [id]);
    return rows[0] ? normalizeWebSourceRow(rows[0]) : null;
  }

  async countSessions(): Promise<number> {
    const rows = await this.db.query<{ count: number | string }>(`SELECT COUNT(*)::int AS "count" FROM "ChatSession"`);
    return Number(rows[0]?.count ?? 0);
  }

  async countMessages(): Promise<number> {
    const rows = await this.db.query<{ count: number | string }>(`SELECT COUNT(*)::int AS "count" FROM "ChatMessage"`);
    return Number(rows[0]?.count ?? 0);
  }
}
