import { describe, expect, it, vi } from "vitest";
import { PgPolicyRepository, normalizePolicyRow } from "./policyRepository";

function policyRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 3,
    programId: 1203,
    region: "서울",
    category: "창업",
    programName: "청년 창업 지원",
    programOverview: "  예비 창업자 지원  ",
    supportDescription: "사업화 자금",
    supportBudget: "50000000",
    supportScale: "100개사",
    supervisingMinistry: "중소벤처기업부",
    applyTarget: "만 39세 이하",
    announcementDate: "2024-02-01",
    bizProcess: "공고 > 접수 > 평가",
    applicationMethod: ["온라인 접수"],
    contactAgency: "창업진흥원",
    contactNumber: ["02-000-0000", 5],
    requiredDocuments: null,
    collectedDate: "2024-02-10",
    createdAt: new Date("2024-02-11T00:00:00Z"),
    ...overrides
  };
}

describe("normalizePolicyRow", () => {
  it("turns json list columns into string arrays and trims text", () => {
    const record = normalizePolicyRow(policyRow());

    expect(record.programOverview).toBe("예비 창업자 지원");
    expect(record.supportBudget).toBe(50000000);
    expect(record.applicationMethod).toEqual(["온라인 접수"]);
    expect(record.contactAgency).toEqual(["창업진흥원"]);
    expect(record.contactNumber).toEqual(["02-000-0000"]);
    expect(record.requiredDocuments).toEqual([]);
    expect(record.createdAt).toBe("2024-02-11T00:00:00.000Z");
  });
});

describe("PgPolicyRepository", () => {
  it("filters by region and category and orders by recency", async () => {
    const db = { query: vi.fn().mockResolvedValue([policyRow()]) };

    const policies = await new PgPolicyRepository(db).search({ region: "서울", category: "창업" }, 10, 20);

    const [sql, values] = db.query.mock.calls[0];
    expect(sql).toContain(`WHERE "region" = $1 AND "category" = $2`);
    expect(sql).toContain(`ORDER BY "createdAt" DESC`);
    expect(sql).toContain("LIMIT $3 OFFSET $4");
    expect(values).toEqual(["서울", "창업", 10, 20]);
    expect(policies.map((policy) => policy.id)).toEqual([3]);
  });

  it("counts without a where clause when no filter is set", async () => {
    const db = { query: vi.fn().mockResolvedValue([{ count: 42 }]) };

    await expect(new PgPolicyRepository(db).count({})).resolves.toBe(42);
    expect(db.query.mock.calls[0][0]).toBe(`SELECT COUNT(*)::int AS "count" FROM "Policy" `);
  });

  it("does not query for an empty id list", async () => {
    const db = { query: vi.fn() };

    await expect(new PgPolicyRepository(db).findByIds([])).resolves.toEqual([]);
    expect(db.query).not.toHaveBeenCalled();
  });

  it("returns null for a missing policy", async () => {
    const db = { query: vi.fn().mockResolvedValue([]) };

    await expect(new PgPolicyRepository(db).getById(99)).resolves.toBeNull();
    expect(db.query.mock.calls[0][1]).toEqual([99]);
  });

  it("stores list columns as JSON", async () => {
    const db = { query: vi.fn().mockResolvedValue([policyRow()]) };
    const { id: _id, createdAt: _createdAt, ...policy } = normalizePolicyRow(policyRow());

    await new PgPolicyRepository(db).insertPolicy(policy);

    const values = db.query.mock.calls[0][1];
    expect(values[0]).toBe(1203);
    expect(values[12]).toBe(JSON.stringify(["온라인 접수"]));
    expect(values[16]).toBe("2024-02-10");
  });
});

describe("PgPolicyRepository.countBy", () => {
  it("groups policy counts by region", async () => {
    const db = {
      query: vi.fn().mockResolvedValue([
        { value: "부산", count: 2 },
        { value: "서울", count: "5" }
      ])
    };

    const counts = await new PgPolicyRepository(db).countBy("region");

    const [sql] = db.query.mock.calls[0];
    expect(sql).toContain(`GROUP BY "region"`);
    expect(sql).toContain(`WHERE "region" IS NOT NULL`);
    expect(counts).toEqual({ 부산: 2, 서울: 5 });
  });
});
