import { describe, expect, it, vi } from "vitest";
import { InMemoryPolicyStore, makePolicy } from "../../../../../test/fakes";

const { getServicesMock } = vi.hoisted(() => ({
  getServicesMock: vi.fn()
}));

vi.mock("@/server/container", () => ({
  getServices: getServicesMock
}));

import { GET } from "./route";

describe("/api/health/db", () => {
  it("reports the stored policy count", async () => {
    getServicesMock.mockReturnValue({ policies: new InMemoryPolicyStore([makePolicy({ id: 1 }), makePolicy({ id: 2 })]) });

    const response = await GET(new Request("http://localhost/api/health/db"));
    const payload = await response.json();

    expect(response.status).toBe(200);
    expect(payload).toEqual({ status: "healthy", database: "postgres", policiesCount: 2 });
  });

  it("reports an unhealthy database with 503", async () => {
    getServicesMock.mockReturnValue({ policies: { count: vi.fn().mockRejectedValue(new Error("connection refused")) } });

    const response = await GET(new Request("http://localhost/api/health/db"));
    const payload = await response.json();

    expect(response.status).toBe(503);
    expect(payload).toEqual({ status: "unhealthy", database: "postgres", error: "connection refused" });
  });
});
