import { beforeEach, describe, expect, it, vi } from "vitest";
import { InMemorySessionStore, makeWebResult } from "../../../../test/fakes";

const { getServicesMock } = vi.hoisted(() => ({
  getServicesMock: vi.fn()
}));

vi.mock("@/server/container", () => ({
  getServices: getServicesMock
}));

import { GET } from "./route";

describe("/api/web-sources", () => {
  beforeEach(async () => {
    const sessions = new InMemorySessionStore();
    await sessions.saveWebSources({ sessionId: "session-1", policyId: 1, results: [makeWebResult(1)] });
    await sessions.saveWebSources({ sessionId: "session-2", policyId: 2, results: [makeWebResult(2), makeWebResult(3)] });
    getServicesMock.mockReturnValue({ sessions });
  });

  it("filters by session", async () => {
    const response = await GET(new Request("http://localhost/api/web-sources?sessionId=session-2"));
    const payload = await response.json();

    expect(response.status).toBe(200);
    expect(payload.count).toBe(2);
    expect(payload.webSources.map((source: { url: string }) => source.url)).toEqual([
      "https://example.org/notice/2",
      "https://example.org/notice/3"
    ]);
  });

  it("lists every session when none is given", async () => {
    const response = await GET(new Request("http://localhost/api/web-sources"));
    const payload = await response.json();

    expect(payload.count).toBe(3);
    expect(payload.webSources[0]).toMatchObject({ sessionId: "session-1", sourceType: "tavily", title: "지원 사업 공고 1" });
  });
});
