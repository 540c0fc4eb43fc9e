import { describe, expect, it, vi } from "vitest";
import { InMemoryPolicyStore, InMemorySessionStore, makePolicy } from "../../../../test/fakes";

const { getServicesMock } = vi.hoisted(() => ({
  getServicesMock: vi.fn()
}));

vi.mock("@/server/container", () => ({
  getServices: getServicesMock
}));

import { GET } from "./route";

describe("/api/stats", () => {
  it("reports policy totals by region and category with session and chat totals", async () => {
    const sessions = new InMemorySessionStore();
    await sessions.createSession({ sessionId: "session-1", policyId: 1, workflowType: "QA" });
    await sessions.createSession({ sessionId: "session-2", policyId: 2, workflowType: "QA" });
    await sessions.addChatMessage({ sessionId: "session-1", role: "USER", content: "질문" });
    await sessions.addChatMessage({ sessionId: "session-1", role: "ASSISTANT", content: "답변" });
    await sessions.addChatMessage({ sessionId: "session-2", role: "USER", content: "질문" });

    getServicesMock.mockReturnValue({
      sessions,
      policies: new InMemoryPolicyStore([
        makePolicy({ id: 1, region: "서울", category: "창업" }),
        makePolicy({ id: 2, region: "부산", category: "창업" }),
        makePolicy({ id: 3, region: "서울", category: null })
      ])
    });

    const response = await GET(new Request("http://localhost/api/stats"));
    const payload = await response.json();

    expect(response.status).toBe(200);
    expect(payload).toEqual({
      policies: {
        total: 3,
        byRegion: { 서울: 2, 부산: 1 },
        byCategory: { 창업: 2 }
      },
      sessions: { total: 2 },
      chats: { total: 3 }
    });
  });

  it("returns 500 when a count fails", async () => {
    getServicesMock.mockReturnValue({
      sessions: new InMemorySessionStore(),
      policies: { count: vi.fn().mockRejectedValue(new Error("timeout")), countBy: vi.fn().mockResolvedValue({}) }
    });

    const response = await GET(new Request("http://localhost/api/stats"));
    const payload = await response.json();

    expect(response.status).toBe(500);
    expect(payload.error).toEqual({ code: "INTERNAL_ERROR", message: "Failed to load service stats." });
  });
});
