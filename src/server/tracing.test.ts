import { describe, expect, it, vi } from "vitest";
import type { Logger } from "@/lib/logger";
import { buildFeatureTags, createTracingInterceptor, redactPii, redactPiiDeep } from "./tracing";

function createMockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("redactPii", () => {
  it("masks e-mail user names", () => {
    expect(redactPii("연락처 user@example.com 입니다")).toBe("연락처 u***@example.com 입니다");
  });

  it("masks the middle of phone numbers", () => {
    expect(redactPii("010-1234-5678로 연락")).toBe("010-****-5678로 연락");
    expect(redactPii("01012345678")).toBe("010-****-5678");
  });

  it("masks resident registration numbers without reading them as phone numbers", () => {
    expect(redactPii("주민번호 123456-1234567")).toBe("주민번호 123456-*******");
  });

  it("redacts nested values", () => {
    expect(redactPiiDeep({ contact: ["a@b.co"], meta: { phone: "02-123-4567" }, count: 2 })).toEqual({
      contact: ["a***@b.co"],
      meta: { phone: "02-****-4567" },
      count: 2
    });
  });
});

describe("buildFeatureTags", () => {
  it("adds environment, feature and policy tags", () => {
    expect(buildFeatureTags({ environment: "test", feature: "QA", policyId: 7 })).toEqual([
      "env:test",
      "feature:Q&A",
      "policy:7"
    ]);
  });
});

describe("createTracingInterceptor", () => {
  const event = { stage: "retrieve", sessionId: "session-1", query: "메일 a@b.co", tags: ["feature:Q&A"] };

  it("logs redacted stage events when enabled", () => {
    const logger = createMockLogger();
    const interceptor = createTracingInterceptor({ enabled: true, logger });

    interceptor.before(event);
    interceptor.after({ ...event, durationMs: 12, error: null });

    expect(logger.debug).toHaveBeenCalledWith("Stage started", {
      stage: "retrieve",
      sessionId: "session-1",
      query: "메일 a***@b.co",
      tags: ["feature:Q&A"]
    });
    expect(logger.info).toHaveBeenCalledWith("Stage finished", {
      stage: "retrieve",
      sessionId: "session-1",
      query: "메일 a***@b.co",
      tags: ["feature:Q&A"],
      durationMs: 12,
      failed: false,
      error: null
    });
  });

  it("redacts personal data in tags and error messages", () => {
    const logger = createMockLogger();
    const interceptor = createTracingInterceptor({ enabled: true, logger });

    interceptor.after({
      ...event,
      tags: ["feature:Q&A", "user:kim@example.com"],
      durationMs: 30,
      error: new Error("no session for 010-1234-5678")
    });

    expect(logger.info).toHaveBeenCalledWith("Stage finished", {
      stage: "retrieve",
      sessionId: "session-1",
      query: "메일 a***@b.co",
      tags: ["feature:Q&A", "user:k***@example.com"],
      durationMs: 30,
      failed: true,
      error: "no session for 010-****-5678"
    });
  });

  it("stays quiet when disabled", () => {
    const logger = createMockLogger();
    const interceptor = createTracingInterceptor({ enabled: false, logger });

    interceptor.before(event);
    interceptor.after({ ...event, durationMs: 1, error: new Error("boom") });

    expect(logger.debug).not.toHaveBeenCalled();
    expect(logger.info).not.toHaveBeenCalled();
  });
});
