import { describe, expect, it, vi } from "vitest";
import type { StageInterceptor } from "@/server/tracing";
import {
  createFakeEmbedder,
  createFakeLanguageModel,
  createFakeWebSearch,
  createSilentLogger,
  InMemoryPolicyStore,
  makePolicy,
  makeWebResult,
  passageHit,
  ScriptedVectorIndex
} from "../../test/fakes";
import { APOLOGY_ANSWER, buildEvidence, runQaWorkflow, type QaWorkflowDeps } from "./qaWorkflow";

const SETTINGS = {
  retrievalTopK: 5,
  retrievalScoreThreshold: 0.7,
  webSearchMaxResults: 3
};

function createDeps(overrides: Partial<QaWorkflowDeps> = {}) {
  const { embedder } = createFakeEmbedder();
  const { languageModel, generate } = createFakeLanguageModel("지원 금액은 최대 5천만원입니다.");
  const webSearch = createFakeWebSearch([makeWebResult(1), makeWebResult(2)]);
  const vectorIndex = new ScriptedVectorIndex([passageHit(1, 0.85, 0), passageHit(1, 0.8, 1), passageHit(1, 0.75, 2)]);

  const deps: QaWorkflowDeps = {
    embedder,
    vectorIndex,
    policies: new InMemoryPolicyStore([makePolicy({ id: 1, programName: "청년 창업 사관학교" })]),
    languageModel,
    webSearch,
    settings: SETTINGS,
    logger: createSilentLogger(),
    ...overrides
  };

  return { deps, generate, webSearch, vectorIndex };
}

describe("runQaWorkflow", () => {
  it("answers from local passages when they suffice", async () => {
    const { deps, webSearch, vectorIndex } = createDeps();

    const result = await runQaWorkflow(deps, { sessionId: "session-1", policyId: 1, query: "지원 금액은 얼마인가요?" });

    expect(result.stages).toEqual(["classify", "retrieve", "evaluateSufficiency", "synthesize"]);
    expect(result.needsWebSearch).toBe(false);
    expect(webSearch).not.toHaveBeenCalled();
    expect(result.webResults).toEqual([]);
    expect(result.retrievedPassages.map((passage) => passage.score)).toEqual([0.85, 0.8, 0.75]);
    expect(vectorIndex.searches[0]).toEqual({ limit: 5, scoreThreshold: 0.7, filter: { policyId: 1 } });
    expect(result.answer).toBe("지원 금액은 최대 5천만원입니다.");
    expect(result.error).toBeNull();
  });

  it("routes keyword queries to web search regardless of passage quality", async () => {
    const { deps, webSearch } = createDeps();

    const result = await runQaWorkflow(deps, { sessionId: "session-1", policyId: 1, query: "신청서 양식 다운로드" });

    expect(result.stages).toEqual(["classify", "retrieve", "evaluateSufficiency", "webSearch", "synthesize"]);
    expect(result.needsWebSearch).toBe(true);
    expect(webSearch).toHaveBeenCalledWith("신청서 양식 다운로드", 3);
    expect(result.webResults.map((webResult) => webResult.title)).toEqual(["지원 사업 공고 1", "지원 사업 공고 2"]);
    expect(result.evidence.map((item) => item.kind)).toEqual(["internal", "internal", "internal", "web", "web"]);
  });

  it("searches the web when too few passages come back", async () => {
    const { deps, webSearch } = createDeps({ vectorIndex: new ScriptedVectorIndex([passageHit(1, 0.95, 0)]) });

    const result = await runQaWorkflow(deps, { sessionId: "session-1", policyId: 1, query: "지원 대상은?" });

    expect(result.needsWebSearch).toBe(true);
    expect(webSearch).toHaveBeenCalledTimes(1);
  });

  it("treats a retrieval failure as zero passages and keeps going", async () => {
    const { embedder } = createFakeEmbedder();
    const { deps, webSearch } = createDeps({
      embedder: { ...embedder, embed: vi.fn().mockRejectedValue(new Error("embedding service down")) }
    });

    const result = await runQaWorkflow(deps, { sessionId: "session-1", policyId: 1, query: "지원 대상은?" });

    expect(result.retrievedPassages).toEqual([]);
    expect(result.error).toBe("retrieve: Failed to retrieve policy passages");
    expect(webSearch).toHaveBeenCalledTimes(1);
    expect(result.answer).toBe("지원 금액은 최대 5천만원입니다.");
    expect(result.stages.at(-1)).toBe("synthesize");
  });

  it("continues with no web results when web search rejects", async () => {
    const webSearch = vi.fn().mockRejectedValue(new Error("network unreachable"));
    const { deps } = createDeps({ webSearch });

    const result = await runQaWorkflow(deps, { sessionId: "session-1", policyId: 1, query: "최신 공고 링크" });

    expect(result.webResults).toEqual([]);
    expect(result.error).toBe("webSearch: network unreachable");
    expect(result.answer).toBe("지원 금액은 최대 5천만원입니다.");
  });

  it("returns the apology answer when the language model fails", async () => {
    const { languageModel } = createFakeLanguageModel(async () => {
      throw new Error("model overloaded");
    });
    const { deps } = createDeps({ languageModel });

    const result = await runQaWorkflow(deps, { sessionId: "session-1", policyId: 1, query: "지원 금액은?" });

    expect(result.answer).toBe(APOLOGY_ANSWER);
    expect(result.evidence).toEqual([]);
    expect(result.error).toBe("synthesize: Failed to generate an answer");
    expect(result.stages).toEqual(["classify", "retrieve", "evaluateSufficiency", "synthesize"]);
  });

  it("sends the system prompt, history and rendered policy prompt to the model", async () => {
    const { deps, generate } = createDeps();
    const history = [
      { role: "user" as const, content: "이전 질문" },
      { role: "assistant" as const, content: "이전 답변" }
    ];

    await runQaWorkflow(deps, { sessionId: "session-1", policyId: 1, query: "지원 금액은?", history });

    const messages = generate.mock.calls[0][0];
    expect(messages.map((message) => message.role)).toEqual(["system", "user", "assistant", "user"]);
    expect(messages[1].content).toBe("이전 질문");
    expect(messages[3].content).toContain("정책명: 청년 창업 사관학교");
    expect(messages[3].content).toContain("[문서 1] (섹션: support, 점수: 0.85)");
    expect(messages[3].content.endsWith("## 사용자 질문\n지원 금액은?")).toBe(true);
  });

  it("renders empty policy metadata when no policy is selected", async () => {
    const { deps, generate, vectorIndex } = createDeps();

    await runQaWorkflow(deps, { sessionId: "session-1", policyId: null, query: "창업 지원 금액" });

    expect(vectorIndex.searches[0].filter).toBeUndefined();
    expect(generate.mock.calls[0][0][1].content).toContain("정책명: (정보 없음)");
  });

  it("notifies interceptors around every stage and survives a failing interceptor", async () => {
    const calls: string[] = [];
    const recorder: StageInterceptor = {
      before: (event) => calls.push(`before:${event.stage}`),
      after: (event) => calls.push(`after:${event.stage}:${event.error === null ? "ok" : "failed"}`)
    };
    const broken: StageInterceptor = {
      before: () => {
        throw new Error("tracer offline");
      },
      after: () => undefined
    };
    const { deps } = createDeps({ interceptors: [broken, recorder], tags: ["feature:Q&A"] });

    const result = await runQaWorkflow(deps, { sessionId: "session-1", policyId: 1, query: "지원 금액은?" });

    expect(result.error).toBeNull();
    expect(calls).toEqual([
      "before:classify",
      "after:classify:ok",
      "before:retrieve",
      "after:retrieve:ok",
      "before:evaluateSufficiency",
      "after:evaluateSufficiency:ok",
      "before:synthesize",
      "after:synthesize:ok"
    ]);
  });
});

describe("buildEvidence", () => {
  it("labels passages by section and truncates long content", () => {
    const evidence = buildEvidence(
      [{ content: "가".repeat(250), score: 0.9, docType: "target", policyId: 1, chunkIndex: 0 }],
      [makeWebResult(1, { score: null, snippet: "짧은 요약" })]
    );

    expect(evidence).toEqual([
      {
        kind: "internal",
        source: "정책 문서 (섹션: target)",
        content: `${"가".repeat(200)}...`,
        score: 0.9
      },
      {
        kind: "web",
        source: "지원 사업 공고 1",
        content: "짧은 요약",
        url: "https://example.org/notice/1",
        fetchedDate: "2024-03-01"
      }
    ]);
  });
});
