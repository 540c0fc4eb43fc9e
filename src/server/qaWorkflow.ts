import { toErrorMessage, SynthesisError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/logger";
import type { ChatCompletionMessage, EmbeddingProvider, LanguageModel } from "@/lib/openai";
import type { PolicyRecord } from "@/lib/policyRepository";
import { requiresWebSearch } from "@/lib/queryClassifier";
import { retrievePassages, type RetrievedPassage } from "@/lib/retrieval";
import { evaluateSufficiency } from "@/lib/sufficiency";
import { truncateWithEllipsis } from "@/lib/textNormalization";
import type { VectorIndex } from "@/lib/vectorIndex";
import type { WebResult, WebSearch } from "@/lib/webSearch";
import {
  EMPTY_POLICY_CONTEXT,
  POLICY_QA_SYSTEM_PROMPT,
  renderPolicyQaPrompt,
  type PolicyContext
} from "@/server/prompts";
import type { StageInterceptor } from "@/server/tracing";

export const APOLOGY_ANSWER = "죄송합니다. 답변을 생성하는 중 오류가 발생했습니다. 잠시 후 다시 시도해 주세요.";
export const EVIDENCE_CONTENT_MAX_CHARS = 200;

export type EvidenceItem = {
  kind: "internal" | "web";
  source: string;
  content: string;
  url?: string;
  score?: number;
  fetchedDate?: string;
};

export type HistoryMessage = ChatCompletionMessage;

/**
 * Mutable record threaded through one workflow run. Each field has its own setter so a stage can only
 * touch what it produces.
 */
export class WorkflowState {
  private retrievedPassagesValue: RetrievedPassage[] = [];
  private webResultsValue: WebResult[] = [];
  private needsWebSearchValue = false;
  private answerValue = "";
  private evidenceValue: EvidenceItem[] = [];
  private errorValue: string | null = null;

  constructor(
    readonly sessionId: string,
    readonly policyId: number | null,
    readonly query: string,
    readonly history: HistoryMessage[]
  ) {}

  get retrievedPassages(): readonly RetrievedPassage[] {
    return this.retrievedPassagesValue;
  }

  get webResults(): readonly WebResult[] {
    return this.webResultsValue;
  }

  get needsWebSearch(): boolean {
    return this.needsWebSearchValue;
  }

  get answer(): string {
    return this.answerValue;
  }

  get evidence(): readonly EvidenceItem[] {
    return this.evidenceValue;
  }

  get error(): string | null {
    return this.errorValue;
  }

  setRetrievedPassages(passages: RetrievedPassage[]) {
    this.retrievedPassagesValue = [...passages];
  }

  setWebResults(results: WebResult[]) {
    this.webResultsValue = [...results];
  }

  setNeedsWebSearch(value: boolean) {
    this.needsWebSearchValue = value;
  }

  setAnswer(answer: string, evidence: EvidenceItem[]) {
    this.answerValue = answer;
    this.evidenceValue = [...evidence];
  }

  recordError(stage: StageName, error: unknown) {
    this.errorValue = `${stage}: ${toErrorMessage(error, "Unknown error")}`;
  }
}

export type StageName = "classify" | "retrieve" | "evaluateSufficiency" | "webSearch" | "synthesize";

export type WorkflowStep = StageName | "done";

export type QaWorkflowSettings = {
  retrievalTopK: number;
  retrievalScoreThreshold: number;
  webSearchMaxResults: number;
};

export type QaWorkflowDeps = {
  embedder: EmbeddingProvider;
  vectorIndex: VectorIndex;
  policies: { getById(id: number): Promise<PolicyRecord | null> };
  languageModel: LanguageModel;
  webSearch: WebSearch;
  settings: QaWorkflowSettings;
  interceptors?: StageInterceptor[];
  tags?: string[];
  logger?: Logger;
};

type WorkflowStage = {
  run(state: WorkflowState, deps: QaWorkflowDeps, logger: Logger): Promise<void>;
  recover(state: WorkflowState): void;
};

export function buildEvidence(passages: readonly RetrievedPassage[], webResults: readonly WebResult[]): EvidenceItem[] {
  const internal: EvidenceItem[] = passages.map((passage) => ({
    kind: "internal",
    source: `정책 문서 (섹션: ${passage.docType})`,
    content: truncateWithEllipsis(passage.content, EVIDENCE_CONTENT_MAX_CHARS),
    score: passage.score
  }));

  const web: EvidenceItem[] = webResults.map((result) => ({
    kind: "web",
    source: result.title,
    content: truncateWithEllipsis(result.snippet, EVIDENCE_CONTENT_MAX_CHARS),
    url: result.url,
    ...(result.score === null ? {} : { score: result.score }),
    fetchedDate: result.fetchedDate
  }));

  return [...internal, ...web];
}

function toPolicyContext(policy: PolicyRecord | null): PolicyContext {
  if (!policy) {
    return EMPTY_POLICY_CONTEXT;
  }

  return {
    policyName: policy.programName,
    policyOverview: policy.programOverview ?? "",
    applyTarget: policy.applyTarget ?? "",
    supportDescription: policy.supportDescription ?? ""
  };
}

export const STAGES: Record<StageName, WorkflowStage> = {
  classify: {
    async run(state, _deps, logger) {
      const needsWebSearch = requiresWebSearch(state.query);
      state.setNeedsWebSearch(needsWebSearch);
      logger.info("Query classified", { needsWebSearch });
    },
    recover(state) {
      state.setNeedsWebSearch(false);
    }
  },
  retrieve: {
    async run(state, deps, logger) {
      const passages = await retrievePassages(
        {
          queryText: state.query,
          policyId: state.policyId,
          topK: deps.settings.retrievalTopK,
          scoreThreshold: deps.settings.retrievalScoreThreshold
        },
        deps
      );
      state.setRetrievedPassages(passages);
      logger.info("Passages retrieved", { count: passages.length });
    },
    recover(state) {
      state.setRetrievedPassages([]);
    }
  },
  evaluateSufficiency: {
    async run(state, _deps, logger) {
      const decision = evaluateSufficiency({
        needsWebSearch: state.needsWebSearch,
        passages: [...state.retrievedPassages]
      });
      state.setNeedsWebSearch(decision.needsWebSearch);
      logger.info("Sufficiency evaluated", decision);
    },
    recover(state) {
      state.setNeedsWebSearch(false);
    }
  },
  webSearch: {
    async run(state, deps, logger) {
      const results = await deps.webSearch(state.query, deps.settings.webSearchMaxResults);
      state.setWebResults(results);
      logger.info("Web search finished", { count: results.length });
    },
    recover(state) {
      state.setWebResults([]);
    }
  },
  synthesize: {
    async run(state, deps, logger) {
      const policy = state.policyId === null ? null : await deps.policies.getById(state.policyId);
      const prompt = renderPolicyQaPrompt({
        policy: toPolicyContext(policy),
        passages: [...state.retrievedPassages],
        webResults: [...state.webResults],
        question: state.query
      });

      let answer: string;
      try {
        answer = await deps.languageModel.generate([
          { role: "system", content: POLICY_QA_SYSTEM_PROMPT },
          ...state.history,
          { role: "user", content: prompt }
        ]);
      } catch (error) {
        throw new SynthesisError("Failed to generate an answer", { cause: error });
      }

      const evidence = buildEvidence(state.retrievedPassages, state.webResults);
      state.setAnswer(answer, evidence);
      logger.info("Answer generated", { answerLength: answer.length, evidenceCount: evidence.length });
    },
    recover(state) {
      state.setAnswer(APOLOGY_ANSWER, []);
    }
  }
};

/** The only conditional edge leaves `evaluateSufficiency`; everything else is a straight line. */
export const TRANSITIONS: Record<StageName, (state: WorkflowState) => WorkflowStep> = {
  classify: () => "retrieve",
  retrieve: () => "evaluateSufficiency",
  evaluateSufficiency: (state) => (state.needsWebSearch ? "webSearch" : "synthesize"),
  webSearch: () => "synthesize",
  synthesize: () => "done"
};

export type QaWorkflowInput = {
  sessionId: string;
  policyId: number | null;
  query: string;
  history?: HistoryMessage[];
};

export type QaWorkflowResult = {
  sessionId: string;
  policyId: number | null;
  answer: string;
  evidence: EvidenceItem[];
  retrievedPassages: RetrievedPassage[];
  webResults: WebResult[];
  needsWebSearch: boolean;
  stages: StageName[];
  error: string | null;
};

function notifyInterceptors(
  logger: Logger,
  interceptors: StageInterceptor[],
  notify: (interceptor: StageInterceptor) => void
) {
  for (const interceptor of interceptors) {
    try {
      notify(interceptor);
    } catch (error) {
      logger.warn("Stage interceptor failed", { error });
    }
  }
}

/**
 * Runs one pass of classify, retrieve, evaluate, optional web search and synthesize. A failing stage
 * writes its degraded default and the run continues, so this never rejects.
 */
export async function runQaWorkflow(deps: QaWorkflowDeps, input: QaWorkflowInput): Promise<QaWorkflowResult> {
  const logger = deps.logger ?? createLogger("qaWorkflow");
  const interceptors = deps.interceptors ?? [];
  const tags = [...(deps.tags ?? []), ...(input.policyId === null ? [] : [`policy:${input.policyId}`])];
  const state = new WorkflowState(input.sessionId, input.policyId, input.query, input.history ?? []);
  const visited: StageName[] = [];

  let step: WorkflowStep = "classify";
  while (step !== "done") {
    const stage: StageName = step;
    const event = { stage, sessionId: state.sessionId, query: state.query, tags };
    const startedAt = Date.now();
    let failure: unknown = null;

    notifyInterceptors(logger, interceptors, (interceptor) => interceptor.before(event));

    try {
      await STAGES[stage].run(state, deps, logger);
    } catch (error) {
      failure = error;
      logger.error(`Stage ${stage} failed`, { sessionId: state.sessionId, error });
      STAGES[stage].recover(state);
      state.recordError(stage, error);
    }

    const durationMs = Date.now() - startedAt;
    notifyInterceptors(logger, interceptors, (interceptor) =>
      interceptor.after({ ...event, durationMs, error: failure })
    );

    visited.push(stage);
    step = TRANSITIONS[stage](state);
  }

  return {
    sessionId: state.sessionId,
    policyId: state.policyId,
    answer: state.answer,
    evidence: [...state.evidence],
    retrievedPassages: [...state.retrievedPassages],
    webResults: [...state.webResults],
    needsWebSearch: state.needsWebSearch,
    stages: visited,
    error: state.error
  };
}
