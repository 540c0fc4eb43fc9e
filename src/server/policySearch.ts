import { RetrievalError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/logger";
import type { EmbeddingProvider } from "@/lib/openai";
import type { PolicyFilters, PolicyRecord, PolicyStore } from "@/lib/policyRepository";
import type { VectorHit, VectorIndex } from "@/lib/vectorIndex";
import type { WebResult, WebSearch } from "@/lib/webSearch";

export const WEB_QUERY_SUFFIX = "정부 지원 사업 공고";
export const WEB_SENTINEL_BASE_ID = -1000;
export const DEFAULT_WEB_RESULT_SCORE = 0.5;

export type PolicySearchHit = {
  policy: PolicyRecord;
  score: number | null;
};

export type PolicySearchResult = {
  policies: PolicySearchHit[];
  total: number;
};

export type PolicySearchParams = PolicyFilters & {
  query?: string | null;
  limit: number;
  offset: number;
};

export type PolicySearchDeps = {
  embedder: EmbeddingProvider;
  vectorIndex: VectorIndex;
  policies: Pick<PolicyStore, "search" | "count" | "findByIds">;
  webSearch: WebSearch;
  settings: {
    searchScoreThreshold: number;
    minResultsForWebSearch: number;
  };
  logger?: Logger;
};

export function isWebSentinelId(id: number): boolean {
  return id <= WEB_SENTINEL_BASE_ID;
}

/** Presents a web result as a catalog-shaped record under a negative id that no real row can take. */
export function toWebSentinel(result: WebResult, index: number): PolicySearchHit {
  return {
    policy: {
      id: WEB_SENTINEL_BASE_ID - index,
      programId: -1,
      region: "웹 검색",
      category: "웹 검색 결과",
      programName: result.title || "제목 없음",
      programOverview: result.snippet,
      supportDescription: `출처: ${result.url}`,
      supportBudget: 0,
      supportScale: "웹 검색",
      supervisingMinistry: "웹 검색",
      applyTarget: "웹 검색 결과 - 자세한 내용은 출처 링크를 확인하세요",
      announcementDate: result.fetchedDate,
      bizProcess: "",
      applicationMethod: [`자세한 내용은 다음 링크를 참고하세요: ${result.url}`],
      contactAgency: [result.url],
      contactNumber: [],
      requiredDocuments: [],
      collectedDate: result.fetchedDate,
      createdAt: null
    },
    score: result.score ?? DEFAULT_WEB_RESULT_SCORE
  };
}

/** Keeps the best score per policy id. */
export function dedupByMaxScore(hits: VectorHit[]): Map<number, number> {
  const scores = new Map<number, number>();
  for (const hit of hits) {
    const current = scores.get(hit.payload.policyId);
    if (current === undefined || hit.score > current) {
      scores.set(hit.payload.policyId, hit.score);
    }
  }

  return scores;
}

async function vectorSearch(
  deps: PolicySearchDeps,
  query: string,
  filters: PolicyFilters,
  limit: number
): Promise<VectorHit[]> {
  try {
    const queryVector = await deps.embedder.embed(query);
    return await deps.vectorIndex.search(queryVector, limit * 2, deps.settings.searchScoreThreshold, {
      ...(filters.region ? { region: filters.region } : {}),
      ...(filters.category ? { category: filters.category } : {})
    });
  } catch (error) {
    throw new RetrievalError("Failed to search the policy index", { cause: error });
  }
}

export async function hybridSearch(deps: PolicySearchDeps, params: PolicySearchParams): Promise<PolicySearchResult> {
  const logger = deps.logger ?? createLogger("policySearch");
  const filters: PolicyFilters = { region: params.region, category: params.category };
  const query = params.query?.trim();

  if (!query) {
    const [records, total] = await Promise.all([
      deps.policies.search(filters, params.limit, params.offset),
      deps.policies.count(filters)
    ]);
    logger.info("Policy listing completed", { resultCount: records.length, total });
    return { policies: records.map((policy) => ({ policy, score: null })), total };
  }

  const scores = dedupByMaxScore(await vectorSearch(deps, query, filters, params.limit));
  const records = scores.size > 0 ? await deps.policies.findByIds([...scores.keys()]) : [];

  const ranked: PolicySearchHit[] = records
    .map((policy) => ({ policy, score: scores.get(policy.id) ?? 0 }))
    .sort((left, right) => (right.score === left.score ? left.policy.id - right.policy.id : right.score - left.score));

  const page = ranked.slice(params.offset, params.offset + params.limit);

  if (page.length >= deps.settings.minResultsForWebSearch) {
    logger.info("Policy search completed", { resultCount: page.length });
    return { policies: page, total: page.length };
  }

  const maxWebResults = page.length > 0 ? params.limit - page.length : params.limit;
  if (maxWebResults <= 0) {
    return { policies: page, total: page.length };
  }

  logger.info("Local results insufficient, adding web results", {
    localResults: page.length,
    minRequired: deps.settings.minResultsForWebSearch
  });

  const webResults = await deps.webSearch(`${query} ${WEB_QUERY_SUFFIX}`, maxWebResults);
  const combined = [...page, ...webResults.slice(0, maxWebResults).map(toWebSentinel)];

  logger.info("Policy search completed", { resultCount: combined.length, webResults: combined.length - page.length });
  return { policies: combined, total: combined.length };
}
