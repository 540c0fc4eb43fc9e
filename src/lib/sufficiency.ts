import type { RetrievedPassage } from "@/lib/retrieval";

export const MIN_SUFFICIENT_PASSAGES = 2;
export const MIN_AVERAGE_SCORE = 0.75;

export type SufficiencyReason = "classifier" | "too_few_passages" | "low_average_score" | "sufficient";

export type SufficiencyDecision = {
  needsWebSearch: boolean;
  skipped: boolean;
  reason: SufficiencyReason;
  averageScore: number | null;
};

export function averageScore(passages: RetrievedPassage[]): number | null {
  if (passages.length === 0) {
    return null;
  }

  return passages.reduce((sum, passage) => sum + passage.score, 0) / passages.length;
}

export function isSufficient(passages: RetrievedPassage[]): boolean {
  if (passages.length < MIN_SUFFICIENT_PASSAGES) {
    return false;
  }

  return (averageScore(passages) ?? 0) >= MIN_AVERAGE_SCORE;
}

/**
 * Decides whether local passages can answer the query. A query the classifier already routed to web
 * search keeps that decision and the passages are not inspected.
 */
export function evaluateSufficiency(params: {
  needsWebSearch: boolean;
  passages: RetrievedPassage[];
}): SufficiencyDecision {
  const mean = averageScore(params.passages);

  if (params.needsWebSearch) {
    return { needsWebSearch: true, skipped: true, reason: "classifier", averageScore: mean };
  }

  if (params.passages.length < MIN_SUFFICIENT_PASSAGES) {
    return { needsWebSearch: true, skipped: false, reason: "too_few_passages", averageScore: mean };
  }

  if (!isSufficient(params.passages)) {
    return { needsWebSearch: true, skipped: false, reason: "low_average_score", averageScore: mean };
  }

  return { needsWebSearch: false, skipped: false, reason: "sufficient", averageScore: mean };
}
