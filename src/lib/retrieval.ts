import { RetrievalError } from "@/lib/errors";
import type { EmbeddingProvider } from "@/lib/openai";
import type { DocType, VectorHit, VectorIndex } from "@/lib/vectorIndex";

export const DEFAULT_TOP_K = 5;
export const DEFAULT_SCORE_THRESHOLD = 0.7;

export type RetrievedPassage = {
  content: string;
  score: number;
  docType: DocType;
  policyId: number;
  chunkIndex: number;
};

export type RetrievalDeps = {
  embedder: EmbeddingProvider;
  vectorIndex: VectorIndex;
};

export type RetrievalParams = {
  queryText: string;
  policyId?: number | null;
  topK?: number;
  scoreThreshold?: number;
};

function comparePassages(left: RetrievedPassage, right: RetrievedPassage): number {
  if (left.score === right.score) {
    return left.chunkIndex - right.chunkIndex;
  }

  return right.score - left.score;
}

/**
 * Embeds the query and returns the best matching passages, scoped to one policy when `policyId` is set.
 * The result is sorted by score descending, never holds a passage below `scoreThreshold`, and holds at
 * most `topK` passages.
 */
export async function retrievePassages(params: RetrievalParams, deps: RetrievalDeps): Promise<RetrievedPassage[]> {
  const topK = params.topK ?? DEFAULT_TOP_K;
  const scoreThreshold = params.scoreThreshold ?? DEFAULT_SCORE_THRESHOLD;

  if (topK <= 0) {
    return [];
  }

  let hits: VectorHit[];
  try {
    const queryEmbedding = await deps.embedder.embed(params.queryText);
    hits = await deps.vectorIndex.search(
      queryEmbedding,
      topK,
      scoreThreshold,
      params.policyId === null || params.policyId === undefined ? undefined : { policyId: params.policyId }
    );
  } catch (error) {
    throw new RetrievalError("Failed to retrieve policy passages", { cause: error });
  }

  const passages: RetrievedPassage[] = hits.map((hit) => ({
    content: hit.payload.content,
    score: hit.score,
    docType: hit.payload.docType,
    policyId: hit.payload.policyId,
    chunkIndex: hit.payload.chunkIndex
  }));

  return passages
    .filter((passage) => passage.score >= scoreThreshold)
    .sort(comparePassages)
    .slice(0, topK);
}
