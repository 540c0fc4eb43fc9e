import { z } from "zod";
import { chunkDocument, type ChunkOptions } from "@/lib/chunker";
import { createLogger, type Logger } from "@/lib/logger";
import type { EmbeddingProvider } from "@/lib/openai";
import type { NewPolicy, PolicyDocumentRecord, PolicyRecord, PolicyStore } from "@/lib/policyRepository";
import { normalizePolicyText, toStringList, toStringOrNull } from "@/lib/textNormalization";
import type { DocType, VectorIndex, VectorPayload } from "@/lib/vectorIndex";

export const EMBEDDING_BATCH_SIZE = 32;

const nullableText = z.unknown().transform((value) => {
  const text = toStringOrNull(value);
  return text === null ? null : toStringOrNull(normalizePolicyText(text));
});
const textList = z.unknown().transform(toStringList);

export const PolicyInputSchema = z.object({
  program_id: z.coerce.number().int(),
  program_name: z.string().transform(normalizePolicyText).pipe(z.string().min(1)),
  region: nullableText,
  category: nullableText,
  program_overview: nullableText,
  support_description: nullableText,
  support_budget: z.coerce.number().nullish().catch(null),
  support_scale: nullableText,
  supervising_ministry: nullableText,
  apply_target: nullableText,
  announcement_date: nullableText,
  biz_process: nullableText,
  application_method: textList,
  contact_agency: textList,
  contact_number: textList,
  required_documents: textList,
  collected_date: z
    .unknown()
    .transform((value) => {
      const text = toStringOrNull(value);
      return text && /^\d{4}-\d{2}-\d{2}$/.test(text) ? text : null;
    })
});

export type PolicyInput = z.infer<typeof PolicyInputSchema>;

export type IngestionDeps = {
  policies: Pick<PolicyStore, "findByProgramId" | "insertPolicy" | "insertDocument" | "listDocuments">;
  embedder: EmbeddingProvider;
  vectorIndex: VectorIndex;
  chunkOptions?: ChunkOptions;
  batchSize?: number;
  logger?: Logger;
};

export type IngestionSummary = {
  inserted: number;
  skipped: number;
  invalid: number;
  documents: number;
  chunks: number;
};

type PendingChunk = {
  id: string;
  content: string;
  payload: VectorPayload;
};

export function toNewPolicy(input: PolicyInput): NewPolicy {
  return {
    programId: input.program_id,
    programName: input.program_name,
    region: input.region,
    category: input.category,
    programOverview: input.program_overview,
    supportDescription: input.support_description,
    supportBudget: input.support_budget ?? null,
    supportScale: input.support_scale,
    supervisingMinistry: input.supervising_ministry,
    applyTarget: input.apply_target,
    announcementDate: input.announcement_date,
    bizProcess: input.biz_process,
    applicationMethod: input.application_method,
    contactAgency: input.contact_agency,
    contactNumber: input.contact_number,
    requiredDocuments: input.required_documents,
    collectedDate: input.collected_date
  };
}

/** Section texts stored per policy; empty sections are left out. */
export function buildSectionDocuments(policy: PolicyRecord): Array<{ docType: DocType; content: string }> {
  const contact = [...policy.contactAgency, ...policy.applicationMethod].join(" ").trim();
  const sections: Array<{ docType: DocType; content: string | null }> = [
    { docType: "overview", content: policy.programOverview },
    { docType: "target", content: policy.applyTarget },
    { docType: "support", content: policy.supportDescription },
    { docType: "process", content: policy.bizProcess },
    { docType: "contact", content: contact }
  ];

  return sections.flatMap((section) =>
    section.content && section.content.trim() ? [{ docType: section.docType, content: section.content.trim() }] : []
  );
}

async function embedAndUpsert(deps: IngestionDeps, chunks: PendingChunk[], batchSize: number, logger: Logger) {
  const batchCount = Math.ceil(chunks.length / batchSize);

  for (let start = 0; start < chunks.length; start += batchSize) {
    const batch = chunks.slice(start, start + batchSize);
    const vectors = await deps.embedder.embedBatch(batch.map((chunk) => chunk.content));
    if (vectors.length !== batch.length) {
      throw new Error(`Embedding batch returned ${vectors.length} vectors for ${batch.length} chunks`);
    }

    for (const [index, chunk] of batch.entries()) {
      await deps.vectorIndex.upsert(chunk.id, vectors[index], chunk.payload);
    }

    logger.info("Uploaded embedding batch", { batch: start / batchSize + 1, of: batchCount });
  }
}

function queueDocumentChunks(
  pending: PendingChunk[],
  policy: PolicyRecord,
  document: PolicyDocumentRecord,
  options: ChunkOptions | undefined
) {
  const metadata = { region: policy.region, category: policy.category, programId: policy.programId };

  for (const chunk of chunkDocument(document.content, metadata, options)) {
    pending.push({
      id: `${document.id}:${chunk.chunkIndex}`,
      content: chunk.content,
      payload: {
        policyId: policy.id,
        docType: document.docType,
        content: chunk.content,
        chunkIndex: chunk.chunkIndex,
        documentId: document.id,
        region: chunk.metadata.region,
        category: chunk.metadata.category
      }
    });
  }
}

/**
 * Loads raw policy records: validates them, stores new policies with their section documents, then
 * chunks, embeds and indexes the documents of every policy in the batch. Policies whose program id is
 * already stored are not inserted again, but their stored documents are re-indexed, so a run that
 * failed while embedding is repaired by running it again. Vector ids are stable, so re-indexing
 * overwrites points in place.
 */
export async function ingestPolicies(records: unknown[], deps: IngestionDeps): Promise<IngestionSummary> {
  const logger = deps.logger ?? createLogger("ingestion");
  const batchSize = deps.batchSize ?? EMBEDDING_BATCH_SIZE;
  const summary: IngestionSummary = { inserted: 0, skipped: 0, invalid: 0, documents: 0, chunks: 0 };
  const pending: PendingChunk[] = [];

  for (const [index, raw] of records.entries()) {
    const parsed = PolicyInputSchema.safeParse(raw);
    if (!parsed.success) {
      summary.invalid += 1;
      logger.warn("Skipping invalid policy record", {
        index,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      });
      continue;
    }

    const existing = await deps.policies.findByProgramId(parsed.data.program_id);
    if (existing) {
      summary.skipped += 1;
      const stored = await deps.policies.listDocuments(existing.id);
      logger.info("Policy already exists, re-indexing stored documents", {
        programId: parsed.data.program_id,
        documents: stored.length
      });

      for (const document of stored) {
        queueDocumentChunks(pending, existing, document, deps.chunkOptions);
      }
      continue;
    }

    const policy = await deps.policies.insertPolicy(toNewPolicy(parsed.data));
    summary.inserted += 1;

    for (const section of buildSectionDocuments(policy)) {
      const document = await deps.policies.insertDocument({
        policyId: policy.id,
        docType: section.docType,
        content: section.content,
        metadata: { region: policy.region, category: policy.category, programId: policy.programId }
      });
      summary.documents += 1;
      queueDocumentChunks(pending, policy, document, deps.chunkOptions);
    }
  }

  await embedAndUpsert(deps, pending, batchSize, logger);
  summary.chunks = pending.length;

  logger.info("Ingestion completed", summary);
  return summary;
}

/** Accepts either a top-level array or `{ "policies": [...] }`. */
export function parsePolicyFile(text: string): unknown[] {
  const parsed: unknown = JSON.parse(text);
  if (Array.isArray(parsed)) {
    return parsed;
  }

  const wrapped = z.object({ policies: z.array(z.unknown()) }).safeParse(parsed);
  if (!wrapped.success) {
    throw new Error("Policy file must contain an array of policies");
  }

  return wrapped.data.policies;
}
