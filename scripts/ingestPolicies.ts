import { readFileSync } from "node:fs";
import path from "node:path";
import { getSettings } from "@/lib/config";
import { createPool, createQueryClient } from "@/lib/db";
import { createLogger } from "@/lib/logger";
import { createOpenAIEmbedder, openAIOptionsFromSettings } from "@/lib/openai";
import { PgPolicyRepository } from "@/lib/policyRepository";
import { PgVectorIndex } from "@/lib/vectorIndex";
import { ingestPolicies, parsePolicyFile } from "@/server/ingestion";

const SCHEMA_PATH = path.join(process.cwd(), "db", "schema.sql");
const DEFAULT_DATA_PATH = path.join(process.cwd(), "data", "policies.json");

const logger = createLogger("ingest");

async function run() {
  const dataPath = path.resolve(process.cwd(), process.argv[2] ?? DEFAULT_DATA_PATH);
  const settings = getSettings();
  const pool = createPool(settings.databaseUrl);

  try {
    logger.info("Applying schema", { path: SCHEMA_PATH });
    await pool.query(readFileSync(SCHEMA_PATH, "utf8"));

    logger.info("Loading policies", { path: dataPath });
    const records = parsePolicyFile(readFileSync(dataPath, "utf8"));

    const db = createQueryClient(pool);
    const summary = await ingestPolicies(records, {
      policies: new PgPolicyRepository(db),
      embedder: createOpenAIEmbedder(openAIOptionsFromSettings(settings)),
      vectorIndex: new PgVectorIndex(db),
      chunkOptions: { maxChars: settings.chunkSize, overlapChars: settings.chunkOverlap }
    });

    console.log(
      [
        `Policies inserted: ${summary.inserted}`,
        `Policies skipped: ${summary.skipped}`,
        `Invalid records: ${summary.invalid}`,
        `Documents: ${summary.documents}`,
        `Chunks indexed: ${summary.chunks}`
      ].join("\n")
    );
  } finally {
    await pool.end();
  }
}

run().catch((error: unknown) => {
  logger.error("Policy ingestion failed", { error });
  process.exitCode = 1;
});
