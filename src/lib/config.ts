import { z } from "zod";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

export function parseBooleanFlag(value: string | undefined): boolean | null {
  if (!value) {
    return null;
  }

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }

  if (FALSE_VALUES.has(normalized)) {
    return false;
  }

  return null;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, context) => {
      const parsed = parseBooleanFlag(value);
      if (parsed === null && value && value.trim()) {
        context.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid boolean flag: ${value}` });
        return z.NEVER;
      }

      return parsed ?? fallback;
    });

const SettingsSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    DATABASE_URL: optionalString,
    OPENAI_API_KEY: optionalString,
    OPENAI_CHAT_MODEL: z.string().min(1).default("gpt-4.1-mini"),
    OPENAI_EMBEDDINGS_MODEL: z.string().min(1).default("text-embedding-3-small"),
    OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
    EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(1536),
    TAVILY_API_KEY: optionalString,
    CHUNK_SIZE: z.coerce.number().int().positive().default(500),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(50),
    RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(5),
    RETRIEVAL_SCORE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
    SEARCH_SCORE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
    MIN_RESULTS_FOR_WEB_SEARCH: z.coerce.number().int().min(0).default(3),
    WEB_SEARCH_MAX_RESULTS: z.coerce.number().int().positive().default(5),
    CHAT_HISTORY_LIMIT: z.coerce.number().int().min(0).default(10),
    TRACING_ENABLED: booleanFlag(false)
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be less than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"]
  });

export type Settings = {
  environment: "development" | "test" | "production";
  databaseUrl: string | null;
  openaiApiKey: string | null;
  openaiChatModel: string;
  openaiEmbeddingsModel: string;
  openaiTemperature: number;
  embeddingDimension: number;
  tavilyApiKey: string | null;
  chunkSize: number;
  chunkOverlap: number;
  retrievalTopK: number;
  retrievalScoreThreshold: number;
  searchScoreThreshold: number;
  minResultsForWebSearch: number;
  webSearchMaxResults: number;
  chatHistoryLimit: number;
  tracingEnabled: boolean;
};

export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const result = SettingsSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  const parsed = result.data;
  return {
    environment: parsed.NODE_ENV,
    databaseUrl: parsed.DATABASE_URL,
    openaiApiKey: parsed.OPENAI_API_KEY,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    openaiEmbeddingsModel: parsed.OPENAI_EMBEDDINGS_MODEL,
    openaiTemperature: parsed.OPENAI_TEMPERATURE,
    embeddingDimension: parsed.EMBEDDING_DIMENSION,
    tavilyApiKey: parsed.TAVILY_API_KEY,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    retrievalTopK: parsed.RETRIEVAL_TOP_K,
    retrievalScoreThreshold: parsed.RETRIEVAL_SCORE_THRESHOLD,
    searchScoreThreshold: parsed.SEARCH_SCORE_THRESHOLD,
    minResultsForWebSearch: parsed.MIN_RESULTS_FOR_WEB_SEARCH,
    webSearchMaxResults: parsed.WEB_SEARCH_MAX_RESULTS,
    chatHistoryLimit: parsed.CHAT_HISTORY_LIMIT,
    tracingEnabled: parsed.TRACING_ENABLED
  };
}

let cachedSettings: Settings | null = null;

export function getSettings(): Settings {
  if (!cachedSettings) {
    cachedSettings = loadSettings();
  }

  return cachedSettings;
}

export function resetSettingsCache() {
  cachedSettings = null;
}
