import { afterEach, describe, expect, it, vi } from "vitest";
import { getSettings, loadSettings, parseBooleanFlag, resetSettingsCache } from "./config";

describe("loadSettings", () => {
  it("applies defaults for an empty environment", () => {
    const settings = loadSettings({});

    expect(settings).toEqual({
      environment: "development",
      databaseUrl: null,
      openaiApiKey: null,
      openaiChatModel: "gpt-4.1-mini",
      openaiEmbeddingsModel: "text-embedding-3-small",
      openaiTemperature: 0,
      embeddingDimension: 1536,
      tavilyApiKey: null,
      chunkSize: 500,
      chunkOverlap: 50,
      retrievalTopK: 5,
      retrievalScoreThreshold: 0.7,
      searchScoreThreshold: 0.7,
      minResultsForWebSearch: 3,
      webSearchMaxResults: 5,
      chatHistoryLimit: 10,
      tracingEnabled: false
    });
  });

  it("reads numeric and boolean overrides", () => {
    const settings = loadSettings({
      DATABASE_URL: " postgres://localhost/policies ",
      TAVILY_API_KEY: "test-tavily-key",
      RETRIEVAL_TOP_K: "8",
      MIN_RESULTS_FOR_WEB_SEARCH: "0",
      TRACING_ENABLED: "yes"
    });

    expect(settings.databaseUrl).toBe("postgres://localhost/policies");
    expect(settings.tavilyApiKey).toBe("test-tavily-key");
    expect(settings.retrievalTopK).toBe(8);
    expect(settings.minResultsForWebSearch).toBe(0);
    expect(settings.tracingEnabled).toBe(true);
  });

  it("treats blank secrets as missing", () => {
    expect(loadSettings({ OPENAI_API_KEY: "   " }).openaiApiKey).toBeNull();
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => loadSettings({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" })).toThrow(
      "Invalid configuration: CHUNK_OVERLAP: CHUNK_OVERLAP must be less than CHUNK_SIZE"
    );
  });

  it("rejects an unknown boolean flag", () => {
    expect(() => loadSettings({ TRACING_ENABLED: "maybe" })).toThrow("TRACING_ENABLED: Invalid boolean flag: maybe");
  });

  it("rejects a threshold above 1", () => {
    expect(() => loadSettings({ RETRIEVAL_SCORE_THRESHOLD: "1.5" })).toThrow("RETRIEVAL_SCORE_THRESHOLD");
  });
});

describe("parseBooleanFlag", () => {
  it("maps common spellings", () => {
    expect(parseBooleanFlag("TRUE")).toBe(true);
    expect(parseBooleanFlag(" off ")).toBe(false);
    expect(parseBooleanFlag(undefined)).toBeNull();
    expect(parseBooleanFlag("sometimes")).toBeNull();
  });
});

describe("getSettings", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetSettingsCache();
  });

  it("caches settings until the cache is reset", () => {
    vi.stubEnv("RETRIEVAL_TOP_K", "7");
    resetSettingsCache();
    const first = getSettings();

    vi.stubEnv("RETRIEVAL_TOP_K", "9");
    expect(getSettings()).toBe(first);

    resetSettingsCache();
    expect(getSettings().retrievalTopK).toBe(9);
  });
});
