import { z } from "zod";
import { ParseError, WebSearchError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/logger";

const TAVILY_SEARCH_URL = "https://api.tavily.com/search";
const DUCKDUCKGO_URL = "https://api.duckduckgo.com/";

export type WebProviderName = "tavily" | "duckduckgo";

export type WebResult = {
  url: string;
  title: string;
  snippet: string;
  score: number | null;
  fetchedDate: string;
  provider: WebProviderName;
};

export interface WebSearchProvider {
  readonly name: WebProviderName;
  isAvailable(): boolean;
  search(query: string, maxResults: number): Promise<WebResult[]>;
}

export type WebSearch = (query: string, maxResults: number) => Promise<WebResult[]>;

export function todayIsoDate(now = new Date()): string {
  return now.toISOString().slice(0, 10);
}

const TavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        url: z.string().default(""),
        title: z.string().default(""),
        content: z.string().default(""),
        score: z.number().nullish()
      })
    )
    .default([])
});

type DuckDuckGoTopic = {
  FirstURL?: string;
  Text?: string;
  Topics?: DuckDuckGoTopic[];
};

const DuckDuckGoTopicSchema: z.ZodType<DuckDuckGoTopic> = z.lazy(() =>
  z.object({
    FirstURL: z.string().optional(),
    Text: z.string().optional(),
    Topics: z.array(DuckDuckGoTopicSchema).optional()
  })
);

const DuckDuckGoResponseSchema = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
  Results: z.array(DuckDuckGoTopicSchema).default([]),
  RelatedTopics: z.array(DuckDuckGoTopicSchema).default([])
});

async function readJson(provider: WebProviderName, response: Response): Promise<unknown> {
  if (!response.ok) {
    const errorText = await response.text();
    throw new WebSearchError(provider, `${provider} search failed (${response.status}): ${errorText}`);
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ParseError(`${provider} search returned invalid JSON`, { cause: error });
  }
}

export function createTavilyProvider(options: { apiKey: string | null; searchDepth?: "basic" | "advanced" }): WebSearchProvider {
  return {
    name: "tavily",
    isAvailable: () => Boolean(options.apiKey),
    async search(query, maxResults) {
      const response = await fetch(TAVILY_SEARCH_URL, {
        method: "POST",
        headers: {
          "Content-Type": "application/json"
        },
        body: JSON.stringify({
          api_key: options.apiKey,
          query,
          max_results: maxResults,
          search_depth: options.searchDepth ?? "advanced",
          include_answer: false,
          include_raw_content: false
        })
      });

      const parsed = TavilyResponseSchema.safeParse(await readJson("tavily", response));
      if (!parsed.success) {
        throw new ParseError("tavily search response did not match the expected shape", { cause: parsed.error });
      }

      const fetchedDate = todayIsoDate();
      return parsed.data.results.slice(0, maxResults).map((result) => ({
        url: result.url,
        title: result.title,
        snippet: result.content,
        score: result.score ?? null,
        fetchedDate,
        provider: "tavily" as const
      }));
    }
  };
}

function flattenTopics(topics: DuckDuckGoTopic[]): DuckDuckGoTopic[] {
  return topics.flatMap((topic) => (topic.Topics ? flattenTopics(topic.Topics) : [topic]));
}

export function createDuckDuckGoProvider(): WebSearchProvider {
  return {
    name: "duckduckgo",
    isAvailable: () => true,
    async search(query, maxResults) {
      const url = new URL(DUCKDUCKGO_URL);
      url.searchParams.set("q", query);
      url.searchParams.set("format", "json");
      url.searchParams.set("no_html", "1");
      url.searchParams.set("skip_disambig", "1");

      const response = await fetch(url, { method: "GET" });
      const parsed = DuckDuckGoResponseSchema.safeParse(await readJson("duckduckgo", response));
      if (!parsed.success) {
        throw new ParseError("duckduckgo search response did not match the expected shape", {
          cause: parsed.error
        });
      }

      const fetchedDate = todayIsoDate();
      const results: WebResult[] = [];

      if (parsed.data.AbstractURL && parsed.data.AbstractText) {
        results.push({
          url: parsed.data.AbstractURL,
          title: parsed.data.Heading || parsed.data.AbstractURL,
          snippet: parsed.data.AbstractText,
          score: null,
          fetchedDate,
          provider: "duckduckgo"
        });
      }

      for (const topic of flattenTopics([...parsed.data.Results, ...parsed.data.RelatedTopics])) {
        if (!topic.FirstURL || !topic.Text) {
          continue;
        }

        results.push({
          url: topic.FirstURL,
          title: topic.Text.split(" - ")[0].trim(),
          snippet: topic.Text,
          score: null,
          fetchedDate,
          provider: "duckduckgo"
        });
      }

      return results.slice(0, maxResults);
    }
  };
}

/**
 * Tries each available provider in order and returns the first successful result list. Provider
 * failures are logged and skipped; when nothing succeeds the result is empty.
 */
export function createWebSearch(
  providers: WebSearchProvider[],
  logger: Logger = createLogger("webSearch")
): WebSearch {
  return async (query, maxResults) => {
    if (!query.trim() || maxResults <= 0) {
      return [];
    }

    for (const provider of providers) {
      if (!provider.isAvailable()) {
        continue;
      }

      try {
        const results = await provider.search(query, maxResults);
        logger.info("Web search completed", { provider: provider.name, resultCount: results.length });
        return results;
      } catch (error) {
        logger.warn("Web search provider failed, trying next provider", { provider: provider.name, error });
      }
    }

    logger.warn("No web search provider returned results");
    return [];
  };
}
