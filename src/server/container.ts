import { getSettings, type Settings } from "@/lib/config";
import { createPool, createQueryClient } from "@/lib/db";
import { createOpenAIEmbedder, createOpenAILanguageModel, openAIOptionsFromSettings } from "@/lib/openai";
import { PgPolicyRepository, type PolicyStore } from "@/lib/policyRepository";
import { PgSessionRepository, type SessionStore } from "@/lib/sessionRepository";
import { PgVectorIndex, type VectorIndex } from "@/lib/vectorIndex";
import { createDuckDuckGoProvider, createTavilyProvider, createWebSearch } from "@/lib/webSearch";
import { createChatController, type ChatController } from "@/server/chatController";
import type { PolicySearchDeps } from "@/server/policySearch";
import type { QaWorkflowDeps } from "@/server/qaWorkflow";
import { buildFeatureTags, createTracingInterceptor } from "@/server/tracing";

export type Services = {
  settings: Settings;
  policies: PolicyStore;
  sessions: SessionStore;
  vectorIndex: VectorIndex;
  workflow: QaWorkflowDeps;
  policySearch: PolicySearchDeps;
  chat: ChatController;
};

export function createServices(settings: Settings = getSettings()): Services {
  const db = createQueryClient(createPool(settings.databaseUrl));
  const openAIOptions = openAIOptionsFromSettings(settings);
  const embedder = createOpenAIEmbedder(openAIOptions);
  const languageModel = createOpenAILanguageModel(openAIOptions);
  const vectorIndex = new PgVectorIndex(db);
  const policies = new PgPolicyRepository(db);
  const sessions = new PgSessionRepository(db);
  const webSearch = createWebSearch([
    createTavilyProvider({ apiKey: settings.tavilyApiKey }),
    createDuckDuckGoProvider()
  ]);

  const workflow: QaWorkflowDeps = {
    embedder,
    vectorIndex,
    policies,
    languageModel,
    webSearch,
    settings: {
      retrievalTopK: settings.retrievalTopK,
      retrievalScoreThreshold: settings.retrievalScoreThreshold,
      webSearchMaxResults: settings.webSearchMaxResults
    },
    interceptors: [createTracingInterceptor({ enabled: settings.tracingEnabled })],
    tags: buildFeatureTags({ environment: settings.environment, feature: "QA" })
  };

  return {
    settings,
    policies,
    sessions,
    vectorIndex,
    workflow,
    policySearch: {
      embedder,
      vectorIndex,
      policies,
      webSearch,
      settings: {
        searchScoreThreshold: settings.searchScoreThreshold,
        minResultsForWebSearch: settings.minResultsForWebSearch
      }
    },
    chat: createChatController({ sessions, workflow, chatHistoryLimit: settings.chatHistoryLimit })
  };
}

let services: Services | null = null;

/** Builds every collaborator once per process and hands out the same instances afterwards. */
export function getServices(): Services {
  if (!services) {
    services = createServices();
  }

  return services;
}
