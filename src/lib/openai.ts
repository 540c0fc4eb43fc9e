import { z } from "zod";
import { getSettings, type Settings } from "@/lib/config";
import { ParseError } from "@/lib/errors";

const OPENAI_API_BASE = "https://api.openai.com/v1";

export type ChatRole = "system" | "user" | "assistant";

export type ChatCompletionMessage = {
  role: ChatRole;
  content: string;
};

export interface EmbeddingProvider {
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface LanguageModel {
  generate(messages: ChatCompletionMessage[]): Promise<string>;
}

export type OpenAIOptions = {
  apiKey: string | null;
  chatModel: string;
  embeddingsModel: string;
  temperature: number;
  embeddingDimension: number;
};

const EmbeddingsResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().optional(),
      embedding: z.array(z.number())
    })
  )
});

const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional()
      })
    })
  )
});

export function openAIOptionsFromSettings(settings: Settings = getSettings()): OpenAIOptions {
  return {
    apiKey: settings.openaiApiKey,
    chatModel: settings.openaiChatModel,
    embeddingsModel: settings.openaiEmbeddingsModel,
    temperature: settings.openaiTemperature,
    embeddingDimension: settings.embeddingDimension
  };
}

function getApiKey(options: OpenAIOptions): string {
  if (!options.apiKey) {
    throw new Error("OPENAI_API_KEY is required");
  }

  return options.apiKey;
}

async function requestOpenAI(
  path: string,
  payload: Record<string, unknown>,
  options: OpenAIOptions
): Promise<unknown> {
  const response = await fetch(`${OPENAI_API_BASE}${path}`, {
    method: "POST",
    headers: {
      Authorization: `Bearer ${getApiKey(options)}`,
      "Content-Type": "application/json"
    },
    body: JSON.stringify(payload)
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(`OpenAI request failed (${response.status}): ${errorText}`);
  }

  return response.json();
}

export async function createEmbeddings(
  inputs: string[],
  options: OpenAIOptions = openAIOptionsFromSettings()
): Promise<number[][]> {
  if (inputs.length === 0) {
    return [];
  }

  const parsed = EmbeddingsResponseSchema.safeParse(
    await requestOpenAI("/embeddings", { model: options.embeddingsModel, input: inputs }, options)
  );
  if (!parsed.success) {
    throw new ParseError("Embedding response did not match the expected shape", { cause: parsed.error });
  }

  const ordered = [...parsed.data.data].sort((left, right) => (left.index ?? 0) - (right.index ?? 0));
  const embeddings = ordered.map((entry) => entry.embedding);

  if (
    embeddings.length !== inputs.length ||
    embeddings.some((embedding) => embedding.length !== options.embeddingDimension)
  ) {
    throw new ParseError("Embedding response is missing or has unexpected dimensions");
  }

  return embeddings;
}

export async function createEmbedding(
  input: string,
  options: OpenAIOptions = openAIOptionsFromSettings()
): Promise<number[]> {
  const [embedding] = await createEmbeddings([input], options);
  return embedding;
}

export async function generateChatCompletion(
  messages: ChatCompletionMessage[],
  options: OpenAIOptions = openAIOptionsFromSettings()
): Promise<string> {
  const parsed = ChatCompletionResponseSchema.safeParse(
    await requestOpenAI(
      "/chat/completions",
      {
        model: options.chatModel,
        temperature: options.temperature,
        messages
      },
      options
    )
  );
  if (!parsed.success) {
    throw new ParseError("Chat completion response did not match the expected shape", { cause: parsed.error });
  }

  const content = parsed.data.choices[0]?.message.content;
  if (!content) {
    throw new ParseError("Chat completion response did not include content");
  }

  return content;
}

export function createOpenAIEmbedder(options: OpenAIOptions = openAIOptionsFromSettings()): EmbeddingProvider {
  return {
    dimension: options.embeddingDimension,
    embed: (text) => createEmbedding(text, options),
    embedBatch: (texts) => createEmbeddings(texts, options)
  };
}

export function createOpenAILanguageModel(options: OpenAIOptions = openAIOptionsFromSettings()): LanguageModel {
  return {
    generate: (messages) => generateChatCompletion(messages, options)
  };
}
