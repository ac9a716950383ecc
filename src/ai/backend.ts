import type { Config, Credentials } from "../config.js";
import { BackendError } from "../errors.js";
import { AnthropicClient } from "./anthropic.js";
import { OpenAIClient } from "./openai.js";

export type ModelId = "openai" | "anthropic" | "ollama";

export const MODEL_LABELS: Record<ModelId, string> = {
  openai: "OpenAI",
  anthropic: "Anthropic",
  ollama: "Ollama",
};

/** A single fallible call: prompt in, reply text out. */
export interface ChatBackend {
  send(content: string, model: ModelId): Promise<string>;
}

export interface ChatClient {
  complete(content: string): Promise<string>;
}

/** Dispatches each request to the client configured for its model. */
export class BackendRouter implements ChatBackend {
  constructor(private readonly clients: Partial<Record<ModelId, ChatClient>>) {}

  send(content: string, model: ModelId): Promise<string> {
    const client = this.clients[model];
    if (!client) {
      return Promise.reject(
        new BackendError(`${MODEL_LABELS[model]} is not configured`),
      );
    }
    return client.complete(content);
  }
}

export function createBackend(config: Config, credentials: Credentials): ChatBackend {
  const clients: Partial<Record<ModelId, ChatClient>> = {
    ollama: new OpenAIClient({
      // Ollama ignores the key but the SDK requires one
      apiKey: "ollama",
      baseURL: config.ollamaBaseUrl,
      model: config.models.ollama,
      systemPrompt: config.systemPrompt,
      maxTokens: config.maxTokens,
    }),
  };
  if (credentials.openaiApiKey) {
    clients.openai = new OpenAIClient({
      apiKey: credentials.openaiApiKey,
      model: config.models.openai,
      systemPrompt: config.systemPrompt,
      maxTokens: config.maxTokens,
    });
  }
  if (credentials.anthropicApiKey) {
    clients.anthropic = new AnthropicClient({
      apiKey: credentials.anthropicApiKey,
      model: config.models.anthropic,
      systemPrompt: config.systemPrompt,
      maxTokens: config.maxTokens,
    });
  }
  return new BackendRouter(clients);
}
