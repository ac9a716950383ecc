import OpenAI from "openai";

import { BackendError, getErrorMessage } from "../errors.js";
import type { ChatClient } from "./backend.js";

export type OpenAIClientOptions = {
  apiKey: string;
  /** Set for OpenAI-compatible servers such as Ollama. */
  baseURL?: string;
  model: string;
  systemPrompt: string;
  maxTokens: number;
};

export class OpenAIClient implements ChatClient {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIClientOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
  }

  async complete(content: string): Promise<string> {
    try {
      const res = await this.client.chat.completions.create({
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        messages: [
          { role: "system", content: this.options.systemPrompt },
          { role: "user", content },
        ],
      });
      return res.choices[0]?.message?.content ?? "No answer";
    } catch (error) {
      throw new BackendError(getErrorMessage(error), { cause: error });
    }
  }
}
