import Anthropic from "@anthropic-ai/sdk";

import { BackendError, getErrorMessage } from "../errors.js";
import type { ChatClient } from "./backend.js";

export type AnthropicClientOptions = {
  apiKey: string;
  model: string;
  systemPrompt: string;
  maxTokens: number;
};

export class AnthropicClient implements ChatClient {
  private readonly client: Anthropic;

  constructor(private readonly options: AnthropicClientOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey });
  }

  async complete(content: string): Promise<string> {
    try {
      const res = await this.client.messages.create({
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        system: this.options.systemPrompt,
        messages: [{ role: "user", content }],
      });
      const text = res.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
      return text || "No answer";
    } catch (error) {
      throw new BackendError(getErrorMessage(error), { cause: error });
    }
  }
}
