import { describe, expect, it } from "vitest";

import { parseConfig } from "../config.js";
import { BackendError } from "../errors.js";
import { BackendRouter, createBackend, type ChatClient } from "./backend.js";

describe("BackendRouter", () => {
  it("sends to the client for the chosen model", async () => {
    const echo: ChatClient = { complete: (content) => Promise.resolve(`echo ${content}`) };
    const router = new BackendRouter({ ollama: echo });
    await expect(router.send("hi", "ollama")).resolves.toBe("echo hi");
  });

  it("rejects models without a client", async () => {
    const router = new BackendRouter({});
    await expect(router.send("hi", "anthropic")).rejects.toThrow(
      new BackendError("Anthropic is not configured"),
    );
  });

  it("configures only the hosted models that have keys", async () => {
    const backend = createBackend(parseConfig({}, "test"), {
      openaiApiKey: null,
      anthropicApiKey: null,
    });
    await expect(backend.send("hi", "openai")).rejects.toThrow("OpenAI is not configured");
  });
});
