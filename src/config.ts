import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

import { ConfigError, getErrorMessage } from "./errors.js";

export const CONFIG_DIR = ".quillpad";

const ConfigSchema = z.object({
  tabWidth: z.number().int().min(1).max(16).default(4),
  frameIntervalMs: z.number().int().min(1).max(1000).default(16),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  logFile: z.string().min(1).default(`${CONFIG_DIR}/quillpad.log`),
  defaultDocument: z.string().min(1).default(`${CONFIG_DIR}/history.md`),
  systemPrompt: z
    .string()
    .default("You are a helpful assistant for writing and programming."),
  models: z
    .object({
      openai: z.string().min(1).default("gpt-4o-mini"),
      anthropic: z.string().min(1).default("claude-3-5-haiku-latest"),
      ollama: z.string().min(1).default("llama3.1"),
    })
    .default({}),
  ollamaBaseUrl: z.string().url().default("http://localhost:11434/v1"),
  maxTokens: z.number().int().positive().default(1024),
  captureStyles: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export type Credentials = {
  openaiApiKey: string | null;
  anthropicApiKey: string | null;
};

export type LoadedConfig = {
  config: Config;
  credentials: Credentials;
  /** Directory relative paths in the config resolve against. */
  root: string;
};

export function parseConfig(raw: unknown, source: string): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration in ${source}: ${issues}`);
  }
  return result.data;
}

export function loadConfig(
  root: string,
  env: NodeJS.ProcessEnv = process.env,
): LoadedConfig {
  const file = path.join(root, CONFIG_DIR, "config.json");
  let raw: unknown = {};
  if (fs.existsSync(file)) {
    try {
      raw = JSON.parse(fs.readFileSync(file, "utf8"));
    } catch (error) {
      throw new ConfigError(`Could not read ${file}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  const config = parseConfig(raw, file);
  const level = env.QUILLPAD_LOG_LEVEL;
  if (level) {
    const parsed = ConfigSchema.shape.logLevel.safeParse(level);
    if (!parsed.success) {
      throw new ConfigError(`Invalid QUILLPAD_LOG_LEVEL: ${level}`);
    }
    config.logLevel = parsed.data;
  }

  return {
    config,
    credentials: {
      openaiApiKey: env.OPENAI_API_KEY || null,
      anthropicApiKey: env.ANTHROPIC_API_KEY || null,
    },
    root,
  };
}
