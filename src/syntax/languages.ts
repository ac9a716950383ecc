import fs from "node:fs";
import path from "node:path";
import { createRequire } from "node:module";
import { fileURLToPath } from "node:url";
import type Parser from "tree-sitter";

import { getErrorMessage } from "../errors.js";
import { logger } from "../logger.js";

// Native Node-API modules are required lazily so a grammar that fails to
// load only disables highlighting for its language.
const require = createRequire(import.meta.url);

export const QUERIES_DIR = fileURLToPath(new URL("../../queries/", import.meta.url));

export type LanguageSpec = {
  id: string;
  /** Fence tags that select this language. */
  aliases: string[];
  extensions: string[];
  grammarModule: string;
  queryFile: string;
};

export const LANGUAGES: LanguageSpec[] = [
  {
    id: "javascript",
    aliases: ["javascript", "js", "jsx", "mjs", "cjs", "node"],
    extensions: [".js", ".mjs", ".cjs", ".jsx"],
    grammarModule: "tree-sitter-javascript",
    queryFile: "javascript.scm",
  },
  {
    id: "rust",
    aliases: ["rust", "rs"],
    extensions: [".rs"],
    grammarModule: "tree-sitter-rust",
    queryFile: "rust.scm",
  },
];

export type TreeSitterModule = typeof Parser;

export type LoadedLanguage = {
  id: string;
  parser: Pick<Parser, "parse">;
  query: Pick<Parser.Query, "captures">;
};

let treeSitter: TreeSitterModule | null | undefined;

export function loadTreeSitter(): TreeSitterModule | null {
  if (treeSitter !== undefined) return treeSitter;
  try {
    const mod: TreeSitterModule = require("tree-sitter");
    treeSitter = mod;
  } catch (error) {
    logger.warn("tree-sitter unavailable, highlighting disabled", {
      error: getErrorMessage(error),
    });
    treeSitter = null;
  }
  return treeSitter;
}

export class LanguageRegistry {
  private readonly loaded = new Map<string, LoadedLanguage | null>();

  constructor(
    private readonly specs: LanguageSpec[] = LANGUAGES,
    private readonly queriesDir = QUERIES_DIR,
  ) {}

  forPath(filePath: string | null): LanguageSpec | null {
    if (!filePath) return null;
    const ext = path.extname(filePath).toLowerCase();
    return this.specs.find((s) => s.extensions.includes(ext)) ?? null;
  }

  forFenceTag(tag: string): LanguageSpec | null {
    const name = tag.toLowerCase();
    return this.specs.find((s) => s.aliases.includes(name)) ?? null;
  }

  /** Parser + compiled query for a language; null (cached) when loading failed. */
  load(spec: LanguageSpec): LoadedLanguage | null {
    const cached = this.loaded.get(spec.id);
    if (cached !== undefined) return cached;

    let result: LoadedLanguage | null = null;
    const ts = loadTreeSitter();
    if (ts) {
      try {
        const grammar: unknown = require(spec.grammarModule);
        const source = fs.readFileSync(path.join(this.queriesDir, spec.queryFile), "utf8");
        const parser = new ts();
        parser.setLanguage(grammar);
        result = { id: spec.id, parser, query: new ts.Query(grammar, source) };
      } catch (error) {
        logger.error("Failed to load grammar", {
          language: spec.id,
          error: getErrorMessage(error),
        });
      }
    }
    this.loaded.set(spec.id, result);
    return result;
  }
}
