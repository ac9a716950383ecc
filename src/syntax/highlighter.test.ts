import { describe, expect, it, vi } from "vitest";

import { TextBuffer } from "../editor/buffer.js";
import { logger } from "../logger.js";
import { SyntaxHighlighter, unitToColumn } from "./highlighter.js";
import {
  LanguageRegistry,
  LANGUAGES,
  type LanguageSpec,
  type LoadedLanguage,
} from "./languages.js";
import { CaptureStyles } from "./style.js";

class FailingParseRegistry extends LanguageRegistry {
  load(spec: LanguageSpec): LoadedLanguage | null {
    return {
      id: spec.id,
      parser: {
        parse: () => {
          throw new Error("Invalid argument");
        },
      },
      query: { captures: () => [] },
    };
  }
}

function doc(text: string, filePath: string | null) {
  const buf = new TextBuffer();
  buf.load(text, filePath);
  return buf;
}

describe("unitToColumn", () => {
  it("counts surrogate pairs as one column", () => {
    expect(unitToColumn("a😀b", 3)).toBe(2);
    expect(unitToColumn("abc", 2)).toBe(2);
  });
});

describe("LanguageRegistry", () => {
  const registry = new LanguageRegistry();

  it("picks a language by extension and by fence tag", () => {
    expect(registry.forPath("src/app.mjs")?.id).toBe("javascript");
    expect(registry.forPath("lib.RS")?.id).toBe("rust");
    expect(registry.forPath("notes.md")).toBeNull();
    expect(registry.forPath(null)).toBeNull();
    expect(registry.forFenceTag("JS")?.id).toBe("javascript");
    expect(registry.forFenceTag("python")).toBeNull();
  });

  it("returns null for a grammar that cannot be loaded", () => {
    const broken = new LanguageRegistry([
      { ...LANGUAGES[0], id: "missing", grammarModule: "tree-sitter-does-not-exist" },
    ]);
    const spec = broken.forFenceTag("js");
    expect(spec).not.toBeNull();
    if (spec) expect(broken.load(spec)).toBeNull();
  });
});

describe("SyntaxHighlighter", () => {
  const highlighter = new SyntaxHighlighter();

  it("styles a JavaScript file by its captures", () => {
    const source = doc('const x = "hi";', "demo.js");
    expect(highlighter.highlightLine(source, 0)).toEqual([
      "keyword", "keyword", "keyword", "keyword", "keyword",
      "normal", "normal", "normal",
      "operator",
      "normal",
      "string", "string", "string", "string",
      "normal",
    ]);
  });

  it("reports styles in code-point columns", () => {
    const source = doc('const s = "😀";', "demo.js");
    const styles = highlighter.highlightLine(source, 0);
    expect(styles).toHaveLength(14);
    expect(styles.slice(10)).toEqual(["string", "string", "string", "normal"]);
  });

  it("highlights only fenced code in other documents", () => {
    const source = doc("# let = 1\n```js\nlet y = 1;\n```", "notes.md");
    expect(highlighter.highlightLine(source, 0)).toEqual(new Array<string>(9).fill("normal"));
    expect(highlighter.highlightLine(source, 2)).toEqual([
      "keyword", "keyword", "keyword",
      "normal", "normal", "normal",
      "operator",
      "normal",
      "number",
      "normal",
    ]);
  });

  it("leaves documents without a language plain", () => {
    const source = doc("const x = 1;", "notes.txt");
    expect(highlighter.highlightLine(source, 0)).toEqual(new Array<string>(12).fill("normal"));
  });
});

describe("SyntaxHighlighter on large or unparsable input", () => {
  it("highlights a document longer than the default parse buffer", () => {
    const text = new Array<string>(4000).fill("let a = 1;").join("\n");
    expect(text.length).toBeGreaterThan(32768);
    const highlighter = new SyntaxHighlighter();
    expect(highlighter.highlightLine(doc(text, "big.js"), 3999)).toEqual([
      "keyword", "keyword", "keyword",
      "normal", "normal", "normal",
      "operator",
      "normal",
      "number",
      "normal",
    ]);
  });

  it("falls back to plain text and warns once when parsing throws", () => {
    const warn = vi.spyOn(logger, "warn");
    const highlighter = new SyntaxHighlighter(
      new FailingParseRegistry(),
      CaptureStyles.fromFile(),
    );
    const source = doc("let a = 1;", "demo.js");
    expect(highlighter.highlightLine(source, 0)).toEqual(new Array<string>(10).fill("normal"));
    source.insert(0, " ");
    expect(highlighter.highlightLine(source, 0)).toEqual(new Array<string>(11).fill("normal"));
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
