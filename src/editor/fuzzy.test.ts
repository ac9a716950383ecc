import { describe, expect, it } from "vitest";

import { fuzzyFind, fuzzyScore } from "./fuzzy.js";

describe("fuzzyScore", () => {
  it("is -1 when the query is not a subsequence", () => {
    expect(fuzzyScore("xyz", "main.ts")).toBe(-1);
    expect(fuzzyScore("tm", "main.ts")).toBe(-1);
  });

  it("is 0 for an empty query", () => {
    expect(fuzzyScore("", "anything")).toBe(0);
  });

  it("rewards contiguous matches at the start", () => {
    // m: 16 + 12 at the start, a: 16 + 24 adjacent
    expect(fuzzyScore("ma", "main.ts")).toBe(68);
    expect(fuzzyScore("MA", "main.ts")).toBe(68);
  });

  it("caps the penalty for gaps and leading characters", () => {
    // m: 28, t: 16 - 3 for the gap + 12 after "."
    expect(fuzzyScore("mt", "main.ts")).toBe(53);
    // 15 off for the lead, then 16 for the match
    expect(fuzzyScore("z", "abcdefghijklmnopqrstuvwxyz")).toBe(1);
  });

  it("rewards matches after a separator", () => {
    expect(fuzzyScore("t", "main.ts")).toBeGreaterThan(fuzzyScore("t", "mainxts"));
  });
});

describe("fuzzyFind", () => {
  it("keeps input order for an empty query", () => {
    const hits = fuzzyFind("", ["b", "a", "c"], (s) => s);
    expect(hits.map((h) => h.item)).toEqual(["b", "a", "c"]);
  });

  it("ranks better matches first and drops misses", () => {
    const items = ["src/render/frame.ts", "README.md", "src/editor/rope.ts"];
    const hits = fuzzyFind("rope", items, (s) => s);
    expect(hits.map((h) => h.item)).toEqual(["src/editor/rope.ts"]);
  });

  it("honours the limit", () => {
    const hits = fuzzyFind("a", ["a1", "a2", "a3"], (s) => s, 2);
    expect(hits.map((h) => h.item)).toEqual(["a1", "a2"]);
  });
});
