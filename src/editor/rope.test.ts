import { describe, expect, it } from "vitest";

import { Rope } from "./rope.js";

// small deterministic PRNG so failures reproduce
function lcg(seed: number) {
  let state = seed;
  return (n: number) => {
    state = (state * 48271) % 2147483647;
    return state % n;
  };
}

describe("Rope", () => {
  it("starts with one empty line", () => {
    const rope = new Rope();
    expect(rope.lenChars()).toBe(0);
    expect(rope.lenLines()).toBe(1);
    expect(rope.line(0)).toBe("");
    expect(rope.lineToChar(0)).toBe(0);
    expect(rope.charToLine(0)).toBe(0);
  });

  it("indexes lines and characters", () => {
    const rope = new Rope("ab\ncd\n");
    expect(rope.lenChars()).toBe(6);
    expect(rope.lenLines()).toBe(3);
    expect(rope.line(0)).toBe("ab\n");
    expect(rope.line(1)).toBe("cd\n");
    expect(rope.line(2)).toBe("");
    expect(rope.lineToChar(1)).toBe(3);
    expect(rope.lineToChar(3)).toBe(6);
    expect(rope.charToLine(2)).toBe(0);
    expect(rope.charToLine(3)).toBe(1);
    expect(rope.charToLine(6)).toBe(2);
  });

  it("counts code points rather than UTF-16 units", () => {
    const rope = new Rope("a😀b\nç");
    expect(rope.lenChars()).toBe(5);
    expect(rope.slice(1, 2)).toBe("😀");
    rope.insert(2, "x");
    expect(rope.toString()).toBe("a😀xb\nç");
    expect(rope.lineToChar(1)).toBe(5);
  });

  it("inserts and removes", () => {
    const rope = new Rope("hello world");
    rope.insert(5, ",");
    rope.insertChar(12, "!");
    expect(rope.toString()).toBe("hello, world!");
    rope.remove(0, 7);
    expect(rope.toString()).toBe("world!");
    rope.remove(3, 3);
    expect(rope.toString()).toBe("world!");
  });

  it("rejects out-of-range indices", () => {
    const rope = new Rope("abc");
    expect(() => rope.insert(4, "x")).toThrow(RangeError);
    expect(() => rope.remove(2, 1)).toThrow(RangeError);
    expect(() => rope.charToLine(-1)).toThrow(RangeError);
    expect(() => rope.line(1)).toThrow(RangeError);
    expect(() => rope.lineToChar(2)).toThrow(RangeError);
  });

  it("stays balanced for large documents", () => {
    const line = "0123456789".repeat(8) + "\n";
    const rope = new Rope(line.repeat(2000));
    expect(rope.lenLines()).toBe(2001);
    expect(rope.lineToChar(1500)).toBe(1500 * line.length);
    expect(rope.depth()).toBeLessThan(20);
    for (let i = 0; i < 500; i++) rope.insert(rope.lenChars(), "x\n");
    expect(rope.depth()).toBeLessThan(30);
  });

  it("matches a string model under random edits", () => {
    const next = lcg(7);
    const alphabet = ["a", "b", "\n", "é", "🙂", " "];
    let model: string[] = [];
    const rope = new Rope();

    for (let step = 0; step < 400; step++) {
      if (model.length > 0 && next(3) === 0) {
        const start = next(model.length + 1);
        const end = start + next(model.length - start + 1);
        rope.remove(start, end);
        model.splice(start, end - start);
      } else {
        const idx = next(model.length + 1);
        const len = 1 + next(40);
        const chunk = Array.from({ length: len }, () => alphabet[next(alphabet.length)] ?? "a");
        rope.insert(idx, chunk.join(""));
        model = [...model.slice(0, idx), ...chunk, ...model.slice(idx)];
      }
    }

    const text = model.join("");
    expect(rope.toString()).toBe(text);
    expect(rope.lenChars()).toBe(model.length);
    const lines = text.split("\n");
    expect(rope.lenLines()).toBe(lines.length);
    let offset = 0;
    lines.forEach((l, i) => {
      expect(rope.lineToChar(i)).toBe(offset);
      expect(rope.charToLine(offset)).toBe(i);
      offset += [...l].length + 1;
    });
  });
});
