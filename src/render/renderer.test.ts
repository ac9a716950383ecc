import { describe, expect, it } from "vitest";

import { RequestCoordinator } from "../async/coordinator.js";
import { Editor } from "../editor/editor.js";
import type { KeyEvent } from "../editor/state.js";
import type { DocumentSource } from "../syntax/highlighter.js";
import type { Style } from "../syntax/style.js";
import type { Frame } from "./frame.js";
import {
  RenderEngine,
  gutterWidth,
  requestStatusText,
  statusLineText,
  type TerminalSink,
} from "./renderer.js";
import { THEME, UI, type CellStyle } from "./theme.js";

type Write = { x: number; y: number; text: string; style: CellStyle };

class RecordingSink implements TerminalSink {
  writes: Write[] = [];
  cursor = { x: -1, y: -1 };
  flushes = 0;
  private at = { x: 0, y: 0 };

  moveTo(x: number, y: number) {
    this.at = { x, y };
  }

  write(text: string, style: CellStyle) {
    this.writes.push({ ...this.at, text, style });
  }

  placeCursor(x: number, y: number) {
    this.cursor = { x, y };
  }

  flush() {
    this.flushes++;
  }
}

function setup(text: string, filePath: string | null = null) {
  const editor = new Editor({
    files: {
      open: () => "",
      save: () => {},
      list: () => ({ files: [], dirs: [] }),
    },
    clipboard: { set: () => {}, get: () => "" },
    coordinator: new RequestCoordinator({ send: () => Promise.resolve("reply") }),
    highlighter: {
      highlightLine: (doc: DocumentSource, row: number): Style[] =>
        [...doc.lineText(row)].map((ch) => (ch === "=" ? "operator" : "normal")),
    },
  });
  editor.buf.load(text, filePath);
  editor.cache.clear();
  const sink = new RecordingSink();
  const engine = new RenderEngine(sink, 4);
  const press = (...names: string[]) => {
    for (const name of names) {
      const event: KeyEvent = { name, ch: [...name].length === 1 ? name : undefined };
      editor.handleKey(event);
    }
  };
  return { editor, sink, engine, press };
}

function rowText(frame: Frame, y: number) {
  let out = "";
  for (let x = 0; x < frame.width; x++) out += frame.get(x, y).ch;
  return out.trimEnd();
}

describe("status text", () => {
  it("sizes the gutter for the line count", () => {
    expect(gutterWidth(1)).toBe(4);
    expect(gutterWidth(12345)).toBe(6);
  });

  it("describes the request state", () => {
    expect(requestStatusText({ kind: "idle" })).toBe("Request Status: Idle");
    expect(requestStatusText({ kind: "processing" })).toBe("Request Status: In Progress");
    expect(requestStatusText({ kind: "error", message: "boom" })).toBe(
      "Request Status: Error: boom",
    );
  });

  it("shows mode, name, modified flag and 1-based position", () => {
    const { editor, press } = setup("ab\ncd", "notes.md");
    expect(statusLineText(editor, 40)).toBe(
      " NORMAL | notes.md" + " ".repeat(18) + "1:1 ",
    );
    press("j", "i", "x");
    expect(statusLineText(editor, 40)).toBe(
      " INSERT | notes.md [+]" + " ".repeat(14) + "2:2 ",
    );
    press("escape", "g");
    expect(statusLineText(editor, 40).startsWith(" WAITING FOR COMMAND | notes.md [+]")).toBe(
      true,
    );
  });

  it("names an unsaved document", () => {
    const { editor } = setup("");
    expect(statusLineText(editor, 30).startsWith(" NORMAL | [No Name] ")).toBe(true);
  });
});

describe("RenderEngine", () => {
  it("draws the gutter, text, filler, status and request lines", () => {
    const { editor, engine, sink } = setup("ab\ncd");
    const frame = engine.render(editor, 40, 5);
    expect(rowText(frame, 0)).toBe("  1 ab");
    expect(rowText(frame, 1)).toBe("  2 cd");
    expect(rowText(frame, 2)).toBe("~");
    expect(rowText(frame, 3)).toBe(" NORMAL | [No Name]                 1:1");
    expect(rowText(frame, 4)).toBe("Request Status: Idle");
    expect(sink.cursor).toEqual({ x: 4, y: 0 });
    expect(sink.flushes).toBe(1);
  });

  it("draws every cell on the first frame and after invalidate", () => {
    const { editor, engine, sink } = setup("ab");
    const count = () => sink.writes.reduce((n, w) => n + [...w.text].length, 0);
    engine.render(editor, 40, 5);
    expect(count()).toBe(200);
    sink.writes = [];
    engine.render(editor, 40, 5);
    expect(sink.writes).toEqual([]);
    engine.invalidate();
    engine.render(editor, 40, 5);
    expect(count()).toBe(200);
  });

  it("sends only the cells a cursor move changed", () => {
    const { editor, engine, sink, press } = setup("ab");
    engine.render(editor, 40, 5);
    sink.writes = [];
    press("l");
    engine.render(editor, 40, 5);
    expect(sink.writes).toEqual([{ x: 38, y: 3, text: "2", style: { fg: "black", bg: "cyan" } }]);
    expect(sink.cursor).toEqual({ x: 5, y: 0 });
  });

  it("resolves selection over syntax over default", () => {
    const { editor, engine, press } = setup("a=b");
    press("v", "l", "l");
    const frame = engine.render(editor, 40, 5);
    const cell = (x: number) => {
      const c = frame.get(x, 0);
      return { fg: c.fg, bg: c.bg };
    };
    expect(cell(4)).toEqual(THEME.selection);
    expect(cell(5)).toEqual(THEME.selection);
    expect(cell(6)).toEqual(THEME.normal);
    press("escape");
    const next = engine.render(editor, 40, 5);
    expect({ fg: next.get(5, 0).fg, bg: next.get(5, 0).bg }).toEqual(THEME.operator);
  });

  it("soft-wraps long lines without repeating the line number", () => {
    const { editor, engine, sink, press } = setup("abcdefghij");
    press("$", "h", "h");
    const frame = engine.render(editor, 10, 5);
    expect(rowText(frame, 0)).toBe("  1 abcdef");
    expect(rowText(frame, 1)).toBe("    ghij");
    expect(sink.cursor).toEqual({ x: 6, y: 1 });
  });

  it("expands tabs to the next stop", () => {
    const { editor, engine } = setup("a\tb");
    const frame = engine.render(editor, 20, 3);
    expect(rowText(frame, 0)).toBe("  1 a   b");
  });

  it("shows control characters as a placeholder instead of sending them", () => {
    const { editor, engine, sink } = setup("ab\rcd\x1b[2Jef");
    const frame = engine.render(editor, 40, 5);
    expect(rowText(frame, 0)).toBe("  1 ab^cd^[2Jef");
    const cell = frame.get(6, 0);
    expect({ fg: cell.fg, bg: cell.bg }).toEqual(UI.control);
    expect(sink.writes.filter((w) => /[\r\x1b]/.test(w.text))).toEqual([]);
  });

  it("scrolls to keep the cursor visible", () => {
    const lines = Array.from({ length: 10 }, (_, i) => `line ${i + 1}`);
    const { editor, engine, sink, press } = setup(lines.join("\n"));
    press("g", "e");
    const frame = engine.render(editor, 40, 5);
    expect(engine.scrollOffset).toBe(7);
    expect(rowText(frame, 0)).toBe("  8 line 8");
    expect(rowText(frame, 2)).toBe(" 10 line 10");
    expect(sink.cursor).toEqual({ x: 11, y: 2 });
    press("g", "g");
    engine.render(editor, 40, 5);
    expect(engine.scrollOffset).toBe(0);
  });

  it("shows menu hints in the bottom-right corner", () => {
    const { editor, engine, press } = setup("ab");
    press("g");
    const frame = engine.render(editor, 40, 8);
    expect(rowText(frame, 1).slice(21)).toBe(" Go to");
    expect(rowText(frame, 2).slice(21)).toBe(" g  Document start");
    expect(rowText(frame, 5).slice(21)).toBe(" l  Line end");
  });

  it("places the terminal cursor in the save prompt", () => {
    const { editor, engine, sink, press } = setup("ab");
    press("space", "w", "a", "b");
    const frame = engine.render(editor, 40, 8);
    expect(rowText(frame, 2).slice(1)).toBe(" > ab");
    expect(sink.cursor).toEqual({ x: 6, y: 2 });
  });

  it("shows the transient message after the request status", () => {
    const { editor, engine } = setup("ab");
    editor.notify("Saved notes.md");
    const frame = engine.render(editor, 60, 5);
    expect(rowText(frame, 4)).toBe("Request Status: Idle  Saved notes.md");
  });
});
