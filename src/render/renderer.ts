import type { RequestState } from "../async/coordinator.js";
import type { Editor } from "../editor/editor.js";
import { menus } from "../editor/keymap.js";
import { MODE_LABELS } from "../editor/state.js";
import { Frame, diffFrames } from "./frame.js";
import {
  adjustScroll,
  charWidth,
  computeWrappedLines,
  cursorScreenPosition,
  type ScreenPoint,
} from "./geometry.js";
import { drawFilePicker, drawMenuHints, drawSaveAs } from "./popups.js";
import { THEME, UI, type CellStyle } from "./theme.js";

// C0, DEL and C1 controls other than tab never reach the terminal raw
const CONTROL_CHAR = /[\x00-\x08\x0a-\x1f\x7f-\x9f]/;
const CONTROL_PLACEHOLDER = "^";

/** Where frames go: one move plus one styled write per changed run. */
export interface TerminalSink {
  moveTo(x: number, y: number): void;
  write(text: string, style: CellStyle): void;
  placeCursor(x: number, y: number): void;
  flush(): void;
}

export function gutterWidth(lineCount: number) {
  return Math.max(3, String(lineCount).length) + 1;
}

export function requestStatusText(state: RequestState) {
  switch (state.kind) {
    case "idle":
      return "Request Status: Idle";
    case "processing":
      return "Request Status: In Progress";
    case "error":
      return `Request Status: Error: ${state.message}`;
  }
}

export function statusLineText(editor: Editor, width: number) {
  const buf = editor.buf;
  const mode = editor.isWaitingForCommand()
    ? "WAITING FOR COMMAND"
    : MODE_LABELS[editor.mode];
  const name = buf.filePath ?? "[No Name]";
  const left = ` ${mode} | ${name}${buf.modified ? " [+]" : ""}`;
  const right = `${editor.cursor.row + 1}:${editor.cursor.col + 1} `;
  const gap = Math.max(1, width - [...left].length - right.length);
  return left + " ".repeat(gap) + right;
}

/**
 * Draws the editor into a cell frame each tick and sends the terminal only
 * what changed since the previous frame.
 */
export class RenderEngine {
  scrollOffset = 0;
  private previous: Frame | null = null;

  constructor(
    private readonly sink: TerminalSink,
    private readonly tabWidth = 4,
  ) {}

  /** Forces the next frame to redraw every cell (startup, resize). */
  invalidate() {
    this.previous = null;
  }

  render(editor: Editor, width: number, height: number): Frame {
    const frame = new Frame(width, height);
    const textHeight = Math.max(0, height - 2);
    const cursor = this.drawText(frame, editor, width, textHeight);

    const area = { width, height: textHeight };
    let inputCursor: ScreenPoint | null = null;
    const menu = editor.menu;
    if (menu.kind === "picker") {
      if (menu.action === "load") drawFilePicker(frame, area, editor.picker);
      else inputCursor = drawSaveAs(frame, area, editor.picker);
    } else if (menu.kind !== "inactive") {
      drawMenuHints(frame, area, menus[menu.kind]);
    }

    this.drawStatus(frame, editor, width, height);

    for (const run of diffFrames(this.previous, frame)) {
      this.sink.moveTo(run.x, run.y);
      this.sink.write(run.text, { fg: run.fg, bg: run.bg });
    }
    const at = inputCursor ?? cursor;
    this.sink.placeCursor(at.x, at.y);
    this.sink.flush();
    this.previous = frame;
    return frame;
  }

  private drawText(
    frame: Frame,
    editor: Editor,
    width: number,
    textHeight: number,
  ): ScreenPoint {
    const { buf, cursor, cache } = editor;
    const gutter = gutterWidth(buf.lenLines());
    const contentWidth = Math.max(1, width - gutter);
    const wrapped = computeWrappedLines(buf, contentWidth, this.tabWidth);
    const at = cursorScreenPosition(buf, wrapped, cursor.row, cursor.col, this.tabWidth);
    this.scrollOffset = adjustScroll(this.scrollOffset, at.y, textHeight, wrapped.length);

    const selection = cursor.selectionRange();
    let lineChars: string[] = [];
    let lineStart = 0;
    let styledLine = -1;

    for (let y = 0; y < textHeight; y++) {
      const seg = wrapped[this.scrollOffset + y];
      if (!seg) {
        frame.write(0, y, "~", UI.filler);
        continue;
      }
      if (seg.line !== styledLine) {
        styledLine = seg.line;
        lineChars = [...buf.lineText(seg.line)];
        lineStart = buf.lineToChar(seg.line);
      }

      if (seg.startCol === 0) {
        const label = String(seg.line + 1).padStart(gutter - 1) + " ";
        frame.write(0, y, label, seg.line === cursor.row ? UI.gutterCurrent : UI.gutter);
      }

      const styles = cache.lineStylesFor(seg.line);
      let x = 0;
      for (let col = seg.startCol; col < seg.endCol; col++) {
        const ch = lineChars[col] ?? " ";
        const w = charWidth(ch, x, this.tabWidth);
        const idx = lineStart + col;
        const selected =
          selection !== null && idx >= selection.start && idx < selection.end;
        const style = selected ? THEME.selection : THEME[styles[col] ?? "normal"];
        if (ch === "\t") {
          frame.fill(gutter + x, y, Math.min(w, contentWidth - x), style);
        } else if (CONTROL_CHAR.test(ch)) {
          frame.write(
            gutter + x,
            y,
            CONTROL_PLACEHOLDER,
            selected ? style : UI.control,
            contentWidth - x,
          );
        } else {
          frame.write(gutter + x, y, ch, style, contentWidth - x);
        }
        x += w;
      }
    }

    return {
      x: gutter + Math.min(at.x, contentWidth - 1),
      y: Math.max(0, at.y - this.scrollOffset),
    };
  }

  private drawStatus(frame: Frame, editor: Editor, width: number, height: number) {
    const statusRow = height - 2;
    const requestRow = height - 1;
    if (statusRow >= 0) {
      frame.fill(0, statusRow, width, UI.status);
      frame.write(0, statusRow, statusLineText(editor, width), UI.status);
    }
    if (requestRow < 0) return;

    const state = editor.requestState();
    const style =
      state.kind === "error"
        ? UI.requestError
        : state.kind === "processing"
          ? UI.requestBusy
          : UI.request;
    const end = frame.write(0, requestRow, requestStatusText(state), style);
    const message = editor.message;
    if (message) {
      frame.write(
        end + 2,
        requestRow,
        message.text,
        message.level === "error" ? UI.messageError : UI.request,
      );
    }
  }
}
