import blessed from "neo-blessed";

import type { KeyEvent } from "../editor/state.js";
import type { TerminalSink } from "./renderer.js";
import type { CellStyle } from "./theme.js";

const KEY_ALIASES: Record<string, string> = { return: "enter" };

/**
 * Normalizes a neo-blessed keypress. Printable characters are named by the
 * character itself, so `"`, `$` and `A` dispatch as typed.
 */
export function translateKey(
  ch: string | undefined,
  key: blessed.KeyInfo | undefined,
): KeyEvent | null {
  const ctrl = key?.ctrl ?? false;
  const meta = key?.meta ?? false;
  const shift = key?.shift ?? false;
  let name = key?.name;
  if (name) name = KEY_ALIASES[name] ?? name;

  const printable = ch !== undefined && ch.length > 0 && !/[\x00-\x1f\x7f]/.test(ch);
  if (printable && ch !== " " && !ctrl && !meta) name = ch;
  if (!name) return null;
  return { name, ch: printable ? ch : undefined, ctrl, meta, shift };
}

/**
 * Sends SIGTERM, stray exceptions and unhandled rejections to `shutdown`, so
 * the terminal is restored however the process ends.
 */
export function routeExitEvents(
  proc: NodeJS.EventEmitter,
  shutdown: (error?: unknown) => void,
) {
  proc.on("SIGTERM", () => shutdown());
  proc.on("uncaughtException", (error: unknown) => shutdown(error));
  proc.on("unhandledRejection", (reason: unknown) =>
    shutdown(reason ?? new Error("Unhandled promise rejection")),
  );
}

/** neo-blessed Program as the render sink plus the key and resize source. */
export class BlessedTerminal implements TerminalSink {
  private readonly program: blessed.Program;
  private lastStyle: CellStyle | null = null;

  constructor() {
    this.program = blessed.program({
      input: process.stdin,
      output: process.stdout,
      buffer: true,
    });
  }

  get cols() {
    return this.program.cols;
  }

  get rows() {
    return this.program.rows;
  }

  start() {
    this.program.alternateBuffer();
    this.program.hideCursor();
    this.program.clear();
  }

  stop() {
    this.program.sgr("normal");
    this.program.clear();
    this.program.showCursor();
    this.program.normalBuffer();
    this.program.flush();
    this.program.destroy();
  }

  onKey(handler: (key: KeyEvent) => void) {
    this.program.on("keypress", (ch, key) => {
      const event = translateKey(ch, key);
      if (event) handler(event);
    });
  }

  onResize(handler: () => void) {
    this.program.on("resize", handler);
  }

  moveTo(x: number, y: number) {
    this.program.cup(y, x);
  }

  write(text: string, style: CellStyle) {
    const last = this.lastStyle;
    if (!last || last.fg !== style.fg || last.bg !== style.bg) {
      this.program.sgr("normal");
      this.program.sgr(`${style.fg} fg`);
      this.program.sgr(`${style.bg} bg`);
      this.lastStyle = style;
    }
    this.program.write(text);
  }

  placeCursor(x: number, y: number) {
    this.program.cup(y, x);
    this.program.showCursor();
  }

  flush() {
    this.program.flush();
  }
}
