import { DEFAULT_STYLE, type CellStyle, type Color } from "./theme.js";

export type Cell = { ch: string; fg: Color; bg: Color };

/** A changed span on one row sharing a single style. */
export type Run = { x: number; y: number; text: string; fg: Color; bg: Color };

const BLANK: Cell = { ch: " ", fg: DEFAULT_STYLE.fg, bg: DEFAULT_STYLE.bg };

export class Frame {
  private readonly cells: Cell[];

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.cells = new Array<Cell>(width * height).fill(BLANK);
  }

  get(x: number, y: number): Cell {
    return this.cells[y * this.width + x] ?? BLANK;
  }

  set(x: number, y: number, cell: Cell) {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return;
    this.cells[y * this.width + x] = cell;
  }

  /**
   * Writes `text` one code point per cell starting at (x, y), clipped to
   * `maxWidth` columns and the frame edge. Returns the column after the text.
   */
  write(x: number, y: number, text: string, style: CellStyle, maxWidth = this.width - x) {
    let col = x;
    for (const ch of text) {
      if (col - x >= maxWidth || col >= this.width) break;
      this.set(col, y, { ch, fg: style.fg, bg: style.bg });
      col++;
    }
    return col;
  }

  /** Paints `width` cells with spaces in `style`. */
  fill(x: number, y: number, width: number, style: CellStyle) {
    for (let col = x; col < x + width; col++) {
      this.set(col, y, { ch: " ", fg: style.fg, bg: style.bg });
    }
  }
}

function sameCell(a: Cell, b: Cell) {
  return a.ch === b.ch && a.fg === b.fg && a.bg === b.bg;
}

/**
 * Changed cells of `next`, grouped into maximal same-style runs per row. A
 * missing or differently sized `prev` marks every cell changed.
 */
export function diffFrames(prev: Frame | null, next: Frame): Run[] {
  const full =
    prev === null || prev.width !== next.width || prev.height !== next.height;
  const runs: Run[] = [];

  for (let y = 0; y < next.height; y++) {
    let run: Run | null = null;
    for (let x = 0; x < next.width; x++) {
      const cell = next.get(x, y);
      const changed = full || prev === null || !sameCell(prev.get(x, y), cell);
      if (!changed) {
        run = null;
        continue;
      }
      if (run && run.fg === cell.fg && run.bg === cell.bg) {
        run.text += cell.ch;
        continue;
      }
      run = { x, y, text: cell.ch, fg: cell.fg, bg: cell.bg };
      runs.push(run);
    }
  }
  return runs;
}
