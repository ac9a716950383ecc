import type { Position, TextBuffer } from "./buffer.js";

export type Selection = { anchor: Position };

export type CharRange = { start: number; end: number };

/**
 * Cursor plus optional selection anchor. The cursor is always the live end of
 * the selection.
 */
export class Cursor {
  row = 0;
  col = 0;
  selection: Selection | null = null;

  constructor(private readonly buf: TextBuffer) {}

  position(): Position {
    return { row: this.row, col: this.col };
  }

  set(pos: Position) {
    this.row = pos.row;
    this.col = pos.col;
    this.clamp();
  }

  /** Re-establishes the row/col invariants after the document changed underneath. */
  clamp() {
    this.row = Math.max(0, Math.min(this.row, this.buf.lenLines() - 1));
    this.col = Math.max(0, Math.min(this.col, this.buf.lineLength(this.row)));
  }

  charIdx() {
    return this.buf.charIdxFromPosition(this.position());
  }

  moveTo(charIdx: number) {
    this.set(this.buf.positionFromCharIdx(charIdx));
  }

  up() {
    if (this.row === 0) return;
    this.row--;
    this.col = Math.min(this.col, this.buf.lineLength(this.row));
  }

  down() {
    if (this.row >= this.buf.lenLines() - 1) return;
    this.row++;
    this.col = Math.min(this.col, this.buf.lineLength(this.row));
  }

  left() {
    if (this.col > 0) {
      this.col--;
    } else if (this.row > 0) {
      this.row--;
      this.col = this.buf.lineLength(this.row);
    }
  }

  right() {
    if (this.col < this.buf.lineLength(this.row)) {
      this.col++;
    } else if (this.row < this.buf.lenLines() - 1) {
      this.row++;
      this.col = 0;
    }
  }

  lineStart() {
    this.col = 0;
  }

  lineEnd() {
    this.col = this.buf.lineLength(this.row);
  }

  documentStart() {
    this.row = 0;
    this.col = 0;
  }

  documentEnd() {
    this.row = this.buf.lenLines() - 1;
    this.col = this.buf.lineLength(this.row);
  }

  startSelection() {
    this.selection = { anchor: this.position() };
  }

  clearSelection() {
    this.selection = null;
  }

  /**
   * Selects the cursor's whole line, terminator included. With a selection
   * already open the cursor moves one line further instead.
   */
  selectLine() {
    if (!this.selection) {
      this.selection = { anchor: { row: this.row, col: 0 } };
    }
    if (this.row < this.buf.lenLines() - 1) {
      this.row++;
      this.col = 0;
    } else {
      this.col = this.buf.lineLength(this.row);
    }
  }

  /** Ordered half-open character range, or null when nothing is selected. */
  selectionRange(): CharRange | null {
    if (!this.selection) return null;
    const a = this.buf.charIdxFromPosition(this.selection.anchor);
    const b = this.charIdx();
    return a <= b ? { start: a, end: b } : { start: b, end: a };
  }
}
