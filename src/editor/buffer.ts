import { Rope } from "./rope.js";

export type Position = { row: number; col: number };

export class TextBuffer {
  private rope = new Rope();
  filePath: string | null = null;
  modified = false;
  /** Bumped on every mutation; lets derived data (parse trees) detect staleness. */
  revision = 0;

  /** Replaces the whole document; CRLF is normalized to LF. */
  load(content: string, filePath: string | null) {
    this.rope = new Rope(content.replace(/\r\n/g, "\n"));
    this.filePath = filePath;
    this.modified = false;
    this.revision++;
  }

  insert(idx: number, text: string) {
    if (text.length === 0) return;
    this.rope.insert(idx, text);
    this.touch();
  }

  insertChar(idx: number, ch: string) {
    this.rope.insertChar(idx, ch);
    this.touch();
  }

  remove(start: number, end: number) {
    if (start === end) return;
    this.rope.remove(start, end);
    this.touch();
  }

  append(text: string) {
    this.insert(this.lenChars(), text);
  }

  lenChars() {
    return this.rope.lenChars();
  }

  lenLines() {
    return this.rope.lenLines();
  }

  line(i: number) {
    return this.rope.line(i);
  }

  lineToChar(i: number) {
    return this.rope.lineToChar(i);
  }

  charToLine(idx: number) {
    return this.rope.charToLine(idx);
  }

  slice(start: number, end: number) {
    return this.rope.slice(start, end);
  }

  /** Line length without its terminator. */
  lineLength(row: number) {
    const chars = this.rope.lineToChar(row + 1) - this.rope.lineToChar(row);
    // every line but the last ends in "\n"
    return row < this.rope.lenLines() - 1 ? Math.max(0, chars - 1) : chars;
  }

  /** Line text without its terminator. */
  lineText(row: number) {
    const line = this.rope.line(row);
    return line.endsWith("\n") ? line.slice(0, -1) : line;
  }

  charIdxFromPosition(pos: Position) {
    return this.rope.lineToChar(pos.row) + pos.col;
  }

  positionFromCharIdx(idx: number): Position {
    const row = this.rope.charToLine(idx);
    return { row, col: idx - this.rope.lineToChar(row) };
  }

  toString() {
    return this.rope.toString();
  }

  private touch() {
    this.modified = true;
    this.revision++;
  }
}
