import type { DocumentSource, LineHighlighter } from "./highlighter.js";
import type { Style } from "./style.js";

/**
 * Per-line style vectors over a document. A line that is cached and not
 * dirty is authoritative; anything else is recomputed on the next query.
 */
export class HighlightCache {
  private readonly lineStyles = new Map<number, Style[]>();
  private readonly dirtyLines = new Set<number>();
  private lastContentLength: number;

  constructor(
    private readonly doc: DocumentSource,
    private readonly highlighter: LineHighlighter,
  ) {
    this.lastContentLength = doc.lenChars();
  }

  getStyle(line: number, col: number): Style {
    return this.lineStylesFor(line)[col] ?? "normal";
  }

  lineStylesFor(line: number): Style[] {
    this.syncLength();
    const cached = this.lineStyles.get(line);
    if (cached && !this.dirtyLines.has(line)) return cached;
    const styles = this.highlighter.highlightLine(this.doc, line);
    this.cacheLine(line, styles);
    return styles;
  }

  cacheLine(line: number, styles: Style[]) {
    this.lineStyles.set(line, styles);
    this.dirtyLines.delete(line);
  }

  isLineCached(line: number) {
    return this.lineStyles.has(line) && !this.dirtyLines.has(line);
  }

  /** For in-place edits that cannot change other lines. */
  invalidateLine(line: number) {
    this.dirtyLines.add(line);
    this.lastContentLength = this.doc.lenChars();
  }

  /** For edits that shift or re-interpret every following line. */
  invalidateFrom(line: number) {
    const end = Math.max(this.doc.lenLines(), this.maxCachedLine() + 1);
    for (let l = line; l < end; l++) this.dirtyLines.add(l);
    this.lastContentLength = this.doc.lenChars();
  }

  clear() {
    this.lineStyles.clear();
    this.dirtyLines.clear();
    this.lastContentLength = this.doc.lenChars();
  }

  // a length change not announced through invalidate* drops every line
  private syncLength() {
    if (this.doc.lenChars() !== this.lastContentLength) this.clear();
  }

  private maxCachedLine() {
    let max = -1;
    for (const line of this.lineStyles.keys()) if (line > max) max = line;
    return max;
  }
}
