export type WrappedLineInfo = {
  line: number;
  /** First code-point column of the segment. */
  startCol: number;
  /** One past the last column; equals startCol for an empty line. */
  endCol: number;
  screenRow: number;
};

export type TextSource = {
  lenLines(): number;
  lineText(row: number): string;
};

export type ScreenPoint = { x: number; y: number };

/** Display width of `ch` when it starts at display column `displayed`. */
export function charWidth(ch: string, displayed: number, tabWidth: number) {
  return ch === "\t" ? tabWidth - (displayed % tabWidth) : 1;
}

/**
 * Soft-wraps every line of `doc` at `width` display columns. Each character
 * counts as one column except tabs, which run to the next tab stop. Every
 * line yields at least one segment.
 */
export function computeWrappedLines(
  doc: TextSource,
  width: number,
  tabWidth: number,
): WrappedLineInfo[] {
  const out: WrappedLineInfo[] = [];
  const maxWidth = Math.max(1, width);
  let screenRow = 0;

  for (let line = 0; line < doc.lenLines(); line++) {
    const chars = [...doc.lineText(line)];
    let startCol = 0;
    let displayed = 0;
    for (let col = 0; col < chars.length; col++) {
      const ch = chars[col] ?? "";
      let w = Math.min(charWidth(ch, displayed, tabWidth), maxWidth);
      if (displayed > 0 && displayed + w > maxWidth) {
        out.push({ line, startCol, endCol: col, screenRow: screenRow++ });
        startCol = col;
        displayed = 0;
        w = Math.min(charWidth(ch, 0, tabWidth), maxWidth);
      }
      displayed += w;
    }
    out.push({ line, startCol, endCol: chars.length, screenRow: screenRow++ });
  }
  return out;
}

/**
 * Index of the segment holding (row, col). A column at the very end of a
 * segment belongs to the next segment of the same line when there is one.
 */
export function segmentIndexAt(
  wrapped: readonly WrappedLineInfo[],
  row: number,
  col: number,
): number {
  let found = -1;
  for (let i = 0; i < wrapped.length; i++) {
    const seg = wrapped[i];
    if (!seg || seg.line < row) continue;
    if (seg.line > row) break;
    found = i;
    if (col < seg.endCol) break;
  }
  return found;
}

/**
 * Screen position of (row, col) relative to the text area's top-left, before
 * scrolling. `x` is a display column, so tabs before the cursor count fully.
 */
export function cursorScreenPosition(
  doc: TextSource,
  wrapped: readonly WrappedLineInfo[],
  row: number,
  col: number,
  tabWidth: number,
): ScreenPoint {
  const seg = wrapped[segmentIndexAt(wrapped, row, col)];
  if (!seg) return { x: 0, y: 0 };
  const chars = [...doc.lineText(row)].slice(seg.startCol, col);
  let x = 0;
  for (const ch of chars) x += charWidth(ch, x, tabWidth);
  return { x, y: seg.screenRow };
}

/**
 * Smallest change to `offset` that keeps `cursorRow` inside the viewport,
 * clamped to `[0, total - height]`.
 */
export function adjustScroll(
  offset: number,
  cursorRow: number,
  height: number,
  total: number,
): number {
  let next = offset;
  if (cursorRow < next) next = cursorRow;
  if (cursorRow >= next + height) next = cursorRow - height + 1;
  return Math.max(0, Math.min(next, total - height));
}
