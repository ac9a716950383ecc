const OPEN_FENCE = /^\s*```\s*([\w+#.-]+)/;
const CLOSE_FENCE = /^\s*```\s*$/;

/** A fenced code block; `startLine`..`endLine` spans the body only. */
export type FencedBlock = {
  language: string;
  startLine: number;
  /** Exclusive. Unterminated blocks run to the end of the document. */
  endLine: number;
};

export function findFencedBlocks(
  lineCount: number,
  lineText: (row: number) => string,
): FencedBlock[] {
  const blocks: FencedBlock[] = [];
  let open: { language: string; startLine: number } | null = null;

  for (let row = 0; row < lineCount; row++) {
    const text = lineText(row);
    if (open) {
      if (CLOSE_FENCE.test(text)) {
        blocks.push({ ...open, endLine: row });
        open = null;
      }
      continue;
    }
    const match = OPEN_FENCE.exec(text);
    if (match?.[1]) {
      open = { language: match[1].toLowerCase(), startLine: row + 1 };
    } else if (CLOSE_FENCE.test(text)) {
      // bare fence without a tag: its body is plain text
      open = { language: "", startLine: row + 1 };
    }
  }
  if (open) blocks.push({ ...open, endLine: lineCount });
  return blocks;
}
