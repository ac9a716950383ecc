/**
 * Tree-sitter backed line highlighter.
 *
 * A document is split into regions: the whole document when its file
 * extension names a registered language, otherwise each fenced block tagged
 * with one. Every region is parsed once per buffer revision and its captures
 * are bucketed into per-line spans in character columns, so highlighting a
 * single line afterwards is a lookup.
 */

import { findFencedBlocks } from "./fences.js";
import { getErrorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { LanguageRegistry, type LanguageSpec, type LoadedLanguage } from "./languages.js";
import { CaptureStyles, type Style } from "./style.js";

/** The read-only view of a document that highlighting needs. */
export type DocumentSource = {
  readonly revision: number;
  readonly filePath: string | null;
  lenLines(): number;
  lenChars(): number;
  lineText(row: number): string;
};

export interface LineHighlighter {
  highlightLine(doc: DocumentSource, row: number): Style[];
}

type Span = { start: number; end: number; style: Style };

type Region = {
  startLine: number;
  endLine: number;
  /** Spans per region-relative row. */
  rows: Span[][];
};

/** Character column of UTF-16 offset `unit` within `text`. */
export function unitToColumn(text: string, unit: number): number {
  let col = 0;
  for (let i = 0; i < unit && i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code < 0xdc00 || code > 0xdfff) col++;
  }
  return col;
}

export class SyntaxHighlighter implements LineHighlighter {
  private regions: Region[] = [];
  private readonly failedLanguages = new Set<string>();
  private builtFor: { revision: number; filePath: string | null } | null = null;

  constructor(
    private readonly registry = new LanguageRegistry(),
    private readonly captures = CaptureStyles.fromFile(),
  ) {}

  highlightLine(doc: DocumentSource, row: number): Style[] {
    const text = doc.lineText(row);
    const styles: Style[] = new Array<Style>([...text].length).fill("normal");
    const region = this.regionsFor(doc).find(
      (r) => row >= r.startLine && row < r.endLine,
    );
    const spans = region ? (region.rows[row - region.startLine] ?? []) : [];
    const assigned = new Array<boolean>(styles.length).fill(false);

    // first capture wins where captures overlap
    for (const span of spans) {
      for (let col = span.start; col < span.end && col < styles.length; col++) {
        if (assigned[col]) continue;
        styles[col] = span.style;
        assigned[col] = true;
      }
    }
    return styles;
  }

  private regionsFor(doc: DocumentSource): Region[] {
    if (
      this.builtFor &&
      this.builtFor.revision === doc.revision &&
      this.builtFor.filePath === doc.filePath
    ) {
      return this.regions;
    }

    const whole = this.registry.forPath(doc.filePath);
    const lineCount = doc.lenLines();
    const targets: Array<{ spec: LanguageSpec; startLine: number; endLine: number }> = [];
    if (whole) {
      targets.push({ spec: whole, startLine: 0, endLine: lineCount });
    } else {
      const lineText = (row: number) => doc.lineText(row);
      for (const block of findFencedBlocks(lineCount, lineText)) {
        const spec = this.registry.forFenceTag(block.language);
        if (spec && block.endLine > block.startLine) {
          targets.push({ spec, ...block });
        }
      }
    }

    this.regions = [];
    for (const target of targets) {
      const region = this.parseRegion(doc, target.spec, target.startLine, target.endLine);
      if (region) this.regions.push(region);
    }
    this.builtFor = { revision: doc.revision, filePath: doc.filePath };
    return this.regions;
  }

  private parseRegion(
    doc: DocumentSource,
    spec: LanguageSpec,
    startLine: number,
    endLine: number,
  ): Region | null {
    const language = this.registry.load(spec);
    if (!language) return null;

    const lines: string[] = [];
    for (let row = startLine; row < endLine; row++) lines.push(doc.lineText(row));
    const lineStarts: number[] = [];
    let offset = 0;
    for (const line of lines) {
      lineStarts.push(offset);
      offset += line.length + 1;
    }

    const source = lines.join("\n");
    let rows: Span[][];
    try {
      rows = this.collectSpans(language, source, lines, lineStarts);
    } catch (error) {
      if (!this.failedLanguages.has(language.id)) {
        this.failedLanguages.add(language.id);
        logger.warn("Highlighting failed, showing plain text", {
          language: language.id,
          error: getErrorMessage(error),
        });
      }
      return null;
    }

    return { startLine, endLine, rows };
  }

  private collectSpans(
    language: LoadedLanguage,
    source: string,
    lines: string[],
    lineStarts: number[],
  ): Span[][] {
    // string input needs a buffer large enough for the whole source in UTF-16
    const tree = language.parser.parse(source, undefined, {
      bufferSize: Math.max(1024, source.length * 2 + 2),
    });
    const rows: Span[][] = lines.map(() => []);

    for (const capture of language.query.captures(tree.rootNode)) {
      const node = capture.node;
      // node-tree-sitter reports offsets in UTF-16 code units
      if (node.startIndex === node.endIndex) continue;
      const style = this.captures.resolve(capture.name);
      const last = Math.min(node.endPosition.row, lines.length - 1);
      for (let r = node.startPosition.row; r <= last; r++) {
        const line = lines[r] ?? "";
        const lineStart = lineStarts[r] ?? 0;
        const from = Math.max(node.startIndex, lineStart) - lineStart;
        const to = Math.min(node.endIndex, lineStart + line.length) - lineStart;
        if (to <= from) continue;
        rows[r]?.push({
          start: unitToColumn(line, from),
          end: unitToColumn(line, to),
          style,
        });
      }
    }
    return rows;
  }
}
