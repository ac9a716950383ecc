/**
 * Balanced rope over Unicode scalar values.
 *
 * Leaves hold short chunks of text; branches cache the character and newline
 * counts of their subtree so line/char lookups, inserts and removals all
 * descend a single path. Nodes are immutable and the tree is kept AVL
 * balanced by `join`.
 */

const MAX_LEAF = 512;

type Leaf = {
  kind: "leaf";
  text: string;
  chars: number;
  newlines: number;
  height: 0;
};

type Branch = {
  kind: "branch";
  left: RopeNode;
  right: RopeNode;
  chars: number;
  newlines: number;
  height: number;
};

type RopeNode = Leaf | Branch;

function countChars(text: string): number {
  let n = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    // low surrogate of a pair does not start a new scalar value
    if (code < 0xdc00 || code > 0xdfff) n++;
  }
  return n;
}

function countNewlines(text: string): number {
  let n = 0;
  let at = text.indexOf("\n");
  while (at !== -1) {
    n++;
    at = text.indexOf("\n", at + 1);
  }
  return n;
}

/** UTF-16 offset of the `charIdx`-th scalar value in `text`. */
function codeUnitOffset(text: string, charIdx: number): number {
  if (text.length === charIdx) return charIdx;
  let seen = 0;
  let i = 0;
  while (i < text.length && seen < charIdx) {
    const code = text.charCodeAt(i);
    i += code >= 0xd800 && code <= 0xdbff && i + 1 < text.length ? 2 : 1;
    seen++;
  }
  return i;
}

function leaf(text: string): Leaf {
  return {
    kind: "leaf",
    text,
    chars: countChars(text),
    newlines: countNewlines(text),
    height: 0,
  };
}

const EMPTY = leaf("");

function branch(left: RopeNode, right: RopeNode): Branch {
  return {
    kind: "branch",
    left,
    right,
    chars: left.chars + right.chars,
    newlines: left.newlines + right.newlines,
    height: Math.max(left.height, right.height) + 1,
  };
}

function joinRight(left: Branch, right: RopeNode): RopeNode {
  const t = join(left.right, right);
  if (t.height <= left.left.height + 1 || t.kind === "leaf") {
    return branch(left.left, t);
  }
  if (t.left.height <= t.right.height || t.left.kind === "leaf") {
    return branch(branch(left.left, t.left), t.right);
  }
  const mid = t.left;
  return branch(branch(left.left, mid.left), branch(mid.right, t.right));
}

function joinLeft(left: RopeNode, right: Branch): RopeNode {
  const t = join(left, right.left);
  if (t.height <= right.right.height + 1 || t.kind === "leaf") {
    return branch(t, right.right);
  }
  if (t.right.height <= t.left.height || t.right.kind === "leaf") {
    return branch(t.left, branch(t.right, right.right));
  }
  const mid = t.right;
  return branch(branch(t.left, mid.left), branch(mid.right, right.right));
}

function join(left: RopeNode, right: RopeNode): RopeNode {
  if (left.chars === 0) return right;
  if (right.chars === 0) return left;
  if (
    left.kind === "leaf" &&
    right.kind === "leaf" &&
    left.chars + right.chars <= MAX_LEAF
  ) {
    return leaf(left.text + right.text);
  }
  if (left.height > right.height + 1 && left.kind === "branch") {
    return joinRight(left, right);
  }
  if (right.height > left.height + 1 && right.kind === "branch") {
    return joinLeft(left, right);
  }
  return branch(left, right);
}

function split(node: RopeNode, idx: number): [RopeNode, RopeNode] {
  if (idx <= 0) return [EMPTY, node];
  if (idx >= node.chars) return [node, EMPTY];
  if (node.kind === "leaf") {
    const at = codeUnitOffset(node.text, idx);
    return [leaf(node.text.slice(0, at)), leaf(node.text.slice(at))];
  }
  if (idx <= node.left.chars) {
    const [a, b] = split(node.left, idx);
    return [a, join(b, node.right)];
  }
  const [a, b] = split(node.right, idx - node.left.chars);
  return [join(node.left, a), b];
}

function build(leaves: Leaf[], from: number, to: number): RopeNode {
  if (to - from === 0) return EMPTY;
  if (to - from === 1) return leaves[from] ?? EMPTY;
  const mid = (from + to) >>> 1;
  return branch(build(leaves, from, mid), build(leaves, mid, to));
}

function fromString(text: string): RopeNode {
  if (text.length === 0) return EMPTY;
  const leaves: Leaf[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + MAX_LEAF, text.length);
    // never cut a surrogate pair in half
    const last = text.charCodeAt(end - 1);
    if (end < text.length && last >= 0xd800 && last <= 0xdbff) end++;
    leaves.push(leaf(text.slice(start, end)));
    start = end;
  }
  return build(leaves, 0, leaves.length);
}

function newlinesBefore(node: RopeNode, idx: number): number {
  let current = node;
  let lines = 0;
  let offset = idx;
  while (current.kind === "branch") {
    if (offset <= current.left.chars) {
      current = current.left;
    } else {
      lines += current.left.newlines;
      offset -= current.left.chars;
      current = current.right;
    }
  }
  const prefix = current.text.slice(0, codeUnitOffset(current.text, offset));
  return lines + countNewlines(prefix);
}

/** Char index just past the `n`-th newline (n >= 1, n <= node.newlines). */
function charAfterNewline(node: RopeNode, n: number): number {
  let current = node;
  let chars = 0;
  let remaining = n;
  while (current.kind === "branch") {
    if (remaining <= current.left.newlines) {
      current = current.left;
    } else {
      remaining -= current.left.newlines;
      chars += current.left.chars;
      current = current.right;
    }
  }
  let at = -1;
  for (let i = 0; i < remaining; i++) {
    at = current.text.indexOf("\n", at + 1);
  }
  return chars + countChars(current.text.slice(0, at + 1));
}

function collect(node: RopeNode, start: number, end: number, out: string[]) {
  if (end <= 0 || start >= node.chars || start >= end) return;
  if (node.kind === "leaf") {
    const from = codeUnitOffset(node.text, Math.max(0, start));
    const to = codeUnitOffset(node.text, Math.min(node.chars, end));
    out.push(node.text.slice(from, to));
    return;
  }
  collect(node.left, start, end, out);
  collect(node.right, start - node.left.chars, end - node.left.chars, out);
}

export class Rope {
  private root: RopeNode;

  constructor(text = "") {
    this.root = fromString(text);
  }

  lenChars(): number {
    return this.root.chars;
  }

  /** Lines are separated by "\n"; a trailing newline opens an empty last line. */
  lenLines(): number {
    return this.root.newlines + 1;
  }

  insert(idx: number, text: string) {
    this.checkIndex(idx);
    if (text.length === 0) return;
    const [left, right] = split(this.root, idx);
    this.root = join(join(left, fromString(text)), right);
  }

  insertChar(idx: number, ch: string) {
    this.insert(idx, ch);
  }

  remove(start: number, end: number) {
    this.checkIndex(start);
    this.checkIndex(end);
    if (start > end) {
      throw new RangeError(`Invalid range ${start}..${end}`);
    }
    if (start === end) return;
    const [left, rest] = split(this.root, start);
    const [, right] = split(rest, end - start);
    this.root = join(left, right);
  }

  charToLine(idx: number): number {
    this.checkIndex(idx);
    return newlinesBefore(this.root, idx);
  }

  /** Accepts `lenLines()` itself, which maps to `lenChars()`. */
  lineToChar(line: number): number {
    if (!Number.isInteger(line) || line < 0 || line > this.lenLines()) {
      throw new RangeError(`Line ${line} out of bounds (${this.lenLines()} lines)`);
    }
    if (line === 0) return 0;
    if (line > this.root.newlines) return this.root.chars;
    return charAfterNewline(this.root, line);
  }

  /** Line contents including the terminating "\n" when present. */
  line(i: number): string {
    if (!Number.isInteger(i) || i < 0 || i >= this.lenLines()) {
      throw new RangeError(`Line ${i} out of bounds (${this.lenLines()} lines)`);
    }
    return this.slice(this.lineToChar(i), this.lineToChar(i + 1));
  }

  slice(start: number, end: number): string {
    this.checkIndex(start);
    this.checkIndex(end);
    const out: string[] = [];
    collect(this.root, start, end, out);
    return out.join("");
  }

  toString(): string {
    return this.slice(0, this.lenChars());
  }

  /** Tree height; exposed for balance checks. */
  depth(): number {
    return this.root.height;
  }

  private checkIndex(idx: number) {
    if (!Number.isInteger(idx) || idx < 0 || idx > this.root.chars) {
      throw new RangeError(`Char index ${idx} out of bounds (${this.root.chars} chars)`);
    }
  }
}
