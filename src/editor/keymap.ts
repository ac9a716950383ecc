import type { MenuKind } from "./state.js";

export type CommandId =
  | "goto.start"
  | "goto.end"
  | "goto.lineStart"
  | "goto.lineEnd"
  | "file.open"
  | "file.save"
  | "file.saveAs"
  | "file.new"
  | "ai.openai"
  | "ai.anthropic"
  | "ai.ollama";

export type Command = {
  id: CommandId;
  title: string;
  run: () => void;
};

export type KeyNode =
  | { kind: "group"; title: string; children: Record<string, KeyNode> }
  | { kind: "cmd"; title: string; commandId: CommandId };

export function group(
  title: string,
  children: Record<string, KeyNode>,
): KeyNode {
  return { kind: "group", title, children };
}
export function cmd(title: string, commandId: CommandId): KeyNode {
  return { kind: "cmd", title, commandId };
}

// One table for every one-shot menu; Normal and Select share it.
export const menus: Record<MenuKind, KeyNode> = {
  goto: group("Go to", {
    g: cmd("Document start", "goto.start"),
    e: cmd("Document end", "goto.end"),
    h: cmd("Line start", "goto.lineStart"),
    l: cmd("Line end", "goto.lineEnd"),
  }),
  file: group("File", {
    o: cmd("Open file", "file.open"),
    s: cmd("Save", "file.save"),
    w: cmd("Save as", "file.saveAs"),
    n: cmd("New document", "file.new"),
  }),
  ai: group("AI", {
    o: cmd("Send to OpenAI", "ai.openai"),
    a: cmd("Send to Anthropic", "ai.anthropic"),
    l: cmd("Send to Ollama", "ai.ollama"),
  }),
};

/** Keys that open a menu from Normal or Select mode. */
export const menuTriggers: Record<string, MenuKind> = {
  g: "goto",
  space: "file",
  '"': "ai",
};

export function getHints(
  node: KeyNode,
): Array<{ key: string; title: string; kind: "group" | "cmd" }> {
  if (node.kind !== "group") return [];
  return Object.entries(node.children).map(([key, child]) => ({
    key,
    title: child.title,
    kind: child.kind,
  }));
}

export function stepLeader(node: KeyNode, key: string): KeyNode | null {
  if (node.kind !== "group") return null;
  return node.children[key] ?? null;
}
