export type Mode = "normal" | "insert" | "select";

export type MenuKind = "goto" | "file" | "ai";

export type PickerAction = "load" | "save";

export type MenuState =
  | { kind: "inactive" }
  | { kind: MenuKind }
  | { kind: "picker"; action: PickerAction };

export type KeyEvent = {
  /** Normalized key name: "a", "enter", "escape", "up", "backspace", ... */
  name: string;
  /** Printable text the key produced, if any. */
  ch?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
};

export type Message = { text: string; level: "info" | "error" };

export const MODE_LABELS: Record<Mode, string> = {
  normal: "NORMAL",
  insert: "INSERT",
  select: "SELECT",
};
