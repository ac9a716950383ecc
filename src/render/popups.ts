import type { FilePicker } from "../editor/filepicker.js";
import { getHints, type KeyNode } from "../editor/keymap.js";
import type { Frame } from "./frame.js";
import type { ScreenPoint } from "./geometry.js";
import { UI } from "./theme.js";

/** Area popups may cover: everything above the two bottom lines. */
export type Area = { width: number; height: number };

const KEY_LABELS: Record<string, string> = { space: "SPC" };

function drawBox(frame: Frame, x: number, y: number, width: number, lines: string[]) {
  lines.forEach((text, i) => {
    const style = i === 0 ? UI.popupTitle : UI.popup;
    frame.fill(x, y + i, width, style);
    frame.write(x + 1, y + i, text, style, width - 2);
  });
}

/** Key hints for an open menu, anchored to the bottom-right corner. */
export function drawMenuHints(frame: Frame, area: Area, node: KeyNode) {
  const hints = getHints(node);
  const lines = [
    node.title,
    ...hints.map((h) => `${KEY_LABELS[h.key] ?? h.key}  ${h.title}`),
  ];
  const width = Math.min(
    area.width,
    Math.max(...lines.map((l) => [...l].length)) + 2,
  );
  const height = Math.min(area.height, lines.length);
  drawBox(
    frame,
    area.width - width,
    area.height - height,
    width,
    lines.slice(0, height),
  );
}

/** Centered file list with a filter line; the selected row is inverted. */
export function drawFilePicker(frame: Frame, area: Area, picker: FilePicker) {
  const width = Math.min(60, area.width - 2);
  const height = Math.max(3, Math.min(area.height - 2, 16));
  if (width < 4 || height > area.height) return;
  const x = Math.floor((area.width - width) / 2);
  const y = Math.floor((area.height - height) / 2);

  drawBox(frame, x, y, width, ["Open file", `> ${picker.filter}`]);

  const entries = picker.entries();
  const listHeight = height - 2;
  const selected = picker.selectedIndex();
  const first = Math.max(0, selected - listHeight + 1);
  for (let i = 0; i < listHeight; i++) {
    const row = y + 2 + i;
    const entry = entries[first + i];
    const style = first + i === selected && entry !== undefined ? UI.popupSelected : UI.popup;
    frame.fill(x, row, width, UI.popup);
    if (entry === undefined) {
      if (i === 0 && entries.length === 0) {
        frame.write(x + 1, row, "(no files)", UI.popup, width - 2);
      }
      continue;
    }
    frame.fill(x, row, width, style);
    frame.write(x + 1, row, entry, style, width - 2);
  }
}

/**
 * Centered single-line filename prompt. Returns where the terminal cursor
 * belongs inside the input, or null when the popup does not fit.
 */
export function drawSaveAs(
  frame: Frame,
  area: Area,
  picker: FilePicker,
): ScreenPoint | null {
  const width = Math.min(50, area.width - 2);
  if (width < 8 || area.height < 3) return null;
  const x = Math.floor((area.width - width) / 2);
  const y = Math.floor((area.height - 3) / 2);
  const prompt = "> ";
  const room = width - 2 - prompt.length;

  // keep the input cursor visible by scrolling the text left
  const chars = [...picker.input];
  const start = Math.max(0, picker.cursorPos - room + 1);
  const shown = chars.slice(start, start + room).join("");

  drawBox(frame, x, y, width, [
    "Save as",
    prompt + shown,
    "Enter save  Esc cancel",
  ]);
  return { x: x + 1 + prompt.length + picker.cursorPos - start, y: y + 1 };
}
