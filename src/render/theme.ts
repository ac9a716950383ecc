import type { Style } from "../syntax/style.js";

export type Color = string;

export type CellStyle = { fg: Color; bg: Color };

export const DEFAULT_STYLE: CellStyle = { fg: "default", bg: "default" };

/** Foreground/background per style, in neo-blessed color names. */
export const THEME: Record<Style, CellStyle> = {
  normal: DEFAULT_STYLE,
  keyword: { fg: "magenta", bg: "default" },
  function: { fg: "blue", bg: "default" },
  type: { fg: "yellow", bg: "default" },
  string: { fg: "green", bg: "default" },
  number: { fg: "cyan", bg: "default" },
  comment: { fg: "gray", bg: "default" },
  variable: { fg: "white", bg: "default" },
  constant: { fg: "cyan", bg: "default" },
  operator: { fg: "red", bg: "default" },
  error: { fg: "white", bg: "red" },
  selection: { fg: "black", bg: "white" },
};

export const UI = {
  gutter: { fg: "gray", bg: "default" },
  gutterCurrent: { fg: "yellow", bg: "default" },
  filler: { fg: "blue", bg: "default" },
  control: { fg: "red", bg: "default" },
  status: { fg: "black", bg: "cyan" },
  request: { fg: "default", bg: "default" },
  requestBusy: { fg: "yellow", bg: "default" },
  requestError: { fg: "red", bg: "default" },
  messageError: { fg: "red", bg: "default" },
  popup: { fg: "white", bg: "black" },
  popupTitle: { fg: "cyan", bg: "black" },
  popupSelected: { fg: "black", bg: "white" },
} satisfies Record<string, CellStyle>;
