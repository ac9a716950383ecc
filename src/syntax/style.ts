import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { ConfigError, getErrorMessage } from "../errors.js";

export const STYLES = [
  "normal",
  "keyword",
  "function",
  "type",
  "string",
  "number",
  "comment",
  "variable",
  "constant",
  "operator",
  "error",
  "selection",
] as const;

export type Style = (typeof STYLES)[number];

export const DEFAULT_CAPTURE_STYLES_FILE = fileURLToPath(
  new URL("../../queries/capture-styles.json", import.meta.url),
);

const CaptureTableSchema = z.record(z.string(), z.enum(STYLES));

/**
 * Capture-name → Style lookup. A name resolves exactly, then by its leading
 * dot-segment ("function.method" → "function"), then to "normal".
 */
export class CaptureStyles {
  private readonly table: Map<string, Style>;

  constructor(entries: Record<string, Style>) {
    this.table = new Map(Object.entries(entries));
  }

  static fromFile(file = DEFAULT_CAPTURE_STYLES_FILE): CaptureStyles {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, "utf8"));
    } catch (error) {
      throw new ConfigError(`Could not read capture styles ${file}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
    const parsed = CaptureTableSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid capture styles in ${file}: ${parsed.error.issues[0]?.message ?? "unknown"}`,
      );
    }
    return new CaptureStyles(parsed.data);
  }

  resolve(capture: string): Style {
    const exact = this.table.get(capture);
    if (exact) return exact;
    const head = capture.split(".")[0] ?? capture;
    return this.table.get(head) ?? "normal";
  }
}
