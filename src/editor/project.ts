import fs from "node:fs";
import path from "node:path";

import { CONFIG_DIR } from "../config.js";

const ROOT_MARKERS = [CONFIG_DIR, ".git"];

/** Nearest ancestor holding a `.quillpad` or `.git` directory. */
export function findProjectRoot(startPath: string): string | null {
  let cur = path.resolve(startPath);
  while (true) {
    for (const marker of ROOT_MARKERS) {
      if (fs.existsSync(path.join(cur, marker))) return cur;
    }

    const parent = path.dirname(cur);
    if (parent === cur) return null;
    cur = parent;
  }
}

export function projectRootOrCwd(cwd: string): string {
  return findProjectRoot(cwd) ?? path.resolve(cwd);
}
