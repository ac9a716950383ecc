import fs from "node:fs";
import path from "node:path";

import { toIoError } from "../errors.js";

export type Listing = { files: string[]; dirs: string[] };

export interface FileStore {
  open(filePath: string): string;
  save(filePath: string, content: string): void;
  list(dir: string): Listing;
}

/** Synchronous filesystem access; failures surface as IoError. */
export class LocalFileStore implements FileStore {
  constructor(private readonly cwd: string = process.cwd()) {}

  open(filePath: string): string {
    const target = path.resolve(this.cwd, filePath);
    try {
      return fs.readFileSync(target, "utf8");
    } catch (error) {
      throw toIoError("Could not open", filePath, error);
    }
  }

  save(filePath: string, content: string) {
    const target = path.resolve(this.cwd, filePath);
    try {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, content, "utf8");
    } catch (error) {
      throw toIoError("Could not save", filePath, error);
    }
  }

  list(dir: string): Listing {
    const target = path.resolve(this.cwd, dir);
    try {
      const files: string[] = [];
      const dirs: string[] = [];
      for (const entry of fs.readdirSync(target, { withFileTypes: true })) {
        if (entry.isFile()) files.push(entry.name);
        else if (entry.isDirectory()) dirs.push(entry.name);
      }
      return { files, dirs };
    } catch (error) {
      throw toIoError("Could not list", dir, error);
    }
  }
}
