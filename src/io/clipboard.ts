import clipboardy from "clipboardy";

import { IoError, getErrorMessage } from "../errors.js";

export interface Clipboard {
  set(text: string): void;
  get(): string;
}

export class SystemClipboard implements Clipboard {
  set(text: string) {
    try {
      clipboardy.writeSync(text);
    } catch (error) {
      throw new IoError(`Clipboard write failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  get(): string {
    try {
      return clipboardy.readSync();
    } catch (error) {
      throw new IoError(`Clipboard read failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
