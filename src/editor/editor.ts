import { MODEL_LABELS, type ModelId } from "../ai/backend.js";
import type { RequestCoordinator, RequestState } from "../async/coordinator.js";
import { NoSelectionError, getErrorMessage } from "../errors.js";
import type { Clipboard } from "../io/clipboard.js";
import type { FileStore } from "../io/files.js";
import { logger } from "../logger.js";
import { HighlightCache } from "../syntax/cache.js";
import type { LineHighlighter } from "../syntax/highlighter.js";
import { TextBuffer } from "./buffer.js";
import { Cursor } from "./cursor.js";
import { FilePicker } from "./filepicker.js";
import {
  menus,
  menuTriggers,
  stepLeader,
  type Command,
  type CommandId,
} from "./keymap.js";
import type { KeyEvent, MenuState, Message, Mode } from "./state.js";

export type EditorDeps = {
  files: FileStore;
  clipboard: Clipboard;
  coordinator: RequestCoordinator;
  highlighter: LineHighlighter;
};

/** Result of a key press: keep running or leave the main loop. */
export type KeyOutcome = "continue" | "quit";

export class Editor {
  readonly buf = new TextBuffer();
  readonly cursor = new Cursor(this.buf);
  readonly picker = new FilePicker();
  readonly cache: HighlightCache;

  mode: Mode = "normal";
  menu: MenuState = { kind: "inactive" };
  message: Message | null = null;

  private readonly commands: Record<CommandId, Command>;

  constructor(private readonly deps: EditorDeps) {
    this.cache = new HighlightCache(this.buf, deps.highlighter);
    this.commands = this.createCommands();
  }

  // ---------------------------------------------------------------------------
  // Queries used by the renderer
  // ---------------------------------------------------------------------------

  requestState(): RequestState {
    return this.deps.coordinator.state();
  }

  isWaitingForCommand() {
    const kind = this.menu.kind;
    return kind === "goto" || kind === "file" || kind === "ai";
  }

  // ---------------------------------------------------------------------------
  // Documents
  // ---------------------------------------------------------------------------

  openFile(filePath: string) {
    const content = this.deps.files.open(filePath);
    this.replaceDocument(content, filePath);
    logger.info("Opened file", { path: filePath });
  }

  /**
   * Opens `filePath`, or starts a new document under that path when it
   * cannot be read. The failure is shown as a message.
   */
  openOrNew(filePath: string) {
    try {
      this.openFile(filePath);
    } catch (error) {
      this.newDocument(filePath);
      this.fail("Open failed", error);
    }
  }

  /** Starts an empty, unsaved document that will be written to `filePath`. */
  newDocument(filePath: string | null) {
    this.replaceDocument("", filePath);
  }

  private replaceDocument(content: string, filePath: string | null) {
    this.buf.load(content, filePath);
    this.cursor.clearSelection();
    this.cursor.documentStart();
    if (this.mode === "select") this.mode = "normal";
    this.cache.clear();
  }

  save() {
    const filePath = this.buf.filePath;
    if (!filePath) {
      this.notify("No file path. Use Space w to save as.", "error");
      return;
    }
    this.saveAs(filePath);
  }

  private saveAs(filePath: string) {
    try {
      this.deps.files.save(filePath, this.buf.toString());
      if (this.buf.filePath !== filePath) {
        // a new extension can change the highlighting language
        this.buf.filePath = filePath;
        this.cache.clear();
      }
      this.buf.modified = false;
      this.notify(`Saved ${filePath}`);
    } catch (error) {
      this.fail("Save failed", error);
    }
  }

  // ---------------------------------------------------------------------------
  // Render tick
  // ---------------------------------------------------------------------------

  /**
   * Consumes a finished AI response. Successful content lands at the end of
   * the document as it is now, not as it was at submission time.
   */
  checkResponses(): boolean {
    const coordinator = this.deps.coordinator;
    if (!coordinator.needsCheck) return false;
    const response = coordinator.take();
    if (response && response.error === null && response.content.length > 0) {
      const lastLine = this.buf.lenLines() - 1;
      this.buf.append(response.content);
      this.cache.invalidateFrom(lastLine);
      this.cursor.documentEnd();
    }
    return true;
  }

  // ---------------------------------------------------------------------------
  // Key dispatch
  // ---------------------------------------------------------------------------

  handleKey(key: KeyEvent): KeyOutcome {
    if (key.ctrl && key.name === "q") return "quit";
    this.message = null;

    const menu = this.menu;
    if (menu.kind === "picker") {
      if (menu.action === "load") this.loadPickerKey(key);
      else this.savePickerKey(key);
      return "continue";
    }
    if (menu.kind !== "inactive") {
      // the menu consumes exactly one key, matched or not
      this.menu = { kind: "inactive" };
      const node = stepLeader(menus[menu.kind], key.name);
      if (node?.kind === "cmd") this.commands[node.commandId].run();
      return "continue";
    }

    if (key.meta && this.mode !== "select") {
      if (key.name === "a") return this.sendToAi("anthropic");
      if (key.name === "l") return this.sendToAi("openai");
    }

    switch (this.mode) {
      case "normal":
        return this.normalModeKey(key);
      case "insert":
        this.insertModeKey(key);
        return "continue";
      case "select":
        this.selectModeKey(key);
        return "continue";
    }
  }

  private normalModeKey(key: KeyEvent): KeyOutcome {
    if (this.motion(key.name)) return "continue";
    if (this.openMenu(key.name)) return "continue";

    switch (key.name) {
      case "i":
        this.setMode("insert");
        // an empty document still needs a line to type into
        if (this.buf.lenChars() === 0) {
          this.buf.insert(0, "\n");
          this.cache.invalidateFrom(0);
        }
        break;
      case "v":
        this.cursor.startSelection();
        this.setMode("select");
        break;
      case "x":
        this.cursor.selectLine();
        this.setMode("select");
        break;
      case "s":
        this.save();
        break;
      case "p":
        this.paste();
        break;
      case "q":
        return "quit";
    }
    return "continue";
  }

  private insertModeKey(key: KeyEvent) {
    switch (key.name) {
      case "escape":
        this.setMode("normal");
        return;
      case "enter":
        this.insertNewline();
        return;
      case "backspace":
        this.deleteCharBeforeCursor();
        return;
      case "delete":
        this.deleteCharAtCursor();
        return;
      case "tab":
        this.insertText("\t");
        return;
      case "up":
      case "down":
      case "left":
      case "right":
        this.motion(key.name);
        return;
    }
    if (key.ch && !key.ctrl && !key.meta && isPrintable(key.ch)) {
      this.insertText(key.ch);
    }
  }

  private selectModeKey(key: KeyEvent) {
    if (this.motion(key.name)) return;
    if (this.openMenu(key.name)) return;

    switch (key.name) {
      case "escape":
        this.cursor.clearSelection();
        this.setMode("normal");
        break;
      case "x":
        this.cursor.selectLine();
        break;
      case "y":
        this.copySelection();
        break;
      case "d":
        this.deleteSelection();
        break;
    }
  }

  private motion(name: string): boolean {
    const c = this.cursor;
    switch (name) {
      case "h":
      case "left":
        c.left();
        return true;
      case "l":
      case "right":
        c.right();
        return true;
      case "j":
      case "down":
        c.down();
        return true;
      case "k":
      case "up":
        c.up();
        return true;
      case "0":
      case "home":
        c.lineStart();
        return true;
      case "$":
      case "end":
        c.lineEnd();
        return true;
    }
    return false;
  }

  private openMenu(name: string): boolean {
    const kind = menuTriggers[name];
    if (!kind) return false;
    this.menu = { kind };
    return true;
  }

  private setMode(mode: Mode) {
    this.mode = mode;
    if (mode !== "select") this.cursor.clearSelection();
  }

  // ---------------------------------------------------------------------------
  // Pickers
  // ---------------------------------------------------------------------------

  private openLoadPicker() {
    try {
      const { files } = this.deps.files.list(".");
      this.picker.openLoad(files);
      this.menu = { kind: "picker", action: "load" };
    } catch (error) {
      this.fail("Could not list files", error);
    }
  }

  private openSavePicker() {
    this.picker.openSave(this.buf.filePath ?? "");
    this.menu = { kind: "picker", action: "save" };
  }

  private closePicker() {
    this.picker.reset();
    this.menu = { kind: "inactive" };
  }

  private loadPickerKey(key: KeyEvent) {
    const p = this.picker;
    switch (key.name) {
      case "escape":
        this.closePicker();
        return;
      case "up":
        p.moveUp();
        return;
      case "down":
        p.moveDown();
        return;
      case "backspace":
        p.eraseFilter();
        return;
      case "enter": {
        const selected = p.selectedFile();
        this.closePicker();
        if (!selected) {
          this.notify("No file selected", "error");
          return;
        }
        try {
          this.openFile(selected);
          this.notify(`Opened ${selected}`);
        } catch (error) {
          this.fail("Open failed", error);
        }
        return;
      }
    }
    if (key.ch && !key.ctrl && !key.meta && isPrintable(key.ch)) {
      p.typeFilter(key.ch);
    }
  }

  private savePickerKey(key: KeyEvent) {
    const p = this.picker;
    switch (key.name) {
      case "escape":
        this.closePicker();
        return;
      case "left":
        p.cursorLeft();
        return;
      case "right":
        p.cursorRight();
        return;
      case "home":
        p.cursorHome();
        return;
      case "end":
        p.cursorEnd();
        return;
      case "backspace":
        p.deletePreviousChar();
        return;
      case "delete":
        p.deleteCurrentChar();
        return;
      case "enter": {
        const name = p.value();
        if (!name) {
          this.notify("File name is empty", "error");
          return;
        }
        this.closePicker();
        this.saveAs(name);
        return;
      }
    }
    if (key.ch && !key.ctrl && !key.meta && isPrintable(key.ch)) {
      for (const ch of key.ch) p.insertChar(ch);
    }
  }

  // ---------------------------------------------------------------------------
  // Editing
  // ---------------------------------------------------------------------------

  private insertText(text: string) {
    const idx = this.cursor.charIdx();
    this.buf.insert(idx, text);
    this.cache.invalidateLine(this.cursor.row);
    this.cursor.col += [...text].length;
  }

  private insertNewline() {
    const row = this.cursor.row;
    this.buf.insertChar(this.cursor.charIdx(), "\n");
    this.cache.invalidateFrom(row);
    this.cursor.row = row + 1;
    this.cursor.col = 0;
  }

  private deleteCharBeforeCursor() {
    const idx = this.cursor.charIdx();
    if (idx === 0) return;
    const { row, col } = this.cursor;
    if (col > 0) {
      this.buf.remove(idx - 1, idx);
      this.cache.invalidateLine(row);
      this.cursor.col = col - 1;
      return;
    }
    const joinCol = this.buf.lineLength(row - 1);
    this.buf.remove(idx - 1, idx);
    this.cache.invalidateFrom(row - 1);
    this.cursor.row = row - 1;
    this.cursor.col = joinCol;
  }

  private deleteCharAtCursor() {
    const idx = this.cursor.charIdx();
    if (idx >= this.buf.lenChars()) return;
    const { row, col } = this.cursor;
    const joinsLines = col >= this.buf.lineLength(row);
    this.buf.remove(idx, idx + 1);
    if (joinsLines) this.cache.invalidateFrom(row);
    else this.cache.invalidateLine(row);
  }

  private selectedRange() {
    const range = this.cursor.selectionRange();
    if (!range || range.start === range.end) throw new NoSelectionError();
    return range;
  }

  private copySelection() {
    try {
      const { start, end } = this.selectedRange();
      this.deps.clipboard.set(this.buf.slice(start, end));
      this.setMode("normal");
      this.notify(`Copied ${end - start} characters`);
    } catch (error) {
      this.fail("Copy failed", error);
    }
  }

  private deleteSelection() {
    const range = this.cursor.selectionRange();
    if (!range || range.start === range.end) {
      this.fail("Delete failed", new NoSelectionError());
      return;
    }
    const startRow = this.buf.charToLine(range.start);
    this.buf.remove(range.start, range.end);
    this.cursor.moveTo(range.start);
    this.setMode("normal");
    this.cache.invalidateFrom(startRow);
  }

  private paste() {
    let text: string;
    try {
      text = this.deps.clipboard.get().replace(/\r\n/g, "\n");
    } catch (error) {
      this.fail("Paste failed", error);
      return;
    }
    if (!text) return;
    const row = this.cursor.row;
    const idx = this.cursor.charIdx();
    this.buf.insert(idx, text);
    if (text.includes("\n")) this.cache.invalidateFrom(row);
    else this.cache.invalidateLine(row);
    this.cursor.moveTo(idx + [...text].length);
  }

  // ---------------------------------------------------------------------------
  // AI
  // ---------------------------------------------------------------------------

  private sendToAi(model: ModelId): KeyOutcome {
    const result = this.deps.coordinator.submit(this.buf.toString(), model);
    if (result === "busy") {
      this.notify("A request is already in progress", "error");
    } else if (result === "submitted") {
      this.notify(`Sent to ${MODEL_LABELS[model]}`);
    }
    return "continue";
  }

  // ---------------------------------------------------------------------------
  // Commands and messages
  // ---------------------------------------------------------------------------

  private createCommands(): Record<CommandId, Command> {
    const c = this.cursor;
    const make = (id: CommandId, title: string, run: () => void): Command => ({
      id,
      title,
      run,
    });
    return {
      "goto.start": make("goto.start", "Document start", () => c.documentStart()),
      "goto.end": make("goto.end", "Document end", () => c.documentEnd()),
      "goto.lineStart": make("goto.lineStart", "Line start", () => c.lineStart()),
      "goto.lineEnd": make("goto.lineEnd", "Line end", () => c.lineEnd()),
      "file.open": make("file.open", "Open file", () => this.openLoadPicker()),
      "file.save": make("file.save", "Save", () => this.save()),
      "file.saveAs": make("file.saveAs", "Save as", () => this.openSavePicker()),
      "file.new": make("file.new", "New document", () => this.newDocument(null)),
      "ai.openai": make("ai.openai", "Send to OpenAI", () => this.sendToAi("openai")),
      "ai.anthropic": make("ai.anthropic", "Send to Anthropic", () =>
        this.sendToAi("anthropic"),
      ),
      "ai.ollama": make("ai.ollama", "Send to Ollama", () => this.sendToAi("ollama")),
    };
  }

  notify(text: string, level: Message["level"] = "info") {
    this.message = { text, level };
  }

  private fail(context: string, error: unknown) {
    const text = `${context}: ${getErrorMessage(error)}`;
    if (!(error instanceof NoSelectionError)) logger.warn(text);
    this.notify(text, "error");
  }
}

function isPrintable(ch: string) {
  return !/[\x00-\x08\x0a-\x1f\x7f]/.test(ch);
}
