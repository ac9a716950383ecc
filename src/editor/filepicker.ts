import { fuzzyFind } from "./fuzzy.js";

/**
 * State behind the load and save-as popups. Load keeps a file list, a fuzzy
 * filter and a clamped selection index; save keeps a single-line input with
 * its own cursor.
 */
export class FilePicker {
  private files: string[] = [];
  private visible: string[] = [];
  private selected = 0;
  filter = "";

  input = "";
  cursorPos = 0;

  openLoad(files: string[]) {
    this.reset();
    this.files = [...files].sort((a, b) => a.localeCompare(b));
    this.visible = this.files;
  }

  openSave(initial = "") {
    this.reset();
    this.input = initial;
    this.cursorPos = [...initial].length;
  }

  reset() {
    this.files = [];
    this.visible = [];
    this.selected = 0;
    this.filter = "";
    this.input = "";
    this.cursorPos = 0;
  }

  // --- load ---

  entries(): readonly string[] {
    return this.visible;
  }

  selectedIndex() {
    return this.selected;
  }

  selectedFile(): string | null {
    return this.visible[this.selected] ?? null;
  }

  moveUp() {
    if (this.selected > 0) this.selected--;
  }

  moveDown() {
    if (this.selected + 1 < this.visible.length) this.selected++;
  }

  typeFilter(ch: string) {
    this.filter += ch;
    this.applyFilter();
  }

  eraseFilter() {
    if (!this.filter) return;
    this.filter = [...this.filter].slice(0, -1).join("");
    this.applyFilter();
  }

  private applyFilter() {
    this.visible = fuzzyFind(this.filter, this.files, (f) => f).map((h) => h.item);
    this.selected = 0;
  }

  // --- save ---

  /** Trimmed filename typed so far. */
  value() {
    return this.input.trim();
  }

  insertChar(ch: string) {
    const chars = [...this.input];
    chars.splice(this.cursorPos, 0, ch);
    this.input = chars.join("");
    this.cursorPos++;
  }

  deletePreviousChar() {
    if (this.cursorPos === 0) return;
    const chars = [...this.input];
    chars.splice(this.cursorPos - 1, 1);
    this.input = chars.join("");
    this.cursorPos--;
  }

  deleteCurrentChar() {
    const chars = [...this.input];
    if (this.cursorPos >= chars.length) return;
    chars.splice(this.cursorPos, 1);
    this.input = chars.join("");
  }

  cursorLeft() {
    if (this.cursorPos > 0) this.cursorPos--;
  }

  cursorRight() {
    if (this.cursorPos < [...this.input].length) this.cursorPos++;
  }

  cursorHome() {
    this.cursorPos = 0;
  }

  cursorEnd() {
    this.cursorPos = [...this.input].length;
  }
}
