import path from "node:path";

import type { Settings } from "../config/settings.js";
import { debugLog } from "../debug.js";
import type { ParsedCommand } from "./command.js";
import {
  dispatch,
  finishCommand,
  pendingHints,
  pendingKeys,
  type Action,
} from "./dispatcher.js";
import { Document } from "./document.js";
import type { FileStore } from "./file-store.js";
import {
  initialDispatchState,
  type DispatchState,
  type Key,
  type Mode,
} from "./state.js";
import { DEFAULT_LAYOUT, Viewport, type VisibleRow } from "./viewport.js";

export type ScreenSize = { width: number; height: number };

export type FrameRow = VisibleRow & { gutter: string };

/** Everything the renderer needs for one paint. */
export type Frame = {
  title: string;
  rows: FrameRow[];
  visibleHeight: number;
  topBarHeight: number;
  firstVisibleCol: number;
  textWidth: number;
  status: string;
  message: string;
  pending: string;
  hints: Array<{ key: string; title: string; kind: "group" | "cmd" }>;
  cursor: { row: number; col: number };
};

const MODE_LABELS: Record<Mode, string> = {
  NORMAL: "NORMAL",
  INSERT: "INSERT",
  COMMAND_COLLECT: "COMMAND",
  COMMAND_EXECUTE: "COMMAND",
  EXITING: "EXITING",
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

/**
 * One open document plus the cursor and the modal state driving it. Keys go
 * through the dispatcher; the resulting actions are applied here.
 */
export class Editor {
  statusMessage = "";
  modified = false;

  private state: DispatchState = initialDispatchState();
  private doc: Document;
  private readonly view: Viewport;

  constructor(
    doc: Document,
    private readonly store: FileStore,
    private readonly settings: Settings,
    size: ScreenSize = DEFAULT_LAYOUT,
  ) {
    this.doc = doc;
    this.view = new Viewport(doc, { ...DEFAULT_LAYOUT, ...size });
  }

  /**
   * Opens `filePath`, or starts an empty document when it is null. A file
   * that cannot be read becomes a new, empty document with that path.
   */
  static open(
    filePath: string | null,
    store: FileStore,
    settings: Settings,
    size: ScreenSize = DEFAULT_LAYOUT,
  ): Editor {
    if (filePath === null) return new Editor(Document.blank(), store, settings, size);

    let doc: Document;
    let message: string;
    try {
      doc = Document.fromLines(store.loadLines(filePath), filePath);
      message = `"${path.basename(filePath)}" ${doc.rowCount}L`;
    } catch (error) {
      debugLog(`[Editor] Failed to load ${filePath}: ${errorMessage(error)}`);
      doc = Document.blank(filePath);
      message = `New file: ${filePath}`;
    }
    const editor = new Editor(doc, store, settings, size);
    editor.statusMessage = message;
    return editor;
  }

  get document(): Document {
    return this.doc;
  }

  get viewport(): Viewport {
    return this.view;
  }

  get mode(): Mode {
    return this.state.mode;
  }

  get exiting(): boolean {
    return this.state.mode === "EXITING";
  }

  handleKey(key: Key): void {
    if (this.exiting) return;
    const previousMode = this.state.mode;
    const { state, actions } = dispatch(this.state, key);
    this.state = state;
    for (const action of actions) this.apply(action);
    if (this.state.mode !== previousMode) {
      debugLog(`[Editor] ${previousMode} -> ${this.state.mode}`);
    }
  }

  resize(width: number, height: number): void {
    this.view.resize(width, height, this.state.mode === "INSERT");
  }

  frame(): Frame {
    const view = this.view;
    const collecting = this.state.mode === "COMMAND_COLLECT";
    return {
      title: this.doc.path ?? "[No File]",
      rows: view.visibleRows().map((visible) => ({
        ...visible,
        gutter: view.gutterText(visible.lineNumber),
      })),
      visibleHeight: view.visibleHeight,
      topBarHeight: DEFAULT_LAYOUT.topBarHeight,
      firstVisibleCol: view.firstVisibleCol,
      textWidth: view.textWidth,
      status: this.statusLine(),
      message: collecting ? ":" + this.state.commandLine.text : this.statusMessage,
      pending: pendingKeys(this.state),
      hints: this.settings.get("editor.keyHints") ? pendingHints(this.state) : [],
      cursor: collecting
        ? { row: view.height - 1, col: 1 + this.state.commandLine.cursor }
        : { row: view.screenRow, col: view.screenCol },
    };
  }

  statusLine(): string {
    const file = this.doc.path ? path.basename(this.doc.path) : "[No File]";
    const dirty = this.modified ? "*" : "";
    const pos = `${this.view.line + 1}:${this.view.column + 1}`;
    return ` ${MODE_LABELS[this.state.mode]}  ${file}${dirty}  ${pos}  ${this.doc.rowCount}L`;
  }

  private apply(action: Action): void {
    const view = this.view;
    switch (action.type) {
      case "cursor.left":
        view.stickyEndOfLine = false;
        view.moveHorizontal(-1);
        break;
      case "cursor.right":
        view.stickyEndOfLine = false;
        view.moveHorizontal(1);
        break;
      case "cursor.down":
        view.moveVertical(1);
        break;
      case "cursor.up":
        view.moveVertical(-1);
        break;
      case "cursor.lineHome":
        view.stickyEndOfLine = false;
        view.moveToColumn(0);
        break;
      case "cursor.firstNonblank":
        view.stickyEndOfLine = false;
        view.moveToFirstNonblank();
        break;
      case "cursor.lineEnd":
        view.stickyEndOfLine = true;
        view.moveToLineEnd();
        break;
      case "cursor.wordNext": {
        view.stickyEndOfLine = false;
        const row = this.doc.currentRow;
        if (row) view.moveHorizontal(row.offsetToNextWord(view.column));
        break;
      }
      case "cursor.wordPrev": {
        view.stickyEndOfLine = false;
        const row = this.doc.currentRow;
        if (row) view.moveHorizontal(row.offsetToPrevWord(view.column));
        break;
      }
      case "cursor.top":
        view.stickyEndOfLine = false;
        view.jumpToTop();
        break;
      case "cursor.bottom":
        view.stickyEndOfLine = false;
        view.jumpToBottom();
        break;
      case "edit.deleteChar": {
        const row = this.doc.currentRow;
        if (row && row.remove(view.column, 1) > 0) {
          this.modified = true;
          view.snapIntoCurrentRow();
        }
        break;
      }
      case "edit.deleteLine":
        this.deleteLine();
        break;
      case "edit.deleteWord": {
        const row = this.doc.currentRow;
        if (!row) break;
        const offset = row.offsetToNextWord(view.column);
        if (offset > 0 && row.remove(view.column, offset) > 0) this.modified = true;
        view.snapIntoCurrentRow();
        break;
      }
      case "mode.insert":
        view.stickyEndOfLine = false;
        break;
      case "mode.append":
        view.stickyEndOfLine = false;
        view.moveHorizontal(1, true);
        break;
      case "message.clear":
        this.statusMessage = "";
        break;
      case "insert.char":
        this.insertText(action.ch);
        break;
      case "insert.tab":
        this.insertText(" ".repeat(this.settings.get("editor.tabSize")));
        break;
      case "insert.newline":
        this.newline();
        break;
      case "insert.backspace":
        this.backspace();
        break;
      case "insert.left":
        view.moveHorizontal(-1, true);
        break;
      case "insert.right":
        view.moveHorizontal(1, true);
        break;
      case "insert.up":
        view.moveVertical(-1, true);
        break;
      case "insert.down":
        view.moveVertical(1, true);
        break;
      case "insert.leave":
        view.snapIntoCurrentRow();
        break;
      case "command.begin":
        this.statusMessage = "";
        break;
      case "command.cancel":
        break;
      case "command.run":
        this.runCommand(action.command, action.text);
        break;
    }
  }

  private insertText(text: string): void {
    const row = this.doc.currentRow;
    if (!row || !row.insert(this.view.column, text)) return;
    this.modified = true;
    this.view.moveHorizontal(text.length, true);
  }

  private deleteLine(): void {
    if (this.doc.rowCount <= 1) {
      const row = this.doc.currentRow;
      if (row && row.length > 0) {
        row.clear();
        this.modified = true;
      }
    } else {
      const shift = this.doc.removeCurrentRow();
      debugLog(`[Editor] removed line, current row moved ${shift}`);
      this.modified = true;
    }
    this.view.followCurrentRow();
    this.view.markWindowDirty();
    this.view.snapIntoCurrentRow();
  }

  private newline(): void {
    const row = this.doc.currentRow;
    if (!row) return;
    const column = Math.min(this.view.column, row.length);
    if (column === 0) {
      this.doc.insertRowBefore(row);
    } else {
      this.doc.splitCurrentRow(column);
      this.doc.moveCurrent(1);
    }
    this.modified = true;
    this.view.followCurrentRow();
    this.view.markWindowDirty();
    this.view.moveToColumn(0, true);
  }

  private backspace(): void {
    const row = this.doc.currentRow;
    if (!row) return;
    const column = this.view.column;
    if (column > 0) {
      if (row.remove(column - 1, 1) > 0) this.modified = true;
      this.view.moveHorizontal(-1, true);
      return;
    }
    const previous = this.doc.prev(row);
    if (previous === null) return;
    const joinPoint = previous.length;
    this.doc.joinWithPrevious();
    this.modified = true;
    this.view.followCurrentRow();
    this.view.markWindowDirty();
    this.view.moveToColumn(joinPoint, true);
  }

  private runCommand(command: ParsedCommand, text: string): void {
    let exit = false;
    switch (command.kind) {
      case "quit":
        exit = true;
        break;
      case "write":
        exit = this.write(command.path) && command.quit;
        break;
      case "invalid":
        this.statusMessage = `Invalid command syntax: '${text}'`;
        break;
      case "unknown":
        this.statusMessage = `Command not found: '${text}'`;
        break;
    }
    this.state = finishCommand(this.state, exit);
  }

  private write(target: string | null): boolean {
    const file = target ?? this.doc.path;
    if (!file) {
      this.statusMessage = "No filename specified for saving";
      return false;
    }
    try {
      this.store.writeLines(file, this.doc.lines());
    } catch (error) {
      debugLog(`[Editor] Failed to save ${file}: ${errorMessage(error)}`);
      this.statusMessage = `Error saving file: ${errorMessage(error)}`;
      return false;
    }
    if (this.doc.path === null) this.doc.path = file;
    if (file === this.doc.path) this.modified = false;
    this.statusMessage = `Saved to ${file}`;
    return true;
  }
}
