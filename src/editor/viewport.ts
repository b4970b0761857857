import type { Document } from "./document.js";
import type { Row } from "./row.js";

export type ScreenLayout = {
  width: number;
  height: number;
  topBarHeight: number;
  bottomBarHeight: number;
};

export type VisibleRow = {
  row: Row;
  lineNumber: number;
  screenRow: number;
};

export const DEFAULT_LAYOUT: ScreenLayout = {
  width: 80,
  height: 24,
  topBarHeight: 1,
  bottomBarHeight: 2,
};

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function digits(n: number): number {
  return String(Math.max(1, n)).length;
}

/**
 * Keeps the caret's screen position in step with the document's current row
 * and column. Screen coordinates are absolute terminal cells: the text area
 * starts below the top bar and to the right of the line-number gutter.
 */
export class Viewport {
  screenRow: number;
  screenCol: number;
  firstVisibleRow = 0;
  firstVisibleCol = 0;
  gutterWidth: number;
  /** Set by `$`: vertical moves land on the end of the line. */
  stickyEndOfLine = false;

  private doc: Document;
  private layout: ScreenLayout;

  constructor(doc: Document, layout: ScreenLayout = DEFAULT_LAYOUT) {
    this.doc = doc;
    this.layout = { ...layout };
    this.gutterWidth = this.computeGutterWidth();
    this.screenRow = this.layout.topBarHeight;
    this.screenCol = this.gutterWidth;
  }

  get document(): Document {
    return this.doc;
  }

  get visibleHeight(): number {
    return Math.max(1, this.layout.height - this.layout.topBarHeight - this.layout.bottomBarHeight);
  }

  get textWidth(): number {
    return Math.max(1, this.layout.width - this.gutterWidth);
  }

  get width(): number {
    return this.layout.width;
  }

  get height(): number {
    return this.layout.height;
  }

  /** Buffer column under the caret. */
  get column(): number {
    return this.firstVisibleCol + this.screenCol - this.gutterWidth;
  }

  /** Buffer row under the caret. */
  get line(): number {
    return this.firstVisibleRow + this.screenRow - this.layout.topBarHeight;
  }

  resize(width: number, height: number, insertMode = false): void {
    const column = this.column;
    this.layout = { ...this.layout, width, height };
    this.followCurrentRow();
    this.moveToColumn(column, insertMode);
    this.markWindowDirty();
  }

  moveHorizontal(delta: number, insertMode = false): void {
    this.moveToColumn(this.column + delta, insertMode);
  }

  /** Moves the current row by `delta`, scrolling when the caret would leave the window. */
  moveVertical(delta: number, insertMode = false): number {
    const from = this.doc.currentIndex;
    if (from < 0) return 0;
    const target = clamp(from + delta, 0, this.doc.rowCount - 1);
    const moved = this.doc.moveCurrent(target - from);
    this.scrollTo(from + moved);
    this.snapIntoCurrentRow(insertMode);
    return moved;
  }

  snapIntoCurrentRow(insertMode = false): void {
    const limit = this.columnLimit(insertMode);
    if ((this.stickyEndOfLine && !insertMode) || this.column > limit) {
      this.moveToColumn(limit, insertMode);
    }
  }

  jumpToTop(): void {
    const first = this.doc.firstRow();
    if (first === null) return;
    this.doc.setCurrent(first);
    this.scrollTo(0);
    this.moveToColumn(0);
    this.snapIntoCurrentRow();
  }

  jumpToBottom(): void {
    const last = this.doc.lastRow();
    if (last === null) return;
    this.doc.setCurrent(last);
    this.scrollTo(this.doc.rowCount - 1);
    this.snapIntoCurrentRow();
  }

  moveToColumn(column: number, insertMode = false): void {
    this.panTo(clamp(column, 0, this.columnLimit(insertMode)));
  }

  moveToFirstNonblank(): void {
    const row = this.doc.currentRow;
    this.moveToColumn(row ? row.offsetToFirstNonblank(0) : 0);
  }

  moveToLineEnd(insertMode = false): void {
    this.moveToColumn(this.columnLimit(insertMode), insertMode);
  }

  /** Re-places the window around the current row after structural edits. */
  followCurrentRow(): void {
    const index = this.doc.currentIndex;
    this.scrollTo(Math.max(0, index));
  }

  markWindowDirty(): void {
    for (const visible of this.visibleRows()) visible.row.dirty = true;
  }

  visibleRows(): VisibleRow[] {
    const visible: VisibleRow[] = [];
    let row = this.doc.rowAt(this.firstVisibleRow);
    for (let i = 0; row !== null && i < this.visibleHeight; i++) {
      visible.push({
        row,
        lineNumber: this.firstVisibleRow + i + 1,
        screenRow: this.layout.topBarHeight + i,
      });
      row = this.doc.next(row);
    }
    return visible;
  }

  /** Right-aligned line number followed by a separating space. */
  gutterText(lineNumber: number): string {
    return String(lineNumber).padStart(this.gutterWidth - 1, " ") + " ";
  }

  private columnLimit(insertMode: boolean): number {
    const length = this.doc.currentRow?.length ?? 0;
    return insertMode ? length : Math.max(0, length - 1);
  }

  private scrollTo(target: number): void {
    const height = this.visibleHeight;
    let first = this.firstVisibleRow;
    if (target < first) first = target;
    else if (target >= first + height) first = target - height + 1;
    first = clamp(first, 0, Math.max(0, this.doc.rowCount - height));

    const scrolled = first !== this.firstVisibleRow;
    this.firstVisibleRow = first;
    this.screenRow = this.layout.topBarHeight + target - first;
    this.updateGutter();
    if (scrolled) this.markWindowDirty();
  }

  private updateGutter(): void {
    const width = this.computeGutterWidth();
    if (width === this.gutterWidth) return;
    const column = this.column;
    this.gutterWidth = width;
    // a wider gutter narrows the text area; the caret may need to pan
    this.panTo(column);
    this.markWindowDirty();
  }

  // Places the caret on `column`, scrolling horizontally to keep it in the text area.
  private panTo(column: number): void {
    let first = this.firstVisibleCol;
    if (column < first) first = column;
    else if (column > first + this.textWidth - 1) first = column - this.textWidth + 1;
    if (first !== this.firstVisibleCol) {
      this.firstVisibleCol = first;
      this.markWindowDirty();
    }
    this.screenCol = this.gutterWidth + column - first;
  }

  private computeGutterWidth(): number {
    const lastVisible = Math.min(this.doc.rowCount, this.firstVisibleRow + this.visibleHeight);
    return digits(lastVisible) + 1;
  }
}
