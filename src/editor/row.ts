import { isWhitespace, stripLineTerminator } from "./chars.js";
import {
  CLOSED_STATE,
  highlightLine,
  sameLexState,
  type HighlightToken,
  type LexState,
} from "./highlight.js";

export type RowId = number;

function sameTags(a: readonly HighlightToken[], b: readonly HighlightToken[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function hasLineTerminator(text: string): boolean {
  return text.includes("\n") || text.includes("\r");
}

/**
 * One line of text with its highlight tags and the lexical state it exits in.
 *
 * Rows are created by a Document, which hands in `onExitChanged` so that an
 * edit changing the exit state can re-highlight the rows below it.
 */
export class Row {
  /** Set on mutation or highlight change, cleared by the renderer. */
  dirty = true;

  private chars: string;
  private highlight: HighlightToken[] = [];
  private entry: LexState = CLOSED_STATE;
  private exit: LexState = CLOSED_STATE;

  constructor(
    readonly id: RowId,
    text = "",
    private readonly onExitChanged?: (row: Row) => void,
  ) {
    this.chars = stripLineTerminator(text);
    this.applyHighlight(CLOSED_STATE);
  }

  get text(): string {
    return this.chars;
  }

  get length(): number {
    return this.chars.length;
  }

  get tags(): readonly HighlightToken[] {
    return this.highlight;
  }

  get entryState(): LexState {
    return this.entry;
  }

  get exitState(): LexState {
    return this.exit;
  }

  replace(text: string): void {
    this.chars = stripLineTerminator(text);
    this.changed();
  }

  clear(): void {
    this.replace("");
  }

  insert(index: number, chars: string): boolean {
    if (!this.inBounds(index) || hasLineTerminator(chars)) return false;
    if (chars.length === 0) return true;
    this.chars = this.chars.slice(0, index) + chars + this.chars.slice(index);
    this.changed();
    return true;
  }

  append(chars: string): boolean {
    return this.insert(this.chars.length, chars);
  }

  /** Returns the number of characters removed. */
  remove(index: number, count = 1): number {
    if (!this.inBounds(index) || !Number.isInteger(count) || count <= 0) return 0;
    const removed = Math.min(count, this.chars.length - index);
    if (removed === 0) return 0;
    this.chars = this.chars.slice(0, index) + this.chars.slice(index + removed);
    this.changed();
    return removed;
  }

  trim(from: number): boolean {
    if (!this.inBounds(from)) return false;
    if (from === this.chars.length) return true;
    this.chars = this.chars.slice(0, from);
    this.changed();
    return true;
  }

  offsetToFirstNonblank(from = 0): number {
    if (!this.inBounds(from) || from === this.chars.length) return 0;
    let i = from;
    while (i < this.chars.length && isWhitespace(this.chars.charAt(i))) i++;
    return i - from;
  }

  /** Offset to the start of the next word, or to the end of the line. */
  offsetToNextWord(from: number): number {
    if (!this.inBounds(from) || from === this.chars.length) return 0;
    let i = from;
    while (i < this.chars.length && !isWhitespace(this.chars.charAt(i))) i++;
    while (i < this.chars.length && isWhitespace(this.chars.charAt(i))) i++;
    return i - from;
  }

  /** Negative offset to the start of the previous word; 0 when there is none. */
  offsetToPrevWord(from: number): number {
    if (!this.inBounds(from)) return 0;
    let i = from;
    while (i > 0 && isWhitespace(this.chars.charAt(i - 1))) i--;
    if (i === 0) return 0;
    while (i > 0 && !isWhitespace(this.chars.charAt(i - 1))) i--;
    return i - from;
  }

  /**
   * Re-tags the row from the given entry state. Returns true when the exit
   * state changed, which means the next row has to be highlighted again.
   */
  applyHighlight(entry: LexState): boolean {
    const { tags, exit } = highlightLine(this.chars, entry);
    if (!sameTags(tags, this.highlight)) this.dirty = true;
    this.highlight = tags;
    this.entry = entry;
    const exitChanged = !sameLexState(exit, this.exit);
    this.exit = exit;
    return exitChanged;
  }

  private changed(): void {
    this.dirty = true;
    if (this.applyHighlight(this.entry)) this.onExitChanged?.(this);
  }

  private inBounds(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index <= this.chars.length;
  }
}
