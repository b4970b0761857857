import { CLOSED_STATE, sameLexState } from "./highlight.js";
import { Row, type RowId } from "./row.js";

type RowLink = {
  row: Row;
  prev: RowId | null;
  next: RowId | null;
};

/** Which neighbour became current after removing the current row. */
export type RowShift = -1 | 0 | 1;

/**
 * Ordered list of rows kept as an arena of links addressed by row id.
 *
 * Once initialized (fromLines / blank) a document always holds at least one
 * row; removing the last remaining row clears it instead.
 */
export class Document {
  path: string | null;

  private readonly links = new Map<RowId, RowLink>();
  private head: RowId | null = null;
  private tail: RowId | null = null;
  private current: RowId | null = null;
  private count = 0;
  private nextId: RowId = 1;

  constructor(path: string | null = null) {
    this.path = path;
  }

  static fromLines(lines: Iterable<string>, path: string | null = null): Document {
    const doc = new Document(path);
    for (const line of lines) doc.appendRow(line);
    if (doc.rowCount === 0) doc.appendRow("");
    return doc;
  }

  static blank(path: string | null = null): Document {
    return Document.fromLines([], path);
  }

  get rowCount(): number {
    return this.count;
  }

  get currentRow(): Row | null {
    return this.rowOf(this.current);
  }

  get currentIndex(): number {
    return this.current === null ? -1 : this.indexOfId(this.current);
  }

  firstRow(): Row | null {
    return this.rowOf(this.head);
  }

  lastRow(): Row | null {
    return this.rowOf(this.tail);
  }

  /** O(n): walks from the head. */
  rowAt(index: number): Row | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.count) return null;
    let id = this.head;
    for (let i = 0; i < index && id !== null; i++) {
      id = this.links.get(id)?.next ?? null;
    }
    return this.rowOf(id);
  }

  indexOf(row: Row): number {
    return this.has(row) ? this.indexOfId(row.id) : -1;
  }

  has(row: Row): boolean {
    return this.links.get(row.id)?.row === row;
  }

  next(row: Row): Row | null {
    return this.has(row) ? this.rowOf(this.links.get(row.id)?.next ?? null) : null;
  }

  prev(row: Row): Row | null {
    return this.has(row) ? this.rowOf(this.links.get(row.id)?.prev ?? null) : null;
  }

  *rows(from: Row | null = this.firstRow()): Generator<Row> {
    let id = from !== null && this.has(from) ? from.id : null;
    while (id !== null) {
      const link = this.links.get(id);
      if (!link) return;
      yield link.row;
      id = link.next;
    }
  }

  lines(): string[] {
    return Array.from(this.rows(), (row) => row.text);
  }

  setCurrent(row: Row): boolean {
    if (!this.has(row)) return false;
    this.current = row.id;
    return true;
  }

  /** Moves the current row by up to `delta` rows; returns how far it moved. */
  moveCurrent(delta: number): number {
    if (!Number.isInteger(delta)) return 0;
    let moved = 0;
    while (this.current !== null && moved !== delta) {
      const link = this.links.get(this.current);
      const target = delta > 0 ? link?.next : link?.prev;
      if (target === undefined || target === null) break;
      this.current = target;
      moved += delta > 0 ? 1 : -1;
    }
    return moved;
  }

  appendRow(text: string): Row {
    const row = this.createRow(text);
    this.link(row, this.tail, null);
    this.cascadeFrom(row.id);
    return row;
  }

  /** Inserts an empty row after `anchor`, or at the head when `anchor` is null. */
  insertRowAfter(anchor: Row | null): Row | null {
    if (anchor === null) return this.insertAtHead();
    const link = this.links.get(anchor.id);
    if (!link || link.row !== anchor) return null;
    const row = this.createRow("");
    this.link(row, anchor.id, link.next);
    this.cascadeFrom(row.id);
    return row;
  }

  /** Inserts an empty row before `anchor`, or at the head when `anchor` is null. */
  insertRowBefore(anchor: Row | null): Row | null {
    if (anchor === null) return this.insertAtHead();
    const link = this.links.get(anchor.id);
    if (!link || link.row !== anchor) return null;
    const row = this.createRow("");
    this.link(row, link.prev, anchor.id);
    this.cascadeFrom(row.id);
    return row;
  }

  /** Returns true when a row was unlinked; a sole row is cleared instead. */
  removeRow(row: Row): boolean {
    if (!this.has(row)) return false;
    if (this.count === 1) {
      row.clear();
      return false;
    }
    if (row.id === this.current) {
      this.removeCurrentRow();
      return true;
    }
    this.unlink(row.id);
    return true;
  }

  removeCurrentRow(): RowShift {
    if (this.current === null) return 0;
    const link = this.links.get(this.current);
    if (!link) return 0;
    if (this.count === 1) {
      link.row.clear();
      return 0;
    }
    const removed = this.current;
    let shift: RowShift;
    if (link.next !== null) {
      this.current = link.next;
      shift = 1;
    } else {
      this.current = link.prev;
      shift = -1;
    }
    this.unlink(removed);
    return shift;
  }

  /** Moves the text from `column` onwards into a new row after the current one. */
  splitCurrentRow(column: number): Row | null {
    const row = this.currentRow;
    if (row === null || !Number.isInteger(column) || column < 0 || column > row.length) {
      return null;
    }
    const suffix = row.text.slice(column);
    row.trim(column);
    const link = this.links.get(row.id);
    const created = this.createRow(suffix);
    this.link(created, row.id, link?.next ?? null);
    this.cascadeFrom(created.id);
    return created;
  }

  /**
   * Appends the current row to its predecessor and removes it. The
   * predecessor becomes current. Returns the number of characters appended.
   */
  joinWithPrevious(): number {
    const row = this.currentRow;
    if (row === null) return 0;
    const previous = this.prev(row);
    if (previous === null) return 0;
    const appended = row.length;
    previous.append(row.text);
    this.current = previous.id;
    this.unlink(row.id);
    return appended;
  }

  private insertAtHead(): Row {
    const row = this.createRow("");
    this.link(row, null, this.head);
    this.cascadeFrom(row.id);
    return row;
  }

  private createRow(text: string): Row {
    const id = this.nextId++;
    return new Row(id, text, (changed) => this.cascadeAfter(changed.id));
  }

  private link(row: Row, prev: RowId | null, next: RowId | null): void {
    this.links.set(row.id, { row, prev, next });
    const prevLink = prev === null ? undefined : this.links.get(prev);
    const nextLink = next === null ? undefined : this.links.get(next);
    if (prevLink) prevLink.next = row.id;
    else this.head = row.id;
    if (nextLink) nextLink.prev = row.id;
    else this.tail = row.id;
    this.count++;
    if (this.current === null) this.current = row.id;
  }

  private unlink(id: RowId): void {
    const link = this.links.get(id);
    if (!link) return;
    const prevLink = link.prev === null ? undefined : this.links.get(link.prev);
    const nextLink = link.next === null ? undefined : this.links.get(link.next);
    if (prevLink) prevLink.next = link.next;
    else this.head = link.next;
    if (nextLink) nextLink.prev = link.prev;
    else this.tail = link.prev;
    this.links.delete(id);
    this.count--;
    if (this.current === id) this.current = link.next ?? link.prev;
    if (link.next !== null) this.cascadeFrom(link.next);
  }

  private cascadeAfter(id: RowId): void {
    const next = this.links.get(id)?.next ?? null;
    if (next !== null) this.cascadeFrom(next);
  }

  // Re-highlights from `id` downwards until a row's exit state matches what
  // its successor was last highlighted with.
  private cascadeFrom(id: RowId): void {
    let link = this.links.get(id);
    while (link) {
      const prevLink = link.prev === null ? undefined : this.links.get(link.prev);
      link.row.applyHighlight(prevLink ? prevLink.row.exitState : CLOSED_STATE);
      const nextLink = link.next === null ? undefined : this.links.get(link.next);
      if (!nextLink || sameLexState(nextLink.row.entryState, link.row.exitState)) return;
      link = nextLink;
    }
  }

  private indexOfId(id: RowId): number {
    let index = 0;
    for (let cursor = this.head; cursor !== null; index++) {
      if (cursor === id) return index;
      cursor = this.links.get(cursor)?.next ?? null;
    }
    return -1;
  }

  private rowOf(id: RowId | null): Row | null {
    if (id === null) return null;
    return this.links.get(id)?.row ?? null;
  }
}
