import { describe, expect, it } from "vitest";

import { Document } from "../../../src/editor/document.js";
import { Viewport } from "../../../src/editor/viewport.js";

function numbered(count: number): Document {
  return Document.fromLines(Array.from({ length: count }, (_, i) => `line ${i + 1}`));
}

describe("Viewport", () => {
  it("starts at the top-left of the text area", () => {
    const view = new Viewport(Document.fromLines(["a", "b", "c"]));
    expect(view.visibleHeight).toBe(21);
    expect(view.gutterWidth).toBe(2);
    expect(view.screenRow).toBe(1);
    expect(view.screenCol).toBe(2);
    expect(view.line).toBe(0);
    expect(view.column).toBe(0);
  });

  describe("horizontal moves", () => {
    it("stops on the last character in normal mode", () => {
      const view = new Viewport(Document.fromLines(["hello"]));
      view.moveHorizontal(3);
      expect(view.column).toBe(3);
      view.moveHorizontal(10);
      expect(view.column).toBe(4);
    });

    it("may sit past the last character in insert mode", () => {
      const view = new Viewport(Document.fromLines(["hello"]));
      view.moveHorizontal(10, true);
      expect(view.column).toBe(5);
      view.moveHorizontal(-10, true);
      expect(view.column).toBe(0);
    });

    it("pans when the caret leaves the text area", () => {
      const view = new Viewport(Document.fromLines(["abcdefghijklmnop"]), {
        width: 10,
        height: 5,
        topBarHeight: 1,
        bottomBarHeight: 2,
      });
      expect(view.textWidth).toBe(8);
      view.moveToColumn(12);
      expect(view.firstVisibleCol).toBe(5);
      expect(view.screenCol).toBe(9);
      expect(view.column).toBe(12);

      view.moveToColumn(2);
      expect(view.firstVisibleCol).toBe(2);
      expect(view.screenCol).toBe(2);
    });
  });

  describe("vertical moves", () => {
    it("clamps the column into shorter rows", () => {
      const doc = Document.fromLines(["hello", "hi", "world!"]);
      const view = new Viewport(doc);
      view.moveToColumn(4);
      expect(view.moveVertical(1)).toBe(1);
      expect(doc.currentRow?.text).toBe("hi");
      expect(view.column).toBe(1);
    });

    it("follows the end of line once it is sticky", () => {
      const view = new Viewport(Document.fromLines(["hello", "hi", "world!"]));
      view.stickyEndOfLine = true;
      view.moveToLineEnd();
      expect(view.column).toBe(4);
      view.moveVertical(1);
      expect(view.column).toBe(1);
      view.moveVertical(1);
      expect(view.column).toBe(5);
    });

    it("does not move past either end", () => {
      const view = new Viewport(Document.fromLines(["a", "b"]));
      expect(view.moveVertical(-5)).toBe(0);
      expect(view.moveVertical(5)).toBe(1);
      expect(view.line).toBe(1);
    });

    it("pans when a wider gutter pushes the caret off the right edge", () => {
      const doc = Document.fromLines(Array.from({ length: 12 }, () => "x".repeat(40)));
      const view = new Viewport(doc, { width: 20, height: 8, topBarHeight: 1, bottomBarHeight: 2 });
      view.moveToColumn(17);
      expect(view.gutterWidth).toBe(2);
      expect(view.screenCol).toBe(19);

      view.jumpToBottom();
      expect(view.gutterWidth).toBe(3);
      expect(view.textWidth).toBe(17);
      expect(view.firstVisibleCol).toBe(1);
      expect(view.screenCol).toBe(19);
      expect(view.column).toBe(17);
    });

    it("scrolls to keep the current row visible", () => {
      const view = new Viewport(numbered(30));
      view.moveVertical(25);
      expect(view.firstVisibleRow).toBe(5);
      expect(view.screenRow).toBe(21);
      expect(view.line).toBe(25);
      expect(view.gutterWidth).toBe(3);
    });
  });

  it("jumps to the first and last rows", () => {
    const doc = numbered(30);
    const view = new Viewport(doc);
    view.jumpToBottom();
    expect(doc.currentIndex).toBe(29);
    expect(view.firstVisibleRow).toBe(9);
    expect(view.screenRow).toBe(21);

    view.moveToColumn(3);
    view.jumpToTop();
    expect(doc.currentIndex).toBe(0);
    expect(view.firstVisibleRow).toBe(0);
    expect(view.screenRow).toBe(1);
    expect(view.column).toBe(0);
  });

  it("moves to the first non-blank character", () => {
    const view = new Viewport(Document.fromLines(["   x = 1"]));
    view.moveToLineEnd();
    view.moveToFirstNonblank();
    expect(view.column).toBe(3);
  });

  it("lists the visible rows with their screen positions", () => {
    const view = new Viewport(Document.fromLines(["a", "b", "c"]));
    const visible = view.visibleRows();
    expect(visible.map((v) => v.row.text)).toEqual(["a", "b", "c"]);
    expect(visible.map((v) => v.lineNumber)).toEqual([1, 2, 3]);
    expect(visible.map((v) => v.screenRow)).toEqual([1, 2, 3]);
  });

  it("right-aligns line numbers in the gutter", () => {
    const view = new Viewport(numbered(30));
    view.moveVertical(25);
    expect(view.gutterText(7)).toBe(" 7 ");
    expect(view.gutterText(26)).toBe("26 ");
  });

  it("marks visible rows dirty when the window scrolls", () => {
    const doc = numbered(30);
    const view = new Viewport(doc);
    for (const row of doc.rows()) row.dirty = false;
    view.moveVertical(25);
    expect(view.visibleRows().every((v) => v.row.dirty)).toBe(true);
    expect(doc.rowAt(0)?.dirty).toBe(false);
  });

  it("keeps the current row in view after a resize", () => {
    const view = new Viewport(numbered(30));
    view.moveVertical(25);
    view.resize(80, 10);
    expect(view.visibleHeight).toBe(7);
    expect(view.firstVisibleRow).toBe(19);
    expect(view.line).toBe(25);
  });
});
