import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { Document } from "../../../src/editor/document.js";
import { NodeFileStore, splitLines } from "../../../src/editor/file-store.js";

describe("splitLines", () => {
  it("keeps each line's terminator", () => {
    expect(splitLines("a\nb\r\nc")).toEqual(["a\n", "b\r\n", "c"]);
    expect(splitLines("a\n")).toEqual(["a\n"]);
    expect(splitLines("\n\n")).toEqual(["\n", "\n"]);
  });

  it("returns no lines for empty content", () => {
    expect(splitLines("")).toEqual([]);
  });
});

describe("NodeFileStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "rowedit-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes every row followed by a newline", () => {
    const file = path.join(dir, "out.c");
    new NodeFileStore().writeLines(file, ["one", "two"]);
    expect(fs.readFileSync(file, "utf8")).toBe("one\ntwo\n");
  });

  it("reads lines back with their terminators", () => {
    const file = path.join(dir, "in.c");
    fs.writeFileSync(file, "one\ntwo\n", "utf8");
    expect(new NodeFileStore().loadLines(file)).toEqual(["one\n", "two\n"]);
  });

  it("round-trips a document", () => {
    const file = path.join(dir, "doc.c");
    const store = new NodeFileStore();
    const doc = Document.fromLines(["int main(void) {", "  return 0;", "}"]);
    store.writeLines(file, doc.lines());
    expect(Document.fromLines(store.loadLines(file)).lines()).toEqual(doc.lines());
  });

  it("throws for a missing file", () => {
    expect(() => new NodeFileStore().loadLines(path.join(dir, "nope.c"))).toThrow();
  });
});
