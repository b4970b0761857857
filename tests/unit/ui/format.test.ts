import { describe, expect, it } from "vitest";

import { Row } from "../../../src/editor/row.js";
import {
  escapeTags,
  hintLines,
  lineMarkup,
  rowMarkup,
  statusMarkup,
} from "../../../src/ui/format.js";

describe("escapeTags", () => {
  it("escapes braces", () => {
    expect(escapeTags("{a}")).toBe("{open}a{close}");
  });
});

describe("rowMarkup", () => {
  it("styles each run of equal tokens", () => {
    const row = new Row(1, "int x");
    expect(rowMarkup(row.text, row.tags, 0, 80)).toBe("{bold}{magenta-fg}int{/} x");
  });

  it("renders only the visible slice", () => {
    const row = new Row(1, "int x");
    expect(rowMarkup(row.text, row.tags, 4, 1)).toBe("x");
    expect(rowMarkup(row.text, row.tags, 1, 2)).toBe("{bold}{magenta-fg}nt{/}");
  });

  it("escapes braces in the text", () => {
    const row = new Row(1, "a{b");
    expect(rowMarkup(row.text, row.tags, 0, 80)).toBe("a{white-fg}{open}{/}b");
  });
});

describe("lineMarkup", () => {
  it("puts the gutter before the text", () => {
    const row = new Row(1, "x;");
    const markup = lineMarkup({ row, lineNumber: 1, screenRow: 1, gutter: "1 " }, 0, 78);
    expect(markup).toBe("{gray-fg}1 {/}x{white-fg};{/}");
  });
});

describe("statusMarkup", () => {
  it("appends pending keys", () => {
    expect(statusMarkup(" NORMAL", "d")).toBe(" NORMAL  {bold}d{/}");
    expect(statusMarkup(" NORMAL", "")).toBe(" NORMAL");
  });
});

describe("hintLines", () => {
  it("marks groups and commands", () => {
    expect(
      hintLines([
        { key: "d", title: "Delete line", kind: "cmd" },
        { key: "g", title: "goto", kind: "group" },
      ]),
    ).toEqual(["d  • Delete line", "g  ▸ goto"]);
  });
});
