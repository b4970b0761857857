import type { FrameRow } from "../editor/editor.js";
import type { HighlightToken } from "../editor/highlight.js";

// blessed tag markup per highlight token; normal text is left unstyled
const TOKEN_STYLES: Record<HighlightToken, string> = {
  normal: "",
  keyword: "{bold}{blue-fg}",
  "keyword-alt": "{cyan-fg}",
  string: "{green-fg}",
  comment: "{gray-fg}",
  type: "{bold}{magenta-fg}",
  preprocessor: "{bold}{red-fg}",
  digit: "{magenta-fg}",
  symbol: "{yellow-fg}",
  "symbol-alt": "{white-fg}",
};

export const EMPTY_LINE_MARKUP = "{blue-fg}~{/}";

export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (c) => (c === "{" ? "{open}" : "{close}"));
}

/**
 * The visible slice [start, start + width) of a row, one styled run per
 * stretch of equal tokens.
 */
export function rowMarkup(
  text: string,
  tags: readonly HighlightToken[],
  start: number,
  width: number,
): string {
  const end = Math.min(text.length, start + width);
  let out = "";
  let i = Math.max(0, start);
  while (i < end) {
    const token = tags[i] ?? "normal";
    let j = i + 1;
    while (j < end && (tags[j] ?? "normal") === token) j++;
    const chunk = escapeTags(text.slice(i, j));
    const style = TOKEN_STYLES[token];
    out += style ? `${style}${chunk}{/}` : chunk;
    i = j;
  }
  return out;
}

export function lineMarkup(visible: FrameRow, firstVisibleCol: number, textWidth: number): string {
  const { row } = visible;
  return (
    `{gray-fg}${visible.gutter}{/}` +
    rowMarkup(row.text, row.tags, firstVisibleCol, textWidth)
  );
}

export function statusMarkup(status: string, pending: string): string {
  const keys = pending ? `  {bold}${escapeTags(pending)}{/}` : "";
  return escapeTags(status) + keys;
}

export function hintLines(
  hints: ReadonlyArray<{ key: string; title: string; kind: "group" | "cmd" }>,
): string[] {
  return hints.map((h) => `${h.key}  ${h.kind === "group" ? "▸" : "•"} ${h.title}`);
}
