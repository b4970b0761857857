import { isPrintable, isSpecialKey, type Key } from "../editor/state.js";

/** The parts of a blessed keypress event the editor looks at. */
export type KeyEvent = {
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
};

/**
 * Maps a blessed keypress to a dispatcher key, or null when the editor has
 * no use for it. blessed reports Enter twice ("return", then "enter"); only
 * "enter" is kept.
 */
export function translateKey(ch: string | undefined, key: KeyEvent | undefined): Key | null {
  if (key?.ctrl || key?.meta) return null;
  const name = key?.name ?? "";
  if (name === "return") return null;
  if (isSpecialKey(name)) return name;
  if (ch !== undefined && isPrintable(ch)) return ch;
  return null;
}
