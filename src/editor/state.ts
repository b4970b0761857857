export type Mode =
  | "NORMAL"
  | "INSERT"
  | "COMMAND_COLLECT"
  | "COMMAND_EXECUTE"
  | "EXITING";

/**
 * Dispatcher keys: single printable characters ("a", ":", "$") or the names
 * of special keys.
 */
export type Key = string;

export const SPECIAL_KEYS = [
  "escape",
  "enter",
  "backspace",
  "tab",
  "up",
  "down",
  "left",
  "right",
] as const;

export type SpecialKey = (typeof SPECIAL_KEYS)[number];

const SPECIAL_KEY_SET: ReadonlySet<string> = new Set(SPECIAL_KEYS);

export type Pending =
  | { kind: "none" }
  | { kind: "prefix"; keys: string[] } // e.g. ["d"] while waiting for "dd" / "dw"
  | { kind: "count"; digits: string };

export type CommandLine = {
  text: string;
  cursor: number;
};

export type DispatchState = {
  mode: Mode;
  pending: Pending;
  repeat: number;
  commandLine: CommandLine;
};

export const KEY_SEQUENCE_LIMIT = 4;

export function initialDispatchState(): DispatchState {
  return {
    mode: "NORMAL",
    pending: { kind: "none" },
    repeat: 1,
    commandLine: { text: "", cursor: 0 },
  };
}

export function isSpecialKey(key: Key): key is SpecialKey {
  return SPECIAL_KEY_SET.has(key);
}

export function isPrintable(key: Key): boolean {
  return key.length === 1 && key >= " " && key !== "\x7f";
}
