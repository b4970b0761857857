import { isWhitespace } from "./chars.js";
import type { CommandLine } from "./state.js";

export type ParsedCommand =
  | { kind: "quit" }
  | { kind: "write"; path: string | null; quit: boolean }
  | { kind: "invalid"; text: string }
  | { kind: "unknown"; text: string };

/**
 * Parses a collected command line (without the leading colon).
 *
 *   q          quit without saving
 *   w          write to the document's path
 *   w <path>   write to another path
 *   wq         write, then quit
 */
export function parseCommand(text: string): ParsedCommand {
  if (text === "q") return { kind: "quit" };
  if (!text.startsWith("w")) return { kind: "unknown", text };
  if (text.length === 1) return { kind: "write", path: null, quit: false };
  if (text === "wq") return { kind: "write", path: null, quit: true };
  if (text.charAt(1) === " ") {
    let start = 2;
    while (start < text.length && isWhitespace(text.charAt(start))) start++;
    const path = text.slice(start);
    return { kind: "write", path: path.length > 0 ? path : null, quit: false };
  }
  return { kind: "invalid", text };
}

export function emptyCommandLine(): CommandLine {
  return { text: "", cursor: 0 };
}

export function insertIntoCommandLine(line: CommandLine, chars: string): CommandLine {
  return {
    text: line.text.slice(0, line.cursor) + chars + line.text.slice(line.cursor),
    cursor: line.cursor + chars.length,
  };
}

// Position 0 sits right after the colon, which cannot be erased.
export function backspaceCommandLine(line: CommandLine): CommandLine {
  if (line.cursor === 0) return line;
  return {
    text: line.text.slice(0, line.cursor - 1) + line.text.slice(line.cursor),
    cursor: line.cursor - 1,
  };
}

export function moveCommandCursor(line: CommandLine, delta: number): CommandLine {
  const cursor = Math.max(0, Math.min(line.text.length, line.cursor + delta));
  return cursor === line.cursor ? line : { ...line, cursor };
}
