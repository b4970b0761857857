const WHITESPACE = " \f\n\r\t\v";

export function isWhitespace(ch: string): boolean {
  return ch.length === 1 && WHITESPACE.includes(ch);
}

export function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9" && ch.length === 1;
}

export function isIdentifierStart(ch: string): boolean {
  return ch === "_" || (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

export function isIdentifierPart(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

// Strips a single trailing "\n", "\r" or "\r\n".
export function stripLineTerminator(line: string): string {
  if (line.endsWith("\r\n")) return line.slice(0, -2);
  if (line.endsWith("\n") || line.endsWith("\r")) return line.slice(0, -1);
  return line;
}
