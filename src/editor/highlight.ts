import {
  isDigit,
  isIdentifierPart,
  isIdentifierStart,
  isWhitespace,
} from "./chars.js";

export type HighlightToken =
  | "normal"
  | "keyword"
  | "keyword-alt"
  | "string"
  | "comment"
  | "type"
  | "preprocessor"
  | "digit"
  | "symbol"
  | "symbol-alt";

/** Lexical state a row ends in, consumed by the next row. */
export type LexState = {
  readonly commentOpen: boolean;
  readonly stringDelimiter: string | null;
};

export type HighlightResult = {
  tags: HighlightToken[];
  exit: LexState;
};

export const CLOSED_STATE: LexState = Object.freeze({
  commentOpen: false,
  stringDelimiter: null,
});

const KEYWORDS: ReadonlySet<string> = new Set([
  "auto",
  "break",
  "case",
  "const",
  "continue",
  "default",
  "do",
  "else",
  "enum",
  "extern",
  "for",
  "goto",
  "if",
  "inline",
  "register",
  "restrict",
  "return",
  "sizeof",
  "static",
  "struct",
  "switch",
  "typedef",
  "union",
  "volatile",
  "while",
]);

const LITERALS: ReadonlySet<string> = new Set(["true", "false", "NULL", "nullptr"]);

const TYPES: ReadonlySet<string> = new Set([
  "void",
  "char",
  "short",
  "int",
  "long",
  "float",
  "double",
  "signed",
  "unsigned",
  "bool",
  "size_t",
  "ssize_t",
  "int8_t",
  "int16_t",
  "int32_t",
  "int64_t",
  "uint8_t",
  "uint16_t",
  "uint32_t",
  "uint64_t",
]);

const SYMBOLS = "+-*/=<>!&|^%~?:";
const SYMBOLS_ALT = "{}()[];,.";
const STRING_DELIMITERS = "\"'";

type Scan =
  | { kind: "code" }
  | { kind: "comment" }
  | { kind: "string"; delimiter: string }
  | { kind: "directive"; start: number }
  | { kind: "include"; closer: string | null };

export function sameLexState(a: LexState, b: LexState): boolean {
  return a.commentOpen === b.commentOpen && a.stringDelimiter === b.stringDelimiter;
}

export function classifyWord(word: string): HighlightToken {
  if (KEYWORDS.has(word)) return "keyword";
  if (LITERALS.has(word)) return "keyword-alt";
  if (TYPES.has(word)) return "type";
  return "normal";
}

function classifySymbol(ch: string): HighlightToken {
  if (ch.length !== 1) return "normal";
  if (SYMBOLS.includes(ch)) return "symbol";
  if (SYMBOLS_ALT.includes(ch)) return "symbol-alt";
  return "normal";
}

function initialScan(entry: LexState): Scan {
  if (entry.commentOpen) return { kind: "comment" };
  if (entry.stringDelimiter !== null) {
    return { kind: "string", delimiter: entry.stringDelimiter };
  }
  return { kind: "code" };
}

/**
 * Tags every character of `text`, starting from the state the previous row
 * exited in. Pure: the same text and entry state always give the same result.
 */
export function highlightLine(text: string, entry: LexState): HighlightResult {
  const tags = new Array<HighlightToken>(text.length).fill("normal");
  let scan = initialScan(entry);
  let continued = false;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);
    const next = text.charAt(i + 1);

    switch (scan.kind) {
      case "comment": {
        tags[i] = "comment";
        if (ch === "*" && next === "/") {
          tags[i + 1] = "comment";
          scan = { kind: "code" };
          i += 2;
        } else {
          i++;
        }
        break;
      }

      case "string": {
        tags[i] = "string";
        if (ch === "\\") {
          if (i === text.length - 1) {
            continued = true;
            i++;
          } else {
            // escaped character
            tags[i + 1] = "digit";
            i += 2;
          }
          break;
        }
        if (ch === scan.delimiter) scan = { kind: "code" };
        i++;
        break;
      }

      case "directive": {
        if (isWhitespace(ch)) {
          const word = text.slice(scan.start, i);
          scan = word === "include" ? { kind: "include", closer: null } : { kind: "code" };
        } else {
          tags[i] = "preprocessor";
        }
        i++;
        break;
      }

      case "include": {
        if (scan.closer === null) {
          if (isWhitespace(ch)) {
            i++;
          } else if (ch === '"' || ch === "<") {
            tags[i] = "string";
            scan = { kind: "include", closer: ch === "<" ? ">" : '"' };
            i++;
          } else {
            // not a header name, rescan as code
            scan = { kind: "code" };
          }
          break;
        }
        tags[i] = "string";
        if (ch === scan.closer) scan = { kind: "code" };
        i++;
        break;
      }

      case "code": {
        if (isIdentifierStart(ch)) {
          let end = i + 1;
          while (end < text.length && isIdentifierPart(text.charAt(end))) end++;
          tags.fill(classifyWord(text.slice(i, end)), i, end);
          i = end;
        } else if (isDigit(ch)) {
          tags[i] = "digit";
          i++;
        } else if (STRING_DELIMITERS.includes(ch)) {
          tags[i] = "string";
          scan = { kind: "string", delimiter: ch };
          i++;
        } else if (ch === "#") {
          tags[i] = "preprocessor";
          scan = { kind: "directive", start: i + 1 };
          i++;
        } else if (ch === "/" && next === "/") {
          tags.fill("comment", i);
          i = text.length;
        } else if (ch === "/" && next === "*") {
          tags[i] = "comment";
          tags[i + 1] = "comment";
          scan = { kind: "comment" };
          i += 2;
        } else {
          tags[i] = classifySymbol(ch);
          i++;
        }
        break;
      }
    }
  }

  return {
    tags,
    exit: {
      commentOpen: scan.kind === "comment",
      stringDelimiter: scan.kind === "string" && continued ? scan.delimiter : null,
    },
  };
}
