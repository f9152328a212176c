import { ToonDecodeError } from "./errors.js";
import type { Delimiter } from "./options.js";
import { bool, double, int, isInt64, nil, str, type ToonPrimitive } from "./value.js";

// --- Constants ---

export const NULL_LITERAL = "null";
export const TRUE_LITERAL = "true";
export const FALSE_LITERAL = "false";
export const DOUBLE_QUOTE = '"';
export const BACKSLASH = "\\";
export const COLON = ":";
export const LIST_ITEM_MARKER = "-";

const NUMERIC_LITERAL = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;
const UNQUOTED_KEY = /^[A-Z_][\w.]*$/i;
const CONTROL_CHARACTER = /[\u0000-\u001f]/;

const ESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

// --- Literal classification ---

export function isBooleanOrNullLiteral(token: string): boolean {
  return token === TRUE_LITERAL || token === FALSE_LITERAL || token === NULL_LITERAL;
}

export function isNumericLiteral(token: string): boolean {
  return NUMERIC_LITERAL.test(token);
}

// --- String utilities ---

export function escapeString(value: string): string {
  let out = "";
  for (const ch of value) {
    switch (ch) {
      case "\\": out += "\\\\"; break;
      case '"': out += '\\"'; break;
      case "\b": out += "\\b"; break;
      case "\f": out += "\\f"; break;
      case "\n": out += "\\n"; break;
      case "\r": out += "\\r"; break;
      case "\t": out += "\\t"; break;
      default:
        out += ch < " " ? `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}` : ch;
    }
  }
  return out;
}

/** Resolve the escapes in the body of a quoted string (quotes already removed). */
export function unescapeString(body: string, line?: number): string {
  let out = "";
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== BACKSLASH) {
      out += ch;
      continue;
    }
    const next = body[i + 1];
    if (next === undefined) {
      throw new ToonDecodeError("Unterminated escape sequence", { line, code: "INVALID_ESCAPE" });
    }
    if (next === "u") {
      const hex = body.slice(i + 2, i + 6);
      if (!/^[\da-f]{4}$/i.test(hex)) {
        throw new ToonDecodeError("Invalid \\u escape", { line, code: "INVALID_ESCAPE" });
      }
      out += String.fromCharCode(parseInt(hex, 16));
      i += 5;
      continue;
    }
    const resolved = ESCAPES[next];
    if (resolved === undefined) {
      throw new ToonDecodeError(`Invalid escape sequence \\${next}`, { line, code: "INVALID_ESCAPE" });
    }
    out += resolved;
    i++;
  }
  return out;
}

/** Index of the quote closing the string opened at `start`, or -1. */
export function findClosingQuote(text: string, start: number): number {
  if (text[start] !== DOUBLE_QUOTE) return -1;
  for (let i = start + 1; i < text.length; i++) {
    if (text[i] === BACKSLASH) {
      i++;
    } else if (text[i] === DOUBLE_QUOTE) {
      return i;
    }
  }
  return -1;
}

/** Index of the first `target` outside double-quoted segments, or -1. */
export function findUnquotedChar(text: string, target: string, start = 0): number {
  let inQuotes = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes && ch === BACKSLASH) {
      i++;
    } else if (ch === DOUBLE_QUOTE) {
      inQuotes = !inQuotes;
    } else if (!inQuotes && ch === target) {
      return i;
    }
  }
  return -1;
}

// --- Decoding ---

function parseNumber(token: string): ToonPrimitive | undefined {
  if (/[.eE]/.test(token)) {
    const n = Number(token);
    return Number.isFinite(n) ? double(n) : undefined;
  }
  const big = BigInt(token);
  if (isInt64(big)) return int(big);
  const n = Number(token);
  return Number.isFinite(n) ? double(n) : undefined;
}

export function parsePrimitiveToken(token: string, line?: number): ToonPrimitive {
  const trimmed = token.trim();
  if (trimmed === "") return str("");

  if (trimmed.startsWith(DOUBLE_QUOTE)) {
    const closing = findClosingQuote(trimmed, 0);
    if (closing === -1) {
      throw new ToonDecodeError("Unterminated string: missing closing quote", {
        line,
        code: "UNTERMINATED_STRING",
      });
    }
    if (closing !== trimmed.length - 1) {
      throw new ToonDecodeError("Unexpected characters after closing quote", {
        line,
        code: "TRAILING_CHARACTERS",
      });
    }
    return str(unescapeString(trimmed.slice(1, closing), line));
  }

  if (trimmed === TRUE_LITERAL) return bool(true);
  if (trimmed === FALSE_LITERAL) return bool(false);
  if (trimmed === NULL_LITERAL) return nil();

  if (isNumericLiteral(trimmed)) {
    const parsed = parseNumber(trimmed);
    if (parsed !== undefined) return parsed;
  }

  return str(trimmed);
}

// --- Encoding ---

export function formatDouble(value: number): string {
  if (!Number.isFinite(value)) return NULL_LITERAL;
  if (Object.is(value, -0)) return "-0.0";
  const text = String(value);
  return Number.isInteger(value) && !text.includes("e") ? `${text}.0` : text;
}

export function needsQuoting(value: string, delimiter: Delimiter): boolean {
  if (value === "" || value !== value.trim()) return true;
  if (isBooleanOrNullLiteral(value) || isNumericLiteral(value)) return true;
  if (value.includes(delimiter) || value.includes(COLON)) return true;
  if (value.includes(DOUBLE_QUOTE) || value.includes(BACKSLASH)) return true;
  if (/[[\]{}]/.test(value) || CONTROL_CHARACTER.test(value)) return true;
  return value.startsWith(LIST_ITEM_MARKER);
}

export function encodeString(value: string, delimiter: Delimiter): string {
  return needsQuoting(value, delimiter) ? `"${escapeString(value)}"` : value;
}

export function formatPrimitive(value: ToonPrimitive, delimiter: Delimiter): string {
  switch (value.kind) {
    case "null":
      return NULL_LITERAL;
    case "bool":
      return value.value ? TRUE_LITERAL : FALSE_LITERAL;
    case "int":
      return value.value.toString();
    case "double":
      return formatDouble(value.value);
    case "string":
      return encodeString(value.value, delimiter);
  }
}

export function encodeKey(key: string): string {
  return UNQUOTED_KEY.test(key) ? key : `"${escapeString(key)}"`;
}
