/**
 * Array header grammar shared by the encoder and decoder:
 *
 *   key[#N<delim>]{field<delim>field}: inline values
 *
 * The key, the `#` length marker, the delimiter suffix, the field list and the
 * inline values are all optional.
 */

import { isDelimiter, type Delimiter } from "./options.js";
import {
  COLON,
  DOUBLE_QUOTE,
  BACKSLASH,
  encodeKey,
  findClosingQuote,
  findUnquotedChar,
  unescapeString,
} from "./primitive.js";

export interface ArrayHeader {
  readonly key?: string;
  readonly length: number;
  readonly delimiter: Delimiter;
  /** Present for tabular arrays; may be empty (`{}`) */
  readonly fields?: readonly string[];
  readonly hasLengthMarker: boolean;
  /** Trimmed text after the colon, absent when nothing follows */
  readonly inlineValue?: string;
}

const OPEN_BRACKET = "[";
const CLOSE_BRACKET = "]";
const OPEN_BRACE = "{";
const CLOSE_BRACE = "}";
const LENGTH_MARKER = "#";

/**
 * Split on `delimiter` outside double quotes, trimming each piece.
 * Backslash escapes inside quotes are kept verbatim for the primitive parser.
 */
export function splitDelimited(input: string, delimiter: Delimiter): string[] {
  const values: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (inQuotes && ch === BACKSLASH && i + 1 < input.length) {
      current += ch + input[i + 1];
      i++;
      continue;
    }
    if (ch === DOUBLE_QUOTE) {
      inQuotes = !inQuotes;
      current += ch;
      continue;
    }
    if (ch === delimiter && !inQuotes) {
      values.push(current.trim());
      current = "";
      continue;
    }
    current += ch;
  }

  if (current !== "" || values.length > 0) values.push(current.trim());
  return values;
}

function parseFieldName(raw: string, line?: number): string {
  if (!raw.startsWith(DOUBLE_QUOTE)) return raw;
  const closing = findClosingQuote(raw, 0);
  return closing === -1 ? raw : unescapeString(raw.slice(1, closing), line);
}

/**
 * Recognize an array header line. Returns undefined when the line is not a
 * header, so the caller can treat it as a key-value line instead.
 */
export function parseArrayHeader(
  content: string,
  defaultDelimiter: Delimiter,
  line?: number,
): ArrayHeader | undefined {
  const text = content.trimStart();
  let key: string | undefined;
  let bracketStart: number;

  if (text.startsWith(DOUBLE_QUOTE)) {
    const closing = findClosingQuote(text, 0);
    if (closing === -1 || text[closing + 1] !== OPEN_BRACKET) return undefined;
    key = unescapeString(text.slice(1, closing), line);
    bracketStart = closing + 1;
  } else {
    bracketStart = text.indexOf(OPEN_BRACKET);
    if (bracketStart === -1) return undefined;
    const rawKey = text.slice(0, bracketStart);
    if (rawKey.includes(COLON) || rawKey.includes(DOUBLE_QUOTE)) return undefined;
    const trimmedKey = rawKey.trim();
    key = trimmedKey === "" ? undefined : trimmedKey;
  }

  const bracketEnd = text.indexOf(CLOSE_BRACKET, bracketStart);
  if (bracketEnd === -1) return undefined;

  let segment = text.slice(bracketStart + 1, bracketEnd);
  let hasLengthMarker = false;
  if (segment.startsWith(LENGTH_MARKER)) {
    hasLengthMarker = true;
    segment = segment.slice(1);
  }

  let delimiter = defaultDelimiter;
  const suffix = segment.slice(-1);
  if (suffix !== "" && isDelimiter(suffix)) {
    delimiter = suffix;
    segment = segment.slice(0, -1);
  }

  if (!/^\d+$/.test(segment)) return undefined;
  const length = parseInt(segment, 10);

  let cursor = bracketEnd + 1;
  let fields: string[] | undefined;
  if (text[cursor] === OPEN_BRACE) {
    const braceEnd = findUnquotedChar(text, CLOSE_BRACE, cursor + 1);
    if (braceEnd === -1) return undefined;
    fields = splitDelimited(text.slice(cursor + 1, braceEnd), delimiter).map((raw) =>
      parseFieldName(raw, line),
    );
    cursor = braceEnd + 1;
  }

  if (text[cursor] !== COLON) return undefined;
  const inline = text.slice(cursor + 1).trim();

  return {
    key,
    length,
    delimiter,
    fields,
    hasLengthMarker,
    inlineValue: inline === "" ? undefined : inline,
  };
}

export interface HeaderFormat {
  key?: string;
  fields?: readonly string[];
  delimiter: Delimiter;
  lengthMarker: boolean;
}

export function formatArrayHeader(length: number, format: HeaderFormat): string {
  let h = "";
  if (format.key !== undefined) h += encodeKey(format.key);
  h += `${OPEN_BRACKET}${format.lengthMarker ? LENGTH_MARKER : ""}${length}${CLOSE_BRACKET}`;
  if (format.fields) {
    h += `${OPEN_BRACE}${format.fields.map((f) => encodeKey(f)).join(format.delimiter)}${CLOSE_BRACE}`;
  }
  h += COLON;
  return h;
}
