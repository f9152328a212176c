import { ToonDecodeError } from "./errors.js";
import { parseArrayHeader, splitDelimited, type ArrayHeader } from "./header.js";
import {
  resolveDecodeOptions,
  type DecodeOptions,
  type Delimiter,
  type ResolvedDecodeOptions,
} from "./options.js";
import {
  COLON,
  DOUBLE_QUOTE,
  LIST_ITEM_MARKER,
  findClosingQuote,
  findUnquotedChar,
  parsePrimitiveToken,
  unescapeString,
} from "./primitive.js";
import { LineCursor, scan, type ScannedLine } from "./scanner.js";
import { emptyObject, nil, type ToonObject, type ToonValue } from "./value.js";

const LIST_ITEM_PREFIX = "- ";

export function isKeyValueLine(content: string): boolean {
  return findUnquotedChar(content, COLON) !== -1;
}

function isListItem(content: string): boolean {
  return content === LIST_ITEM_MARKER || content.startsWith(LIST_ITEM_PREFIX);
}

/** Parse a quoted or bare key and return it with the index just past its colon. */
export function parseKeyToken(content: string, line?: number): { key: string; end: number } {
  if (content.startsWith(DOUBLE_QUOTE)) {
    const closing = findClosingQuote(content, 0);
    if (closing === -1) {
      throw new ToonDecodeError("Unterminated quoted key", { line, code: "UNTERMINATED_STRING" });
    }
    if (content[closing + 1] !== COLON) {
      throw new ToonDecodeError("Missing colon after key", { line, code: "MISSING_COLON" });
    }
    return { key: unescapeString(content.slice(1, closing), line), end: closing + 2 };
  }

  const colon = content.indexOf(COLON);
  if (colon === -1) {
    throw new ToonDecodeError("Missing colon after key", { line, code: "MISSING_COLON" });
  }
  return { key: content.slice(0, colon).trim(), end: colon + 1 };
}

/**
 * Recursive-descent decoder over the scanned lines of one document.
 * Each method consumes the lines of the construct it decodes.
 */
class Decoder {
  constructor(
    private readonly cursor: LineCursor,
    private readonly options: ResolvedDecodeOptions,
  ) {}

  decodeDocument(): ToonValue {
    const first = this.cursor.peek();
    if (first === undefined) {
      throw new ToonDecodeError("Empty document", { line: 1, code: "EMPTY_DOCUMENT" });
    }

    if (first.content.startsWith("[")) {
      const header = parseArrayHeader(first.content, this.options.delimiter, first.lineNumber);
      if (header !== undefined && header.key === undefined) {
        this.cursor.advance();
        const value = this.decodeArray(header, first, first.depth);
        this.expectEnd();
        return value;
      }
    }

    if (this.cursor.length === 1 && !isKeyValueLine(first.content)) {
      this.cursor.advance();
      return parsePrimitiveToken(first.content, first.lineNumber);
    }

    const value = this.decodeObject(0);
    this.expectEnd();
    return value;
  }

  private expectEnd(): void {
    const rest = this.cursor.peek();
    if (rest !== undefined) {
      throw new ToonDecodeError("Unexpected content after document root", {
        line: rest.lineNumber,
        code: "UNEXPECTED_CONTENT",
      });
    }
  }

  private decodeObject(baseDepth: number): ToonObject {
    const fields = new Map<string, ToonValue>();
    for (;;) {
      const line = this.cursor.peek();
      if (line === undefined || line.depth < baseDepth) break;
      if (line.depth > baseDepth) {
        throw new ToonDecodeError(`Unexpected indentation (expected depth ${baseDepth}, found ${line.depth})`, {
          line: line.lineNumber,
          code: "UNEXPECTED_INDENT",
        });
      }
      this.cursor.advance();
      const [key, value] = this.decodeField(line.content, line, baseDepth);
      fields.set(key, value);
    }
    return { kind: "object", fields };
  }

  /**
   * Decode one `key: ...` entry whose line has already been consumed.
   * `baseDepth` is the logical depth of the entry; nested content sits deeper.
   */
  private decodeField(content: string, line: ScannedLine, baseDepth: number): [string, ToonValue] {
    const header = parseArrayHeader(content, this.options.delimiter, line.lineNumber);
    if (header !== undefined) {
      if (header.key === undefined) {
        throw new ToonDecodeError("Array header inside an object needs a key", {
          line: line.lineNumber,
          code: "MISSING_KEY",
        });
      }
      return [header.key, this.decodeArray(header, line, baseDepth)];
    }

    const { key, end } = parseKeyToken(content, line.lineNumber);
    const rest = content.slice(end).trim();
    if (rest !== "") return [key, parsePrimitiveToken(rest, line.lineNumber)];

    const next = this.cursor.peek();
    if (next !== undefined && next.depth > baseDepth) {
      return [key, this.decodeObject(baseDepth + 1)];
    }
    return [key, emptyObject()];
  }

  private decodeArray(header: ArrayHeader, line: ScannedLine, baseDepth: number): ToonValue {
    let items: ToonValue[];
    if (header.fields !== undefined) {
      if (header.inlineValue !== undefined) {
        throw new ToonDecodeError("Tabular array header cannot carry inline values", {
          line: line.lineNumber,
          code: "UNEXPECTED_CONTENT",
        });
      }
      items = this.decodeTabularRows(header.fields, header.delimiter, baseDepth + 1);
    } else if (header.inlineValue !== undefined) {
      items = splitDelimited(header.inlineValue, header.delimiter).map((token) =>
        parsePrimitiveToken(token, line.lineNumber),
      );
    } else {
      items = this.decodeListItems(baseDepth + 1);
    }

    if (this.options.strict && items.length !== header.length) {
      const name = header.key !== undefined ? ` "${header.key}"` : "";
      throw new ToonDecodeError(
        `Array${name} declares ${header.length} items, but ${items.length} were found`,
        { line: line.lineNumber, code: "LENGTH_MISMATCH" },
      );
    }
    return { kind: "array", items };
  }

  private decodeTabularRows(fields: readonly string[], delimiter: Delimiter, rowDepth: number): ToonValue[] {
    const rows: ToonValue[] = [];
    for (;;) {
      const line = this.cursor.peek();
      if (line === undefined || line.depth !== rowDepth) break;
      this.cursor.advance();

      const cells = splitDelimited(line.content, delimiter);
      if (this.options.strict && cells.length !== fields.length) {
        throw new ToonDecodeError(`Row has ${cells.length} values, but the header names ${fields.length} fields`, {
          line: line.lineNumber,
          code: "ROW_WIDTH_MISMATCH",
        });
      }
      const row = new Map<string, ToonValue>();
      fields.forEach((field, i) => {
        row.set(field, i < cells.length ? parsePrimitiveToken(cells[i], line.lineNumber) : nil());
      });
      rows.push({ kind: "object", fields: row });
    }
    return rows;
  }

  private decodeListItems(itemDepth: number): ToonValue[] {
    const items: ToonValue[] = [];
    for (;;) {
      const line = this.cursor.peek();
      if (line === undefined || line.depth !== itemDepth) break;
      if (!isListItem(line.content)) {
        throw new ToonDecodeError(`Expected a list item starting with "${LIST_ITEM_PREFIX}"`, {
          line: line.lineNumber,
          code: "EXPECTED_LIST_ITEM",
        });
      }
      this.cursor.advance();
      items.push(this.decodeListItem(line, itemDepth));
    }
    return items;
  }

  private decodeListItem(line: ScannedLine, itemDepth: number): ToonValue {
    // The scanner keeps trailing whitespace, so "- " is still a bare marker
    if (line.content.trimEnd() === LIST_ITEM_MARKER) {
      const next = this.cursor.peek();
      if (next !== undefined && next.depth > itemDepth) return this.decodeObject(itemDepth + 1);
      return emptyObject();
    }

    const rest = line.content.slice(LIST_ITEM_PREFIX.length).trim();

    if (rest.startsWith("[")) {
      const header = parseArrayHeader(rest, this.options.delimiter, line.lineNumber);
      if (header !== undefined && header.key === undefined) {
        return this.decodeArray(header, line, itemDepth);
      }
    }

    if (isKeyValueLine(rest)) {
      // The first field shares the marker line; its siblings follow one level deeper
      const [key, value] = this.decodeField(rest, line, itemDepth + 1);
      const fields = new Map<string, ToonValue>([[key, value]]);
      for (const [siblingKey, siblingValue] of this.decodeObject(itemDepth + 1).fields) {
        fields.set(siblingKey, siblingValue);
      }
      return { kind: "object", fields };
    }

    return parsePrimitiveToken(rest, line.lineNumber);
  }
}

export function decode(text: string, options?: DecodeOptions): ToonValue {
  const resolved = resolveDecodeOptions(options);
  const { lines } = scan(text, resolved.indent, resolved.strict);
  return new Decoder(new LineCursor(lines), resolved).decodeDocument();
}
