import { formatArrayHeader } from "./header.js";
import { resolveEncodeOptions, type EncodeOptions, type ResolvedEncodeOptions } from "./options.js";
import { LIST_ITEM_MARKER, encodeKey, formatPrimitive } from "./primitive.js";
import {
  isArray,
  isObject,
  isPrimitive,
  type ToonArray,
  type ToonObject,
  type ToonPrimitive,
  type ToonValue,
} from "./value.js";

const LIST_ITEM_PREFIX = "- ";

// --- Array classification ---

function isArrayOfPrimitives(items: readonly ToonValue[]): items is readonly ToonPrimitive[] {
  return items.every((item) => isPrimitive(item));
}

function isArrayOfObjects(items: readonly ToonValue[]): items is readonly ToonObject[] {
  return items.every((item) => isObject(item));
}

/**
 * Field list shared by every row, or undefined when the rows cannot be
 * written as a table (differing fields or field order, nested values, no fields).
 * Rows are decoded in header order, so a different order would not read back.
 */
export function extractTabularFields(rows: readonly ToonObject[]): string[] | undefined {
  if (rows.length === 0) return undefined;
  const fields = [...rows[0].fields.keys()];
  if (fields.length === 0) return undefined;
  for (const row of rows) {
    if (row.fields.size !== fields.length) return undefined;
    let i = 0;
    for (const [key, value] of row.fields) {
      if (key !== fields[i++] || !isPrimitive(value)) return undefined;
    }
  }
  return fields;
}

// --- Line writer ---

/** Renders values into lines; one instance per encode call. */
class Encoder {
  constructor(private readonly opts: ResolvedEncodeOptions) {}

  private ind(depth: number, content: string): string {
    return " ".repeat(this.opts.indent * depth) + content;
  }

  private indList(depth: number, content: string): string {
    return this.ind(depth, LIST_ITEM_PREFIX + content);
  }

  private header(length: number, key?: string, fields?: readonly string[]): string {
    return formatArrayHeader(length, {
      key,
      fields,
      delimiter: this.opts.delimiter,
      lengthMarker: this.opts.lengthMarker,
    });
  }

  private primitive(value: ToonPrimitive): string {
    return formatPrimitive(value, this.opts.delimiter);
  }

  private joinPrimitives(values: readonly ToonPrimitive[]): string {
    return values.map((v) => this.primitive(v)).join(this.opts.delimiter);
  }

  private inlineArray(values: readonly ToonPrimitive[], key?: string): string {
    return `${this.header(values.length, key)} ${this.joinPrimitives(values)}`;
  }

  /** Replace the indentation of the first line with a list marker one level up. */
  private *markFirstLine(lines: Iterable<string>, markerDepth: number, contentDepth: number): Generator<string> {
    let first = true;
    for (const line of lines) {
      yield first ? this.indList(markerDepth, line.slice(this.opts.indent * contentDepth)) : line;
      first = false;
    }
  }

  *encodeRoot(value: ToonValue): Generator<string> {
    if (isPrimitive(value)) {
      yield this.primitive(value);
    } else if (isArray(value)) {
      yield* this.encodeArrayLines(undefined, value, 0);
    } else {
      yield* this.encodeObjectLines(value, 0);
    }
  }

  private *encodeObjectLines(value: ToonObject, depth: number): Generator<string> {
    for (const [key, field] of value.fields) {
      yield* this.encodeField(key, field, depth);
    }
  }

  private *encodeField(key: string, value: ToonValue, depth: number): Generator<string> {
    const ek = encodeKey(key);
    if (isPrimitive(value)) {
      yield this.ind(depth, `${ek}: ${this.primitive(value)}`);
    } else if (isArray(value)) {
      yield* this.encodeArrayLines(key, value, depth);
    } else {
      yield this.ind(depth, `${ek}:`);
      yield* this.encodeObjectLines(value, depth + 1);
    }
  }

  private *encodeArrayLines(key: string | undefined, value: ToonArray, depth: number): Generator<string> {
    const { items } = value;
    if (items.length === 0) {
      yield this.ind(depth, this.header(0, key, []));
      return;
    }

    // Primitive array: inline
    if (isArrayOfPrimitives(items)) {
      yield this.ind(depth, this.inlineArray(items, key));
      return;
    }

    // Uniform objects: tabular
    if (isArrayOfObjects(items)) {
      const fields = extractTabularFields(items);
      if (fields) {
        yield this.ind(depth, this.header(items.length, key, fields));
        for (const row of items) {
          const cells = fields.map((field) => row.fields.get(field)).filter(isPrimitiveCell);
          yield this.ind(depth + 1, this.joinPrimitives(cells));
        }
        return;
      }
    }

    // Everything else: one list item per element
    yield this.ind(depth, this.header(items.length, key));
    for (const item of items) {
      yield* this.encodeListItem(item, depth + 1);
    }
  }

  private *encodeListItem(value: ToonValue, depth: number): Generator<string> {
    if (isPrimitive(value)) {
      yield this.indList(depth, this.primitive(value));
    } else if (isArray(value)) {
      yield* this.markFirstLine(this.encodeArrayLines(undefined, value, depth), depth, depth);
    } else {
      yield* this.encodeObjectAsListItem(value, depth);
    }
  }

  private *encodeObjectAsListItem(value: ToonObject, depth: number): Generator<string> {
    const entries = [...value.fields];
    if (entries.length === 0) {
      yield this.ind(depth, LIST_ITEM_MARKER);
      return;
    }
    const [[firstKey, firstValue], ...rest] = entries;
    yield* this.markFirstLine(this.encodeField(firstKey, firstValue, depth + 1), depth, depth + 1);
    for (const [key, field] of rest) {
      yield* this.encodeField(key, field, depth + 1);
    }
  }
}

function isPrimitiveCell(value: ToonValue | undefined): value is ToonPrimitive {
  return value !== undefined && isPrimitive(value);
}

// --- Public API ---

export function encode(value: ToonValue, options?: EncodeOptions): string {
  const encoder = new Encoder(resolveEncodeOptions(options));
  const lines: string[] = [];
  for (const line of encoder.encodeRoot(value)) {
    lines.push(line);
  }
  return lines.join("\n");
}
