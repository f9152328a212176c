/**
 * TOON value model: a tree of primitives, ordered objects and arrays.
 * Int and Double are separate kinds because they render differently.
 */

// --- Types ---

export type ToonPrimitive =
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "int"; readonly value: bigint }
  | { readonly kind: "double"; readonly value: number }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "null" };

export interface ToonObject {
  readonly kind: "object";
  readonly fields: ReadonlyMap<string, ToonValue>;
}

export interface ToonArray {
  readonly kind: "array";
  readonly items: readonly ToonValue[];
}

export type ToonValue = ToonPrimitive | ToonObject | ToonArray;

export type ToonKind = ToonValue["kind"];

// Plain data accepted by fromJs / produced by toJs
export type JsPrimitive = string | number | bigint | boolean | null;
export interface JsArray extends Array<JsValue> {}
export interface JsObject { [key: string]: JsValue; }
export type JsValue = JsPrimitive | JsArray | JsObject;

// --- Constants ---

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

const NULL_VALUE: ToonPrimitive = { kind: "null" };

// --- Constructors ---

export function str(value: string): ToonPrimitive {
  return { kind: "string", value };
}

export function isInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}

export function int(value: bigint | number): Extract<ToonPrimitive, { kind: "int" }> {
  if (typeof value === "number" && !Number.isInteger(value)) {
    throw new RangeError(`Not an integer: ${value}`);
  }
  const big = typeof value === "bigint" ? value : BigInt(value);
  if (!isInt64(big)) throw new RangeError(`Integer out of 64-bit range: ${big}`);
  return { kind: "int", value: big };
}

export function double(value: number): ToonPrimitive {
  return { kind: "double", value };
}

export function bool(value: boolean): ToonPrimitive {
  return { kind: "bool", value };
}

export function nil(): ToonPrimitive {
  return NULL_VALUE;
}

/** Build an object; a repeated key keeps its first position and its last value. */
export function obj(
  entries: Iterable<readonly [string, ToonValue]> | Readonly<Record<string, ToonValue>> = [],
): ToonObject {
  const fields = new Map<string, ToonValue>();
  const source = isIterable(entries) ? entries : Object.entries(entries);
  for (const [key, value] of source) fields.set(key, value);
  return { kind: "object", fields };
}

export function emptyObject(): ToonObject {
  return { kind: "object", fields: new Map() };
}

export function arr(items: readonly ToonValue[] = []): ToonArray {
  return { kind: "array", items: [...items] };
}

function isIterable(
  value: Iterable<readonly [string, ToonValue]> | Readonly<Record<string, ToonValue>>,
): value is Iterable<readonly [string, ToonValue]> {
  return Symbol.iterator in value;
}

// --- Type guards ---

export function isPrimitive(value: ToonValue): value is ToonPrimitive {
  return value.kind !== "object" && value.kind !== "array";
}

export function isObject(value: ToonValue): value is ToonObject {
  return value.kind === "object";
}

export function isArray(value: ToonValue): value is ToonArray {
  return value.kind === "array";
}

export function kindOf(value: ToonValue): ToonKind {
  return value.kind;
}

// --- Equality ---

export function valueEquals(a: ToonValue, b: ToonValue): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "string":
    case "int":
    case "double":
    case "bool":
      return isPrimitive(b) && b.kind !== "null" && b.kind === a.kind && b.value === a.value;
    case "array":
      return (
        b.kind === "array" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valueEquals(item, b.items[i]))
      );
    case "object": {
      if (b.kind !== "object" || a.fields.size !== b.fields.size) return false;
      const otherEntries = [...b.fields];
      let i = 0;
      for (const [key, value] of a.fields) {
        const [otherKey, otherValue] = otherEntries[i++];
        if (key !== otherKey || !valueEquals(value, otherValue)) return false;
      }
      return true;
    }
  }
}

// --- Conversion from/to plain data ---

function fromNumber(value: number): ToonPrimitive {
  if (!Number.isFinite(value)) return NULL_VALUE;
  if (Object.is(value, -0)) return int(0);
  if (Number.isInteger(value)) {
    const big = BigInt(value);
    return isInt64(big) ? int(big) : double(value);
  }
  return double(value);
}

/** Normalize arbitrary JavaScript data into a value tree. */
export function fromJs(value: unknown): ToonValue {
  if (value === null || value === undefined) return NULL_VALUE;
  if (typeof value === "string") return str(value);
  if (typeof value === "boolean") return bool(value);
  if (typeof value === "number") return fromNumber(value);
  if (typeof value === "bigint") return isInt64(value) ? int(value) : double(Number(value));
  if (value instanceof Date) return str(value.toISOString());
  if (Array.isArray(value)) return arr(value.map(fromJs));
  if (typeof value === "object") {
    return obj(Object.entries(value).map(([key, item]) => [key, fromJs(item)] as const));
  }
  return NULL_VALUE;
}

/** Project a value tree onto plain data. Ints outside the safe range stay bigint. */
export function toJs(value: ToonValue): JsValue {
  switch (value.kind) {
    case "null":
      return null;
    case "string":
    case "double":
    case "bool":
      return value.value;
    case "int": {
      const n = Number(value.value);
      return Number.isSafeInteger(n) ? n : value.value;
    }
    case "array":
      return value.items.map(toJs);
    case "object":
      // fromEntries defines own properties, so a "__proto__" key stays a field
      return Object.fromEntries([...value.fields].map(([key, item]): [string, JsValue] => [key, toJs(item)]));
  }
}
