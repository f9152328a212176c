import jsonc from "jsonc-parser";
import type { Node, ParseError } from "jsonc-parser";
import { ToonError } from "./errors.js";
import { formatDouble } from "./primitive.js";
import { arr, bool, double, int, isInt64, nil, obj, str, type ToonPrimitive, type ToonValue } from "./value.js";

const PARSE_OPTIONS = { disallowComments: true, allowTrailingComma: false, allowEmptyContent: false };

function lineAt(text: string, offset: number): number {
  return text.slice(0, offset).split("\n").length;
}

/**
 * Parse JSON text into the value model, working from the syntax tree so that
 * member order and the source text of every number are kept. Numbers without
 * a fraction or exponent are Int (Double outside int64).
 */
export function parseJson(text: string): ToonValue {
  const errors: ParseError[] = [];
  const root = jsonc.parseTree(text, errors, PARSE_OPTIONS);
  const first = errors[0];
  if (first !== undefined) {
    throw new ToonError(`Invalid JSON: ${jsonc.printParseErrorCode(first.error)}`, {
      line: lineAt(text, first.offset),
    });
  }
  if (root === undefined) {
    throw new ToonError("Invalid JSON: no value", { line: 1 });
  }
  return fromNode(root, text);
}

function parseJsonNumber(raw: string): ToonPrimitive {
  if (!/[.eE]/.test(raw)) {
    const big = BigInt(raw);
    if (isInt64(big)) return int(big);
  }
  const n = Number(raw);
  return Number.isFinite(n) ? double(n) : nil();
}

function memberEntry(member: Node, text: string): [string, ToonValue] {
  const [keyNode, valueNode] = member.children ?? [];
  if (keyNode === undefined || valueNode === undefined) {
    throw new ToonError("Invalid JSON: incomplete object member", { line: lineAt(text, member.offset) });
  }
  return [String(keyNode.value), fromNode(valueNode, text)];
}

function fromNode(node: Node, text: string): ToonValue {
  switch (node.type) {
    case "object":
      return obj((node.children ?? []).map((member) => memberEntry(member, text)));
    case "array":
      return arr((node.children ?? []).map((child) => fromNode(child, text)));
    case "string":
      return str(String(node.value));
    case "number":
      return parseJsonNumber(text.slice(node.offset, node.offset + node.length));
    case "boolean":
      return bool(node.value === true);
    case "null":
      return nil();
    case "property":
      return memberEntry(node, text)[1];
  }
}

/**
 * Serialize a value as JSON. Int digits are written exactly and integral
 * Doubles keep their `.0`. `indent = 0` writes everything on one line.
 */
export function stringifyJson(value: ToonValue, indent = 2): string {
  return writeJson(value, indent, 0);
}

function writeJson(value: ToonValue, indent: number, depth: number): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "int":
      return value.value.toString();
    case "double":
      return formatDouble(value.value);
    case "string":
      return JSON.stringify(value.value);
    case "array": {
      const items = value.items.map((item) => writeJson(item, indent, depth + 1));
      return wrap("[", "]", items, indent, depth);
    }
    case "object": {
      const sep = indent > 0 ? ": " : ":";
      const members = [...value.fields].map(
        ([key, field]) => `${JSON.stringify(key)}${sep}${writeJson(field, indent, depth + 1)}`,
      );
      return wrap("{", "}", members, indent, depth);
    }
  }
}

function wrap(open: string, close: string, parts: string[], indent: number, depth: number): string {
  if (parts.length === 0) return open + close;
  if (indent === 0) return open + parts.join(",") + close;
  const inner = " ".repeat(indent * (depth + 1));
  const outer = " ".repeat(indent * depth);
  return `${open}\n${inner}${parts.join(`,\n${inner}`)}\n${outer}${close}`;
}
