import fs from "fs";
import path from "path";
import { decode } from "./decoder.js";
import { encode } from "./encoder.js";
import { ToonError } from "./errors.js";
import { parseJson, stringifyJson } from "./json.js";
import type { DecodeOptions, EncodeOptions } from "./options.js";
import type { ToonValue } from "./value.js";

export type DocumentFormat = "json" | "toon";

export interface DocumentOptions {
  encode?: EncodeOptions;
  decode?: DecodeOptions;
  /** Indentation of JSON output; 0 for a single line */
  jsonIndent?: number;
}

export interface ConversionResult {
  from: DocumentFormat;
  to: DocumentFormat;
  /** UTF-8 size of the written document */
  bytes: number;
}

// --- Formats ---

export function parseFormatName(name: string): DocumentFormat | undefined {
  const normalized = name.trim().toLowerCase();
  if (normalized === "json" || normalized === "toon") return normalized;
  return undefined;
}

export function detectFormat(filePath: string): DocumentFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".json") return "json";
  if (ext === ".toon") return "toon";
  throw new ToonError(`Unsupported file format: ${filePath} (expected a .json or .toon extension)`);
}

export function parseDocument(text: string, format: DocumentFormat, options: DocumentOptions = {}): ToonValue {
  return format === "json" ? parseJson(text) : decode(text, options.decode);
}

export function serializeDocument(value: ToonValue, format: DocumentFormat, options: DocumentOptions = {}): string {
  return format === "json" ? stringifyJson(value, options.jsonIndent) : encode(value, options.encode);
}

// --- Files ---

export function loadDocument(filePath: string, options: DocumentOptions = {}): ToonValue {
  const format = detectFormat(filePath);
  if (!fs.existsSync(filePath)) {
    throw new ToonError(`Input file not found: ${filePath}`);
  }
  return parseDocument(fs.readFileSync(filePath, "utf-8"), format, options);
}

/** Write a document atomically (temp file + rename). Returns the bytes written. */
export function saveDocument(value: ToonValue, filePath: string, options: DocumentOptions = {}): number {
  const text = serializeDocument(value, detectFormat(filePath), options);
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  const tmp = filePath + ".tmp";
  fs.writeFileSync(tmp, text, "utf-8");
  fs.renameSync(tmp, filePath);
  return Buffer.byteLength(text, "utf-8");
}

export function convertFile(input: string, output: string, options: DocumentOptions = {}): ConversionResult {
  const from = detectFormat(input);
  const to = detectFormat(output);
  const value = loadDocument(input, options);
  const bytes = saveDocument(value, output, options);
  return { from, to, bytes };
}
