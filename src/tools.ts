import { z } from "zod";
import { resolveInputPath, type ServerConfig } from "./config.js";
import { decode } from "./decoder.js";
import { encode } from "./encoder.js";
import { ToonDecodeError, ToonError } from "./errors.js";
import {
  convertFile,
  detectFormat,
  loadDocument,
  parseFormatName,
  serializeDocument,
  type DocumentFormat,
  type DocumentOptions,
} from "./files.js";
import { parseJson, stringifyJson } from "./json.js";
import { delimiterNameSchema, type DecodeOptions, type DelimiterName, type EncodeOptions } from "./options.js";
import { scan } from "./scanner.js";
import { fromJs, kindOf } from "./value.js";

// --- Schemas ---

const indentArg = z.number().int().min(0).optional().describe("Spaces per indentation level");
const delimiterArg = delimiterNameSchema.optional().describe("Array value delimiter: comma, tab or pipe");
const strictArg = z.boolean().optional().describe("Reject length, row width and indentation errors (default true)");

export const jsonToToonSchema = z.object({
  json: z.string().describe("JSON text to convert"),
  indent: indentArg,
  delimiter: delimiterArg,
  length_marker: z.boolean().optional().describe("Write array lengths as [#N]"),
});

export const toonToJsonSchema = z.object({
  toon: z.string().describe("TOON text to convert"),
  strict: strictArg,
  indent: indentArg,
  delimiter: delimiterArg,
  json_indent: z.number().int().min(0).optional().describe("JSON indentation; 0 for a single line"),
});

export const validateToonSchema = z.object({
  toon: z.string().describe("TOON text to check"),
  strict: strictArg,
  indent: indentArg,
  delimiter: delimiterArg,
});

export const convertFileSchema = z.object({
  input: z.string().describe("Path of a .json or .toon file"),
  output: z.string().optional().describe("Path to write; the format follows its extension"),
  to: z.string().optional().describe("Format of the returned text when no output is given: json or toon"),
});

export type JsonToToonArgs = z.infer<typeof jsonToToonSchema>;
export type ToonToJsonArgs = z.infer<typeof toonToJsonSchema>;
export type ValidateToonArgs = z.infer<typeof validateToonSchema>;
export type ConvertFileArgs = z.infer<typeof convertFileSchema>;

// --- Option merging ---

interface FormatArgs {
  indent?: number;
  delimiter?: DelimiterName;
}

function encodeOptionsFor(config: ServerConfig, args: FormatArgs & { length_marker?: boolean }): EncodeOptions {
  return {
    indent: args.indent ?? config.indent,
    delimiter: args.delimiter ?? config.delimiter,
    lengthMarker: args.length_marker ?? config.lengthMarker,
  };
}

function decodeOptionsFor(config: ServerConfig, args: FormatArgs & { strict?: boolean }): DecodeOptions {
  return {
    strict: args.strict ?? config.strict,
    indent: args.indent ?? config.indent,
    delimiter: args.delimiter ?? config.delimiter,
  };
}

function documentOptionsFor(config: ServerConfig): DocumentOptions {
  return {
    encode: encodeOptionsFor(config, {}),
    decode: decodeOptionsFor(config, {}),
    jsonIndent: config.jsonIndent,
  };
}

// --- Handlers ---

export function jsonToToon(args: JsonToToonArgs, config: ServerConfig): string {
  return encode(parseJson(args.json), encodeOptionsFor(config, args));
}

export function toonToJson(args: ToonToJsonArgs, config: ServerConfig): string {
  const value = decode(args.toon, decodeOptionsFor(config, args));
  return stringifyJson(value, args.json_indent ?? config.jsonIndent);
}

/**
 * Report on a TOON document as TOON. Decode errors are part of the report;
 * invalid options still fail the call.
 */
export function validateToon(args: ValidateToonArgs, config: ServerConfig): string {
  const { lines, blankLines } = scan(args.toon, 1, false);
  const counts = { lines: lines.length, blank_lines: blankLines.length };
  try {
    const value = decode(args.toon, decodeOptionsFor(config, args));
    return encode(fromJs({ valid: true, root: kindOf(value), ...counts }));
  } catch (e: unknown) {
    if (!(e instanceof ToonDecodeError)) throw e;
    return encode(
      fromJs({
        valid: false,
        ...counts,
        error: e.reason,
        ...(e.line !== undefined ? { line: e.line } : {}),
        code: e.code,
      }),
    );
  }
}

function targetFormat(to: string | undefined, from: DocumentFormat): DocumentFormat {
  if (to === undefined) return from === "json" ? "toon" : "json";
  const format = parseFormatName(to);
  if (format === undefined) {
    throw new ToonError(`Unknown format "${to}" (expected json or toon)`);
  }
  return format;
}

export function convertFileTool(args: ConvertFileArgs, config: ServerConfig): string {
  const input = resolveInputPath(config, args.input);
  const options = documentOptionsFor(config);

  if (args.output === undefined) {
    const to = targetFormat(args.to, detectFormat(input));
    return serializeDocument(loadDocument(input, options), to, options);
  }

  const output = resolveInputPath(config, args.output);
  const result = convertFile(input, output, options);
  return encode(fromJs({ input, output, ...result }));
}
