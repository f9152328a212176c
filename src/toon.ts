/**
 * TOON (Token-Oriented Object Notation) codec.
 *
 * `decode` turns TOON text into a value tree and `encode` writes one back.
 * The JSON bridge and the file helpers convert between the two formats.
 */

export { decode, isKeyValueLine, parseKeyToken } from "./decoder.js";
export { encode, extractTabularFields } from "./encoder.js";
export { ToonDecodeError, ToonError, ToonOptionsError, type DecodeErrorCode } from "./errors.js";
export {
  convertFile,
  detectFormat,
  loadDocument,
  parseDocument,
  parseFormatName,
  saveDocument,
  serializeDocument,
  type ConversionResult,
  type DocumentFormat,
  type DocumentOptions,
} from "./files.js";
export { formatArrayHeader, parseArrayHeader, splitDelimited, type ArrayHeader, type HeaderFormat } from "./header.js";
export { parseJson, stringifyJson } from "./json.js";
export {
  DEFAULT_INDENT,
  DELIMITERS,
  resolveDecodeOptions,
  resolveEncodeOptions,
  type DecodeOptions,
  type Delimiter,
  type DelimiterName,
  type EncodeOptions,
  type ResolvedDecodeOptions,
  type ResolvedEncodeOptions,
} from "./options.js";
export { formatPrimitive, needsQuoting, parsePrimitiveToken } from "./primitive.js";
export { LineCursor, scan, type ScanResult, type ScannedLine } from "./scanner.js";
export {
  arr,
  bool,
  double,
  emptyObject,
  fromJs,
  int,
  isArray,
  isObject,
  isPrimitive,
  kindOf,
  nil,
  obj,
  str,
  toJs,
  valueEquals,
  type JsValue,
  type ToonArray,
  type ToonKind,
  type ToonObject,
  type ToonPrimitive,
  type ToonValue,
} from "./value.js";
