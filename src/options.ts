import { z } from "zod";
import { ToonOptionsError } from "./errors.js";

// --- Delimiters ---

export const DELIMITERS = {
  comma: ",",
  tab: "\t",
  pipe: "|",
} as const;

export type DelimiterName = keyof typeof DELIMITERS;
export type Delimiter = (typeof DELIMITERS)[DelimiterName];

export const DEFAULT_INDENT = 2;

export const delimiterNameSchema = z.enum(["comma", "tab", "pipe"]);

export function isDelimiter(value: string): value is Delimiter {
  return value === DELIMITERS.comma || value === DELIMITERS.tab || value === DELIMITERS.pipe;
}

// --- Schemas ---

const encodeOptionsSchema = z
  .object({
    indent: z.number().int().min(0).default(DEFAULT_INDENT),
    delimiter: delimiterNameSchema.default("comma"),
    lengthMarker: z.boolean().default(false),
  })
  .strict();

const decodeOptionsSchema = z
  .object({
    strict: z.boolean().default(true),
    indent: z.number().int().min(1).default(DEFAULT_INDENT),
    delimiter: delimiterNameSchema.default("comma"),
  })
  .strict();

export type EncodeOptions = z.input<typeof encodeOptionsSchema>;
export type DecodeOptions = z.input<typeof decodeOptionsSchema>;

export interface ResolvedEncodeOptions {
  indent: number;
  delimiter: Delimiter;
  lengthMarker: boolean;
}

export interface ResolvedDecodeOptions {
  strict: boolean;
  indent: number;
  delimiter: Delimiter;
}

// --- Resolution ---

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "options"}: ${issue.message}`)
    .join("; ");
}

export function resolveEncodeOptions(options: EncodeOptions = {}): ResolvedEncodeOptions {
  const parsed = encodeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ToonOptionsError(`Invalid encode options: ${describeIssues(parsed.error)}`);
  }
  return { ...parsed.data, delimiter: DELIMITERS[parsed.data.delimiter] };
}

export function resolveDecodeOptions(options: DecodeOptions = {}): ResolvedDecodeOptions {
  const parsed = decodeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ToonOptionsError(`Invalid decode options: ${describeIssues(parsed.error)}`);
  }
  return { ...parsed.data, delimiter: DELIMITERS[parsed.data.delimiter] };
}
