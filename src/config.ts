import path from "path";
import { DEFAULT_INDENT, delimiterNameSchema, type DelimiterName } from "./options.js";

export interface ServerConfig {
  indent: number;
  delimiter: DelimiterName;
  lengthMarker: boolean;
  strict: boolean;
  jsonIndent: number;
  /** Relative file paths given to tools are resolved against this directory */
  baseDir: string;
}

// --- Loading ---

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    indent: parseCount(env.TOON_MCP_INDENT, DEFAULT_INDENT, 1),
    delimiter: parseDelimiter(env.TOON_MCP_DELIMITER),
    lengthMarker: env.TOON_MCP_LENGTH_MARKER === "true", // default false
    strict: env.TOON_MCP_STRICT !== "false", // default true
    jsonIndent: parseCount(env.TOON_MCP_JSON_INDENT, 2, 0),
    baseDir: path.resolve(env.TOON_MCP_BASE_DIR || process.cwd()),
  };
}

function parseCount(value: string | undefined, defaultValue: number, min: number): number {
  if (value === undefined || value === "") return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < min ? defaultValue : parsed;
}

function parseDelimiter(value: string | undefined): DelimiterName {
  if (value === undefined || value === "") return "comma";
  const parsed = delimiterNameSchema.safeParse(value.trim().toLowerCase());
  if (parsed.success) return parsed.data;
  console.error(`[toon-mcp] Unknown TOON_MCP_DELIMITER "${value}", using comma`);
  return "comma";
}

// --- Helpers ---

export function resolveInputPath(config: ServerConfig, filePath: string): string {
  return path.resolve(config.baseDir, filePath);
}

/** One-line summary for the startup log. */
export function describeConfig(config: ServerConfig): string {
  return [
    `indent=${config.indent}`,
    `delimiter=${config.delimiter}`,
    `length_marker=${config.lengthMarker}`,
    `strict=${config.strict}`,
    `json_indent=${config.jsonIndent}`,
    `base_dir=${config.baseDir}`,
  ].join(" ");
}
