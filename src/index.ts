#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { describeConfig, loadConfig } from "./config.js";
import { wrapHandler } from "./helpers.js";
import {
  convertFileSchema,
  convertFileTool,
  jsonToToon,
  jsonToToonSchema,
  toonToJson,
  toonToJsonSchema,
  validateToon,
  validateToonSchema,
  type ConvertFileArgs,
  type JsonToToonArgs,
  type ToonToJsonArgs,
  type ValidateToonArgs,
} from "./tools.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, "..", ".env") });

const config = loadConfig();

const server = new McpServer({
  name: "toon-mcp",
  version: "0.1.0",
});

// ============================================================
// TOOLS
// ============================================================

server.registerTool(
  "json_to_toon",
  {
    description: "Convert JSON text to TOON. Uniform arrays of objects become tables; primitive arrays are written inline.",
    inputSchema: jsonToToonSchema.shape,
  },
  wrapHandler("json_to_toon", (args: JsonToToonArgs) => jsonToToon(args, config)),
);

server.registerTool(
  "toon_to_json",
  {
    description: "Convert TOON text to JSON. Errors name the line they were found on.",
    inputSchema: toonToJsonSchema.shape,
  },
  wrapHandler("toon_to_json", (args: ToonToJsonArgs) => toonToJson(args, config)),
);

server.registerTool(
  "validate_toon",
  {
    description: "Check a TOON document and report whether it decodes, its root kind, line counts, and the first error.",
    inputSchema: validateToonSchema.shape,
  },
  wrapHandler("validate_toon", (args: ValidateToonArgs) => validateToon(args, config)),
);

server.registerTool(
  "convert_file",
  {
    description: "Convert a .json file to .toon or back. Without output, returns the converted text instead of writing it.",
    inputSchema: convertFileSchema.shape,
  },
  wrapHandler("convert_file", (args: ConvertFileArgs) => convertFileTool(args, config)),
);

// ============================================================
// START SERVER
// ============================================================

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[toon-mcp] Server running on stdio (${describeConfig(config)})`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
