export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

/**
 * Safely extract a message string from an unknown error value.
 */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  return String(e);
}

export function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

export function errorResult(e: unknown): ToolResult {
  return {
    content: [{ type: "text", text: `Error: ${errorMessage(e)}` }],
    isError: true,
  };
}

/**
 * Turn a handler that returns text (or throws) into an MCP tool callback.
 * Failures become an `isError` result so the client sees the message.
 */
export function wrapHandler<A>(
  toolName: string,
  handler: (args: A) => string | Promise<string>,
): (args: A) => Promise<ToolResult> {
  return async (args) => {
    try {
      return textResult(await handler(args));
    } catch (e: unknown) {
      console.error(`[toon-mcp] ${toolName} failed: ${errorMessage(e)}`);
      return errorResult(e);
    }
  };
}
