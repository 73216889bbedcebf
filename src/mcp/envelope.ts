/**
 * tools/call result contract. Every dispatch outcome, success or failure, becomes a
 * single text content block plus an isError flag.
 */

// Type aliases rather than interfaces so results stay assignable to the SDK's CallToolResult.
export type TextContent = {
  type: 'text';
  text: string;
};

export type ToolCallResult = {
  content: TextContent[];
  isError: boolean;
};

/** Objects and arrays as 2-space JSON, everything else through String(). */
export function formatToolText(value: unknown): string {
  if (typeof value === 'object' && value !== null) return JSON.stringify(value, null, 2);
  return String(value);
}

export function toolResultOk(value: unknown): ToolCallResult {
  return {
    content: [{ type: 'text', text: formatToolText(value) }],
    isError: false,
  };
}

export function toolResultErr(toolName: string, message: string): ToolCallResult {
  return {
    content: [{ type: 'text', text: `Error executing ${toolName}: ${message}` }],
    isError: true,
  };
}
