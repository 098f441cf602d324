/**
 * MCP (Model Context Protocol) response utilities.
 * Helpers for creating consistent tool responses.
 */

import type { Result } from "./result.js";

/**
 * MCP text content block.
 */
export interface TextContent {
  type: "text";
  text: string;
}

/**
 * MCP tool response structure.
 */
export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
};

/**
 * Create a simple text response.
 */
export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

/**
 * Create an error response from a string message.
 */
export function errorResponse(message: string): ToolResponse<{ success: false; error: string }> {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
    isError: true,
  };
}

/**
 * Create a success response with text and structured content.
 */
export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data: T
): ToolResponse<T & { success: true }> {
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}

/**
 * Convert a Result to an MCP tool response.
 * On success, calls the formatter function; on error, returns an error response.
 */
export function resultToResponse<T, E extends string | Error>(
  result: Result<T, E>,
  formatter: (value: T) => ToolResponse
): ToolResponse {
  if (result.ok) {
    return formatter(result.value);
  }
  const error: string | Error = result.error;
  const message = error instanceof Error ? error.message : error;
  return errorResponse(message);
}
