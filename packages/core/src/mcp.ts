/**
 * MCP tool response helpers.
 * Tools answer with a JSON text block plus the same data as structured content.
 */

import type { Result } from "./result.js";

export interface TextContent {
  type: "text";
  text: string;
}

export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
};

export interface ToolErrorContent extends Record<string, unknown> {
  success: false;
  error: string;
  code?: string;
}

/**
 * Error code carried by domain errors (`NotFoundError#code` and friends).
 */
function errorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Error response that automated callers can branch on.
 */
export function errorResponse(error: string | Error): ToolResponse<ToolErrorContent> {
  const message = typeof error === "string" ? error : error.message;
  const code = typeof error === "string" ? undefined : errorCode(error);
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: code ? { success: false, error: message, code } : { success: false, error: message },
    isError: true,
  };
}

/**
 * Success response whose text block is the JSON encoding of `payload`.
 */
export function jsonResponse<T extends Record<string, unknown>>(
  payload: unknown,
  data: T
): ToolResponse<T & { success: true }> {
  return {
    content: [{ type: "text", text: JSON.stringify(payload) }],
    structuredContent: { success: true, ...data },
  };
}

/**
 * Format a Result: the formatter on success, an error response otherwise.
 */
export function resultToResponse<T, E extends string | Error, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => ToolResponse<S>
): ToolResponse<S> | ToolResponse<ToolErrorContent> {
  if (result.ok) {
    return formatter(result.value);
  }
  return errorResponse(result.error);
}
