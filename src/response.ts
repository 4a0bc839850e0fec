// ============================================================================
// Workbench MCP Server - Response Helpers
// ============================================================================

import type { InvocationResult } from "./dispatcher.js";

/**
 * Standard MCP tool response types.
 */
export interface McpToolResponse {
    [key: string]: unknown;
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
}

/**
 * JSON replacer that strips null values.
 */
function stripNulls(_key: string, value: unknown): unknown {
    return value === null ? undefined : value;
}

/**
 * Return a successful JSON response (compact, no whitespace, nulls stripped).
 */
export function success(data: unknown): McpToolResponse {
    return {
        content: [{ type: "text", text: JSON.stringify(data, stripNulls) }],
    };
}

/**
 * Return an error response with structured data (compact, nulls stripped).
 */
export function errorWithData(message: string, data: Record<string, unknown>): McpToolResponse {
    return {
        isError: true,
        content: [{ type: "text", text: JSON.stringify({ error: message, ...data }, stripNulls) }],
    };
}

/**
 * Render a dispatcher outcome as an MCP tools/call result.
 */
export function toToolResponse(result: InvocationResult): McpToolResponse {
    if (result.ok) return success(result.payload);
    return errorWithData(result.message, { kind: result.kind, param: result.param, code: result.code });
}
