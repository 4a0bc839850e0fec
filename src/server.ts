// ============================================================================
// Workbench MCP Server - MCP Surface
//
// tools/list advertises every registered descriptor; tools/call hands the
// name and argument bag to the dispatcher and renders whatever comes back.
// Validation lives in the dispatcher, so the low-level Server is used rather
// than McpServer.registerTool (which would validate with its own schemas).
// ============================================================================

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { SERVER_NAME, SERVER_VERSION } from "./constants.js";
import type { Dispatcher } from "./dispatcher.js";
import type { ToolRegistry } from "./registry.js";
import { toToolResponse } from "./response.js";
import { toJsonSchema, type OperationDescriptor, type ToolInputSchema } from "./schema.js";

export interface ToolDefinition {
    name: string;
    title: string;
    description: string;
    inputSchema: ToolInputSchema;
}

export function toToolDefinition(descriptor: OperationDescriptor): ToolDefinition {
    return {
        name: descriptor.name,
        title: descriptor.title,
        description: descriptor.description,
        inputSchema: toJsonSchema(descriptor.params),
    };
}

export function createMcpServer(registry: ToolRegistry, dispatcher: Dispatcher): Server {
    const server = new Server(
        { name: SERVER_NAME, version: SERVER_VERSION },
        { capabilities: { tools: {} } },
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
        tools: registry.list().map(toToolDefinition),
    }));

    server.setRequestHandler(CallToolRequestSchema, async (req) => {
        const result = await dispatcher.invoke(req.params.name, req.params.arguments ?? {});
        return toToolResponse(result);
    });

    return server;
}
