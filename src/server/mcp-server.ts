import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";

import type { ServerVariant } from "../tools/index.js";
import { VERSION } from "../version.js";
import type { ToolDispatcher } from "./dispatcher.js";

/**
 * A low-level MCP server answering `tools/list` and `tools/call` from the
 * dispatcher. Cheap to create: the HTTP transport makes one per request.
 */
export function createMcpServer(variant: ServerVariant, dispatcher: ToolDispatcher): Server {
  const server = new Server(
    { name: `workspace-mcp-${variant.name}`, title: variant.title, version: VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: dispatcher.list() }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) =>
    dispatcher.call(request.params.name, request.params.arguments ?? {}, String(extra.requestId)),
  );

  return server;
}
