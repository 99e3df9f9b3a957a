import { ErrorCode, McpError, type Tool } from "@modelcontextprotocol/sdk/types.js";

import {
  AUTHENTICATION_ERROR_CODE,
  AuthenticationError,
  EXTERNAL_API_ERROR_CODE,
  ExternalApiError,
  formatErrorMessage,
  toExternalApiError,
} from "../google/errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging.js";
import {
  type AnyWorkspaceTool,
  type ToolContext,
  ToolInputError,
  type ToolResult,
} from "../tools/common.js";

export type ToolDispatcherOptions = {
  tools: readonly AnyWorkspaceTool[];
  context: ToolContext;
  logger?: SubsystemLogger;
};

/**
 * Translate a tool failure into the JSON-RPC error the client sees.
 */
export function toMcpError(err: unknown): McpError {
  if (err instanceof McpError) return err;
  if (err instanceof ToolInputError) {
    return new McpError(ErrorCode.InvalidParams, err.message);
  }
  if (err instanceof AuthenticationError) {
    return new McpError(AUTHENTICATION_ERROR_CODE, err.message);
  }
  const external = toExternalApiError(err);
  if (external instanceof ExternalApiError) {
    return new McpError(EXTERNAL_API_ERROR_CODE, external.message, external.toJSON());
  }
  return new McpError(ErrorCode.InternalError, formatErrorMessage(err));
}

export function describeTool(tool: AnyWorkspaceTool): Tool {
  return {
    name: tool.name,
    title: tool.label,
    description: tool.description,
    inputSchema: {
      type: "object",
      properties: tool.parameters.properties,
      required: tool.parameters.required,
    },
  };
}

export function createToolDispatcher(options: ToolDispatcherOptions) {
  const log = options.logger ?? createSubsystemLogger("dispatch");
  const byName = new Map(options.tools.map((tool) => [tool.name, tool]));

  return {
    list: (): Tool[] => options.tools.map(describeTool),

    call: async (name: string, args: unknown, callId: string): Promise<ToolResult> => {
      const tool = byName.get(name);
      if (!tool) {
        throw new McpError(ErrorCode.InvalidParams, `Unknown tool: ${name}`);
      }
      const started = Date.now();
      try {
        const result = await tool.execute(callId, args, options.context);
        log.debug("Tool call finished", { tool: name, ms: Date.now() - started });
        return result;
      } catch (err) {
        const mapped = toMcpError(err);
        log.warn(`Tool call failed: ${formatErrorMessage(err)}`, { tool: name, code: mapped.code });
        throw mapped;
      }
    },
  };
}

export type ToolDispatcher = ReturnType<typeof createToolDispatcher>;
