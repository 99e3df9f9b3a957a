import { Type } from "@sinclair/typebox";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { describe, expect, it } from "vitest";

import { AuthenticationError, ExternalApiError } from "../google/errors.js";
import { createFakeGoogleApi } from "../testing/fake-google.js";
import { createQuietLogger } from "../testing/logger.js";
import { defineTool, jsonResult, ToolInputError } from "../tools/common.js";
import { createToolDispatcher, describeTool, toMcpError } from "./dispatcher.js";

const echo = defineTool({
  name: "echo",
  label: "Echo",
  description: "Return the message",
  parameters: Type.Object({ message: Type.String() }),
  execute: async (_id, params) => jsonResult({ message: params.message }),
});

const failing = defineTool({
  name: "fail",
  label: "Fail",
  description: "Throw the named error",
  parameters: Type.Object({ kind: Type.String() }),
  execute: async (_id, params) => {
    if (params.kind === "auth") throw new AuthenticationError("No valid Google credentials found");
    throw new Error("unexpected");
  },
});

function dispatcher() {
  const logger = createQuietLogger();
  const api = createFakeGoogleApi();
  return {
    logger,
    dispatch: createToolDispatcher({ tools: [echo, failing], context: api.context(), logger }),
  };
}

describe("toMcpError", () => {
  it("maps input errors to invalid params", () => {
    const mapped = toMcpError(new ToolInputError("Invalid arguments for echo: /message: bad"));
    expect(mapped.code).toBe(ErrorCode.InvalidParams);
    expect(mapped.message).toContain("Invalid arguments for echo: /message: bad");
  });

  it("maps authentication failures to -32001", () => {
    expect(toMcpError(new AuthenticationError("expired")).code).toBe(-32001);
  });

  it("keeps the Google status and body on external failures", () => {
    const mapped = toMcpError(
      new ExternalApiError("Not found", { status: 404, body: { error: { code: 404 } } }),
    );
    expect(mapped.code).toBe(-32002);
    expect(mapped.data).toEqual({ status: 404, body: { error: { code: 404 } } });
  });

  it("maps anything else to an internal error", () => {
    const mapped = toMcpError(new Error("unexpected"));
    expect(mapped.code).toBe(ErrorCode.InternalError);
    expect(mapped.message).toContain("unexpected");
  });

  it("passes protocol errors through", () => {
    const original = new McpError(ErrorCode.InvalidRequest, "nope");
    expect(toMcpError(original)).toBe(original);
  });
});

describe("describeTool", () => {
  it("publishes the object schema with its required fields", () => {
    expect(JSON.parse(JSON.stringify(describeTool(echo)))).toEqual({
      name: "echo",
      title: "Echo",
      description: "Return the message",
      inputSchema: {
        type: "object",
        properties: { message: { type: "string" } },
        required: ["message"],
      },
    });
  });
});

describe("createToolDispatcher", () => {
  it("lists the tools in catalog order", () => {
    expect(dispatcher().dispatch.list().map((tool) => tool.name)).toEqual(["echo", "fail"]);
  });

  it("runs a tool with validated arguments", async () => {
    const result = await dispatcher().dispatch.call("echo", { message: "hi" }, "1");
    expect(result.structuredContent).toEqual({ message: "hi" });
  });

  it("rejects unknown tools as invalid params", async () => {
    await expect(dispatcher().dispatch.call("nope", {}, "1")).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
  });

  it("rejects arguments that fail the schema", async () => {
    await expect(dispatcher().dispatch.call("echo", { message: 5 }, "1")).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
  });

  it("logs and maps tool failures", async () => {
    const { dispatch, logger } = dispatcher();

    await expect(dispatch.call("fail", { kind: "auth" }, "1")).rejects.toMatchObject({
      code: -32001,
    });
    await expect(dispatch.call("fail", { kind: "other" }, "2")).rejects.toMatchObject({
      code: ErrorCode.InternalError,
    });
    expect(logger.warn).toHaveBeenCalledWith(
      "Tool call failed: No valid Google credentials found",
      { tool: "fail", code: -32001 },
    );
  });
});
