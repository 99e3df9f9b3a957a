import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createFakeGoogleApi, type FakeGoogleApi } from "../testing/fake-google.js";
import { createQuietLogger } from "../testing/logger.js";
import { getVariant } from "../tools/index.js";
import { createToolDispatcher } from "./dispatcher.js";
import { createMcpServer } from "./mcp-server.js";

describe("createMcpServer", () => {
  let api: FakeGoogleApi;
  let client: Client;

  beforeEach(async () => {
    api = createFakeGoogleApi();
    const variant = getVariant("drive");
    const dispatcher = createToolDispatcher({
      tools: variant.createTools(),
      context: api.context({ variant: "drive" }),
      logger: createQuietLogger(),
    });
    const server = createMcpServer(variant, dispatcher);
    const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "test-client", version: "1.0.0" });
    await Promise.all([server.connect(serverSide), client.connect(clientSide)]);
  });

  afterEach(async () => {
    await client.close();
  });

  it("identifies itself by variant", () => {
    expect(client.getServerVersion()).toMatchObject({
      name: "workspace-mcp-drive",
      title: "Google Drive",
    });
  });

  it("lists the variant's tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name)).toEqual([
      "search_files",
      "create_folder",
      "upload_file",
      "move_file",
      "rename_file",
      "delete_file",
      "get_file_content",
      "share_file",
      "get_file_metadata",
    ]);
    expect(tools[0]?.inputSchema.type).toBe("object");
  });

  it("returns tool output as text and structured content", async () => {
    api.on("GET", "/drive/v3/files/f1", { body: { id: "f1", name: "notes.txt" } });

    const result = await client.callTool({ name: "get_file_metadata", arguments: { fileId: "f1" } });

    expect(result.structuredContent).toEqual({ id: "f1", name: "notes.txt" });
    expect(result.content).toEqual([
      { type: "text", text: JSON.stringify({ id: "f1", name: "notes.txt" }, null, 2) },
    ]);
  });

  it("answers bad arguments with invalid params", async () => {
    await expect(
      client.callTool({ name: "get_file_metadata", arguments: {} }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
  });

  it("answers unknown tools with invalid params", async () => {
    await expect(client.callTool({ name: "send_fax", arguments: {} })).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
  });

  it("forwards Google's status and body on API failures", async () => {
    const body = { error: { code: 403, message: "The caller does not have permission" } };
    api.on("GET", "/drive/v3/files/locked", { status: 403, body });

    await expect(
      client.callTool({ name: "get_file_metadata", arguments: { fileId: "locked" } }),
    ).rejects.toMatchObject({ code: -32002, data: { status: 403, body } });
  });
});
