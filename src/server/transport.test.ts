import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createFakeGoogleApi } from "../testing/fake-google.js";
import { createQuietLogger } from "../testing/logger.js";
import { getVariant } from "../tools/index.js";
import { createToolDispatcher } from "./dispatcher.js";
import { createMcpServer } from "./mcp-server.js";
import { type RunningTransport, startHttpTransport } from "./transport.js";

describe("startHttpTransport", () => {
  let running: RunningTransport;

  beforeEach(async () => {
    const api = createFakeGoogleApi();
    const variant = getVariant("calendar");
    const logger = createQuietLogger();
    const dispatcher = createToolDispatcher({
      tools: variant.createTools(),
      context: api.context({ variant: "calendar" }),
      logger,
    });
    running = await startHttpTransport({
      host: "127.0.0.1",
      port: 0,
      variant: "calendar",
      createServer: () => createMcpServer(variant, dispatcher),
      logger,
    });
  });

  afterEach(async () => {
    await running.close();
  });

  it("binds an ephemeral port", () => {
    expect(running.address).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);
    expect(running.address.endsWith(":0")).toBe(false);
  });

  it("reports health with the variant", async () => {
    const res = await fetch(`${running.address}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", variant: "calendar" });
  });

  it("refuses GET on the MCP endpoint", async () => {
    const res = await fetch(`${running.address}/mcp`);
    expect(res.status).toBe(405);
    expect(res.headers.get("allow")).toBe("POST");
  });

  it("serves MCP requests without a session", async () => {
    const client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(new StreamableHTTPClientTransport(new URL(`${running.address}/mcp`)));
    try {
      const { tools } = await client.listTools();
      expect(tools.length).toBeGreaterThan(0);
      expect(tools.some((tool) => tool.name === "event_list")).toBe(true);
    } finally {
      await client.close();
    }
  });
});
