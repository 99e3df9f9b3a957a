/**
 * Transports: stdio, or streamable HTTP in stateless mode (a fresh MCP server
 * per request, all sharing one dispatch context) plus a health endpoint.
 */

import type { Server as HttpServer } from "node:http";

import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express from "express";

import { formatErrorMessage } from "../google/errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging.js";

export type RunningTransport = {
  /** Base URL for HTTP, "stdio" otherwise. */
  readonly address: string;
  close(): Promise<void>;
};

export async function startStdioTransport(
  server: Server,
  logger: SubsystemLogger = createSubsystemLogger("transport"),
): Promise<RunningTransport> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Serving MCP over stdio");
  return {
    address: "stdio",
    close: () => server.close(),
  };
}

export type HttpTransportOptions = {
  host: string;
  port: number;
  variant: string;
  createServer: () => Server;
  logger?: SubsystemLogger;
};

function jsonRpcError(code: number, message: string) {
  return { jsonrpc: "2.0", error: { code, message }, id: null };
}

export function createHttpApp(options: HttpTransportOptions): express.Express {
  const log = options.logger ?? createSubsystemLogger("transport");
  const app = express();
  app.use(express.json({ limit: "25mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", variant: options.variant });
  });

  app.post("/mcp", async (req, res) => {
    const server = options.createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    res.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((err: unknown) => {
        log.warn(`Failed to release request transport: ${formatErrorMessage(err)}`);
      });
    });
    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      log.error(`MCP request failed: ${formatErrorMessage(err)}`);
      if (!res.headersSent) {
        res.status(500).json(jsonRpcError(-32603, "Internal server error"));
      }
    }
  });

  // Stateless: no standalone SSE stream and no sessions to end.
  const methodNotAllowed: express.RequestHandler = (_req, res) => {
    res.status(405).set("Allow", "POST").json(jsonRpcError(-32000, "Method not allowed."));
  };
  app.get("/mcp", methodNotAllowed);
  app.delete("/mcp", methodNotAllowed);

  return app;
}

export async function startHttpTransport(options: HttpTransportOptions): Promise<RunningTransport> {
  const log = options.logger ?? createSubsystemLogger("transport");
  const app = createHttpApp(options);

  const httpServer = await new Promise<HttpServer>((resolve, reject) => {
    const listener = app.listen(options.port, options.host, () => {
      listener.off("error", reject);
      resolve(listener);
    });
    listener.once("error", reject);
  });

  const bound = httpServer.address();
  const port = typeof bound === "object" && bound !== null ? bound.port : options.port;
  const address = `http://${options.host}:${port}`;
  log.info(`Serving MCP over HTTP at ${address}/mcp`);

  return {
    address,
    close: () =>
      new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
        httpServer.closeAllConnections();
      }),
  };
}
