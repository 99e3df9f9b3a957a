import type { Command } from "commander";

import { parseLogLevel, parsePort, type WorkspaceConfig } from "../config/config.js";
import { createCredentialResolver } from "../google/credential-resolver.js";
import { ConfigurationError } from "../google/errors.js";
import { createServiceFactory } from "../google/service-factory.js";
import { createSubsystemLogger } from "../logging.js";
import { closeDispatchContext, openDispatchContext } from "../server/context.js";
import { createToolDispatcher } from "../server/dispatcher.js";
import { createLifecycle } from "../server/lifecycle.js";
import { createMcpServer } from "../server/mcp-server.js";
import { startHttpTransport, startStdioTransport } from "../server/transport.js";
import type { ServerVariant } from "../tools/index.js";
import { configFromCommand, parseVariant, runCommand } from "./options.js";

export type ServeOptions = {
  transport: string;
  port?: string;
  host?: string;
  logLevel?: string;
  interactive: boolean;
  open: boolean;
};

type TransportKind = "stdio" | "http";

function parseTransport(raw: string): TransportKind {
  if (raw === "stdio" || raw === "http") return raw;
  throw new ConfigurationError(`Unknown transport: ${raw} (expected stdio or http)`);
}

export async function serve(
  variant: ServerVariant,
  transport: TransportKind,
  config: WorkspaceConfig,
  opts: Pick<ServeOptions, "interactive" | "open">,
): Promise<void> {
  const log = createSubsystemLogger(`serve:${variant.name}`, { level: config.logLevel });
  const lifecycle = createLifecycle({ logger: log.child("lifecycle") });
  lifecycle.installProcessHandlers();

  const resolver = createCredentialResolver({
    config,
    interactive: opts.interactive,
    openBrowser: opts.open,
    logger: log.child("auth"),
  });
  const factory = createServiceFactory({ resolver, logger: log.child("services") });
  const context = await openDispatchContext(variant, {
    factory,
    driveFolderId: config.driveFolderId,
    logger: log.child("context"),
  });
  lifecycle.defer("dispatch context", () => closeDispatchContext(context, log.child("context")));

  const dispatcher = createToolDispatcher({
    tools: variant.createTools(),
    context,
    logger: log.child("dispatch"),
  });
  const newServer = () => createMcpServer(variant, dispatcher);

  if (transport === "http") {
    const running = await startHttpTransport({
      host: config.host,
      port: config.port,
      variant: variant.name,
      createServer: newServer,
      logger: log.child("http"),
    });
    lifecycle.defer("http transport", () => running.close());
    return;
  }

  const running = await startStdioTransport(newServer(), log.child("stdio"));
  lifecycle.defer("stdio transport", () => running.close());
  // The client owns stdin; when it goes away so do we.
  process.stdin.once("end", () => lifecycle.exitAfterShutdown("stdin closed", 0));
}

export function registerServeCli(program: Command) {
  program
    .command("serve")
    .description("Run an MCP server for one Google Workspace product")
    .argument("<variant>", "calendar, docs, drive, gmail, meet or sheets")
    .option("-t, --transport <kind>", "stdio or http", "stdio")
    .option("-p, --port <port>", "HTTP port (env PORT, default 8000)")
    .option("--host <host>", "HTTP bind address (env HOST, default 127.0.0.1)")
    .option("--log-level <level>", "debug, info, warn, error or silent (env LOG_LEVEL)")
    .option("--no-interactive", "Fail instead of starting a browser sign-in")
    .option("--no-open", "Print the sign-in URL without opening a browser")
    .action(async (variantName: string, opts: ServeOptions, command: Command) => {
      await runCommand("Server startup", async () => {
        const variant = parseVariant(variantName);
        const transport = parseTransport(opts.transport);
        const config = configFromCommand(command, {
          port: opts.port === undefined ? undefined : parsePort(opts.port),
          host: opts.host,
          logLevel: opts.logLevel === undefined ? undefined : parseLogLevel(opts.logLevel),
        });
        await serve(variant, transport, config, opts);
      });
    });
}
