import { Command } from "commander";

import { VERSION } from "../version.js";
import { registerAuthCli } from "./auth-cli.js";
import { registerPathOptions } from "./options.js";
import { registerServeCli } from "./serve-cli.js";
import { registerToolsCli } from "./tools-cli.js";

export function buildProgram(): Command {
  const program = new Command()
    .name("workspace-mcp")
    .description("MCP servers for Google Calendar, Docs, Drive, Gmail, Meet and Sheets")
    .version(VERSION);
  registerPathOptions(program);

  registerServeCli(program);
  registerAuthCli(program);
  registerToolsCli(program);
  return program;
}
