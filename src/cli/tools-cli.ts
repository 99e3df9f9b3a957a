import type { Command } from "commander";

import { info, muted } from "../globals.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { describeTool } from "../server/dispatcher.js";
import { listVariants, type ServerVariant } from "../tools/index.js";
import { parseVariant, runCommand } from "./options.js";

export function printToolCatalog(
  variants: readonly ServerVariant[],
  opts: { json?: boolean },
  runtime: RuntimeEnv = defaultRuntime,
): void {
  if (opts.json) {
    const catalog = Object.fromEntries(
      variants.map((variant) => [variant.name, variant.createTools().map(describeTool)]),
    );
    runtime.log(JSON.stringify(catalog, null, 2));
    return;
  }
  for (const variant of variants) {
    const tools = variant.createTools();
    runtime.log(info(`${variant.title} (${variant.name}, ${tools.length} tools)`));
    for (const tool of tools) {
      runtime.log(`  ${tool.name.padEnd(28)} ${muted(tool.description)}`);
    }
    runtime.log("");
  }
}

export function registerToolsCli(program: Command) {
  program
    .command("tools")
    .description("List the tools each server exposes")
    .argument("[variant]", "Only this server")
    .option("--json", "Output the MCP tool descriptors as JSON", false)
    .action(async (variantName: string | undefined, opts: { json?: boolean }) => {
      await runCommand("Listing tools", async () => {
        const variants = variantName ? [parseVariant(variantName)] : listVariants();
        printToolCatalog(variants, opts);
      });
    });
}
