import type { Command } from "commander";

import { type ConfigOverrides, loadWorkspaceConfig, type WorkspaceConfig } from "../config/config.js";
import { ConfigurationError, formatErrorMessage } from "../google/errors.js";
import { danger } from "../globals.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { getVariant, isVariantName, type ServerVariant, VARIANT_NAMES } from "../tools/index.js";

/** Path flags accepted by every command. */
export type PathOptions = {
  tokenPath?: string;
  credentialsPath?: string;
  serviceAccountPath?: string;
};

export function registerPathOptions(program: Command): Command {
  return program
    .option("--token-path <path>", "Stored user token (env TOKEN_PATH)")
    .option("--credentials-path <path>", "OAuth client secrets (env CREDENTIALS_PATH)")
    .option("--service-account-path <path>", "Service account key (env SERVICE_ACCOUNT_PATH)");
}

export function configFromCommand(
  command: Command,
  overrides: ConfigOverrides = {},
): WorkspaceConfig {
  const paths = command.optsWithGlobals<PathOptions>();
  return loadWorkspaceConfig(process.env, process.cwd(), {
    tokenPath: paths.tokenPath,
    credentialsPath: paths.credentialsPath,
    serviceAccountPath: paths.serviceAccountPath,
    ...overrides,
  });
}

export function parseVariant(name: string): ServerVariant {
  if (!isVariantName(name)) {
    throw new ConfigurationError(
      `Unknown server variant: ${name} (expected one of ${VARIANT_NAMES.join(", ")})`,
    );
  }
  return getVariant(name);
}

/**
 * Run a command body, reporting a failure and exiting with status 1.
 */
export async function runCommand(
  label: string,
  body: () => Promise<void>,
  runtime: RuntimeEnv = defaultRuntime,
): Promise<void> {
  try {
    await body();
  } catch (err) {
    runtime.error(danger(`${label} failed: ${formatErrorMessage(err)}`));
    runtime.exit(1);
  }
}
