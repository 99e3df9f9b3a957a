/**
 * `auth` commands: sign in once ahead of serving, inspect what is stored,
 * and forget the stored token.
 */

import type { Command } from "commander";
import open from "open";

import type { WorkspaceConfig } from "../config/config.js";
import { parseStoredToken } from "../google/credential-files.js";
import { createCredentialResolver } from "../google/credential-resolver.js";
import { formatErrorMessage } from "../google/errors.js";
import { createCredentialSpec, hasRequiredScopes } from "../google/scopes.js";
import { deleteTokenFile, readOptionalFile } from "../google/token-store.js";
import { danger, info, muted, success, warn } from "../globals.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { allVariantScopes, listVariants, type VariantName } from "../tools/index.js";
import { configFromCommand, parseVariant, runCommand } from "./options.js";

export type LoginOptions = {
  variant?: string;
  force?: boolean;
  open?: boolean;
};

export type TokenStatus =
  | { path: string; state: "missing" }
  | { path: string; state: "invalid"; error: string }
  | {
      path: string;
      state: "present";
      expiresAt?: string;
      expired: boolean;
      refreshable: boolean;
      scopes: string[];
      covers: VariantName[];
    };

export type AuthStatus = {
  inlineServiceAccount: boolean;
  serviceAccountFile: { path: string; present: boolean };
  clientSecrets: { path: string; present: boolean };
  token: TokenStatus;
};

async function fileExists(filePath: string): Promise<boolean> {
  return (await readOptionalFile(filePath)) !== undefined;
}

async function readTokenStatus(tokenPath: string, now: number): Promise<TokenStatus> {
  const raw = await readOptionalFile(tokenPath);
  if (raw === undefined) return { path: tokenPath, state: "missing" };
  try {
    const token = parseStoredToken(raw, []);
    return {
      path: tokenPath,
      state: "present",
      expiresAt: token.expiry === undefined ? undefined : new Date(token.expiry).toISOString(),
      expired: token.expiry !== undefined && token.expiry <= now,
      refreshable: Boolean(token.refreshToken),
      scopes: token.scopes,
      covers: listVariants()
        .filter((variant) => hasRequiredScopes(token.scopes, variant.scopes))
        .map((variant) => variant.name),
    };
  } catch (err) {
    return { path: tokenPath, state: "invalid", error: formatErrorMessage(err) };
  }
}

export async function getAuthStatus(
  config: WorkspaceConfig,
  now: number = Date.now(),
): Promise<AuthStatus> {
  return {
    inlineServiceAccount: config.credentialsConfig !== undefined,
    serviceAccountFile: {
      path: config.serviceAccountPath,
      present: await fileExists(config.serviceAccountPath),
    },
    clientSecrets: {
      path: config.credentialsPath,
      present: await fileExists(config.credentialsPath),
    },
    token: await readTokenStatus(config.tokenPath, now),
  };
}

export function printAuthStatus(status: AuthStatus, runtime: RuntimeEnv = defaultRuntime): void {
  const mark = (present: boolean) => (present ? success("present") : muted("missing"));

  runtime.log(info("Google credentials:\n"));
  runtime.log(`  CREDENTIALS_CONFIG   ${mark(status.inlineServiceAccount)}`);
  runtime.log(`  Service account key  ${mark(status.serviceAccountFile.present)}`);
  runtime.log(muted(`    ${status.serviceAccountFile.path}`));
  runtime.log(`  OAuth client secrets ${mark(status.clientSecrets.present)}`);
  runtime.log(muted(`    ${status.clientSecrets.path}`));

  const { token } = status;
  if (token.state === "missing") {
    runtime.log(`  User token           ${mark(false)}`);
  } else if (token.state === "invalid") {
    runtime.log(`  User token           ${danger("invalid")} ${muted(token.error)}`);
  } else {
    const state = token.expired
      ? token.refreshable
        ? warn("expired (refreshable)")
        : danger("expired")
      : success("active");
    runtime.log(`  User token           ${state}`);
    if (token.expiresAt) runtime.log(info(`    Expires: ${token.expiresAt}`));
    runtime.log(info(`    Covers: ${token.covers.length > 0 ? token.covers.join(", ") : "no server"}`));
  }
  runtime.log(muted(`    ${token.path}`));
}

export async function authLogin(
  config: WorkspaceConfig,
  opts: LoginOptions,
  runtime: RuntimeEnv = defaultRuntime,
): Promise<void> {
  const scopes = opts.variant ? parseVariant(opts.variant).scopes : allVariantScopes();
  const resolver = createCredentialResolver({
    config,
    interactive: true,
    allowManual: true,
    useStoredToken: !opts.force,
    onUrl: async (url) => {
      runtime.log(info(`\nAuthorization URL:\n${url}\n`));
      if (opts.open === false) return;
      try {
        await open(url);
        runtime.log(info("Opened browser for authorization..."));
      } catch (err) {
        runtime.log(warn(`Could not open browser (${formatErrorMessage(err)}). Open the URL manually.`));
      }
    },
    onProgress: (message) => runtime.log(info(message)),
  });

  const credential = await resolver.resolve(createCredentialSpec(scopes));
  if (credential.type === "service_account") {
    runtime.log(
      warn(`Service account ${credential.clientEmail} is configured; no user sign-in is needed.`),
    );
    return;
  }
  if (credential.source === "token_file" || credential.source === "refreshed") {
    runtime.log(success(`Already authorized (${config.tokenPath}). Use --force to sign in again.`));
    return;
  }
  runtime.log(success(`\nGoogle account connected. Token saved to ${config.tokenPath}`));
  runtime.log(info(`Scopes: ${credential.scopes.join(" ")}`));
}

export async function authLogout(
  config: WorkspaceConfig,
  runtime: RuntimeEnv = defaultRuntime,
): Promise<void> {
  if (await deleteTokenFile(config.tokenPath)) {
    runtime.log(success(`Removed ${config.tokenPath}`));
  } else {
    runtime.log(info(`No token stored at ${config.tokenPath}`));
  }
}

export function registerAuthCli(program: Command) {
  const auth = program.command("auth").description("Manage Google credentials");

  auth
    .command("login")
    .description("Sign in with a Google account and store the token")
    .option("--variant <name>", "Only request the scopes of one server")
    .option("--force", "Sign in again even if a stored token is valid", false)
    .option("--no-open", "Don't open the browser automatically")
    .action(async (opts: LoginOptions, command: Command) => {
      await runCommand("Google login", () => authLogin(configFromCommand(command), opts));
    });

  auth
    .command("status")
    .description("Show which credentials are available")
    .option("--json", "Output JSON", false)
    .action(async (opts: { json?: boolean }, command: Command) => {
      await runCommand("Status check", async () => {
        const status = await getAuthStatus(configFromCommand(command));
        if (opts.json) {
          defaultRuntime.log(JSON.stringify(status, null, 2));
          return;
        }
        printAuthStatus(status);
      });
    });

  auth
    .command("logout")
    .description("Delete the stored user token")
    .action(async (_opts: unknown, command: Command) => {
      await runCommand("Google logout", () => authLogout(configFromCommand(command)));
    });
}
