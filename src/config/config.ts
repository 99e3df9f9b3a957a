import path from "node:path";

import { ConfigurationError } from "../google/errors.js";
import { isLogLevel, type LogLevel } from "../logging.js";

export const DEFAULT_TOKEN_PATH = "token.json";
export const DEFAULT_CREDENTIALS_PATH = "credentials.json";
export const DEFAULT_SERVICE_ACCOUNT_PATH = "service_account.json";
export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = "127.0.0.1";

export type WorkspaceConfig = {
  /** Base64-encoded service-account JSON, when supplied inline. */
  credentialsConfig?: string;
  tokenPath: string;
  credentialsPath: string;
  serviceAccountPath: string;
  /** Drive folder that receives created files, docs and spreadsheets. */
  driveFolderId?: string;
  port: number;
  host: string;
  logLevel: LogLevel;
};

export type ConfigOverrides = Partial<
  Pick<WorkspaceConfig, "tokenPath" | "credentialsPath" | "serviceAccountPath" | "port" | "host" | "logLevel">
>;

type Env = Record<string, string | undefined>;

function readEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function parsePort(raw: string | number): number {
  const port = typeof raw === "number" ? raw : Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`Invalid port: ${String(raw)}`);
  }
  return port;
}

export function parseLogLevel(raw: string): LogLevel {
  const normalized = raw.trim().toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL: ${raw} (expected debug, info, warn, error or silent)`,
    );
  }
  return normalized;
}

/**
 * Build the server configuration from environment variables. Relative paths
 * resolve against `cwd`; explicit overrides (CLI flags) win over the
 * environment.
 */
export function loadWorkspaceConfig(
  env: Env = process.env,
  cwd: string = process.cwd(),
  overrides: ConfigOverrides = {},
): WorkspaceConfig {
  const resolvePath = (value: string) => path.resolve(cwd, value);
  const rawPort = readEnv(env, "PORT");
  const rawLevel = readEnv(env, "LOG_LEVEL");

  const config: WorkspaceConfig = {
    credentialsConfig: readEnv(env, "CREDENTIALS_CONFIG"),
    tokenPath: resolvePath(
      overrides.tokenPath ?? readEnv(env, "TOKEN_PATH") ?? DEFAULT_TOKEN_PATH,
    ),
    credentialsPath: resolvePath(
      overrides.credentialsPath ??
        readEnv(env, "CREDENTIALS_PATH") ??
        DEFAULT_CREDENTIALS_PATH,
    ),
    serviceAccountPath: resolvePath(
      overrides.serviceAccountPath ??
        readEnv(env, "SERVICE_ACCOUNT_PATH") ??
        DEFAULT_SERVICE_ACCOUNT_PATH,
    ),
    driveFolderId: readEnv(env, "DRIVE_FOLDER_ID"),
    port: overrides.port ?? (rawPort ? parsePort(rawPort) : DEFAULT_PORT),
    host: overrides.host ?? readEnv(env, "HOST") ?? DEFAULT_HOST,
    logLevel: overrides.logLevel ?? (rawLevel ? parseLogLevel(rawLevel) : "info"),
  };

  return Object.freeze(config);
}
