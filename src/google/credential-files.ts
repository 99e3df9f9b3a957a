/**
 * Parsers for the JSON documents Google hands out: service-account keys,
 * OAuth client secrets and authorized-user token files.
 */

import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigurationError } from "./errors.js";
import type {
  AuthorizedUserCredential,
  OAuthClientSecrets,
  ServiceAccountCredential,
} from "./types.js";

export const GOOGLE_AUTH_URI = "https://accounts.google.com/o/oauth2/v2/auth";
export const GOOGLE_TOKEN_URI = "https://oauth2.googleapis.com/token";

const ServiceAccountKeySchema = Type.Object({
  type: Type.Optional(Type.Literal("service_account")),
  client_email: Type.String({ minLength: 1 }),
  private_key: Type.String({ minLength: 1 }),
  private_key_id: Type.Optional(Type.String()),
  project_id: Type.Optional(Type.String()),
});

const OAuthClientBlockSchema = Type.Object({
  client_id: Type.String({ minLength: 1 }),
  client_secret: Type.String({ minLength: 1 }),
  auth_uri: Type.Optional(Type.String()),
  token_uri: Type.Optional(Type.String()),
});

const ClientSecretsSchema = Type.Object({
  installed: Type.Optional(OAuthClientBlockSchema),
  web: Type.Optional(OAuthClientBlockSchema),
});

const NullableString = Type.Union([Type.String(), Type.Null()]);

// Accepts both the authorized-user layout (token/expiry/scopes) and the
// layout googleapis' OAuth2Client serializes (access_token/expiry_date/scope).
const StoredTokenSchema = Type.Object({
  token: Type.Optional(NullableString),
  access_token: Type.Optional(NullableString),
  refresh_token: Type.Optional(NullableString),
  token_uri: Type.Optional(Type.String()),
  client_id: Type.Optional(Type.String()),
  client_secret: Type.Optional(Type.String()),
  scopes: Type.Optional(Type.Array(Type.String())),
  scope: Type.Optional(Type.String()),
  expiry: Type.Optional(NullableString),
  expiry_date: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
});

export type StoredToken = Static<typeof StoredTokenSchema>;

function parseJson(raw: string, what: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`${what} is not valid JSON`, { cause: err });
  }
}

function describeFirstError(schema: Parameters<typeof Value.Errors>[0], value: unknown): string {
  const first = Value.Errors(schema, value).First();
  if (!first) return "unexpected shape";
  return `${first.path || "/"}: ${first.message}`;
}

export function parseServiceAccountKey(
  raw: string,
  source: ServiceAccountCredential["source"],
  scopes: readonly string[],
): ServiceAccountCredential {
  const value = parseJson(raw, "Service account key");
  if (!Value.Check(ServiceAccountKeySchema, value)) {
    throw new ConfigurationError(
      `Service account key is invalid (${describeFirstError(ServiceAccountKeySchema, value)})`,
    );
  }
  return {
    type: "service_account",
    source,
    clientEmail: value.client_email,
    privateKey: value.private_key,
    privateKeyId: value.private_key_id,
    projectId: value.project_id,
    scopes: [...scopes],
  };
}

/**
 * Decode the base64 JSON carried by CREDENTIALS_CONFIG.
 */
export function decodeInlineServiceAccount(
  encoded: string,
  scopes: readonly string[],
): ServiceAccountCredential {
  const compact = encoded.replace(/\s+/g, "");
  if (!/^[A-Za-z0-9+/_-]+={0,2}$/.test(compact)) {
    throw new ConfigurationError("CREDENTIALS_CONFIG is not base64");
  }
  const decoded = Buffer.from(compact, "base64").toString("utf8");
  return parseServiceAccountKey(decoded, "inline", scopes);
}

export function parseClientSecrets(raw: string): OAuthClientSecrets {
  const value = parseJson(raw, "OAuth client secrets");
  if (!Value.Check(ClientSecretsSchema, value)) {
    throw new ConfigurationError(
      `OAuth client secrets are invalid (${describeFirstError(ClientSecretsSchema, value)})`,
    );
  }
  const block = value.installed ?? value.web;
  if (!block) {
    throw new ConfigurationError(
      'OAuth client secrets need an "installed" or "web" section',
    );
  }
  return {
    clientId: block.client_id,
    clientSecret: block.client_secret,
    authUri: block.auth_uri ?? GOOGLE_AUTH_URI,
    tokenUri: block.token_uri ?? GOOGLE_TOKEN_URI,
  };
}

function parseExpiry(value: string): number {
  // Authorized-user files store naive UTC timestamps; treat them as UTC.
  const normalized = /(?:Z|[+-]\d{2}:?\d{2})$/i.test(value) ? value : `${value}Z`;
  const time = Date.parse(normalized);
  if (Number.isNaN(time)) {
    throw new ConfigurationError(`Token expiry is not a timestamp: ${value}`);
  }
  return time;
}

/**
 * Parse a stored user token. `fallbackScopes` is used when the file does not
 * record which scopes were granted.
 */
export function parseStoredToken(
  raw: string,
  fallbackScopes: readonly string[],
): AuthorizedUserCredential {
  const value = parseJson(raw, "Token file");
  if (!Value.Check(StoredTokenSchema, value)) {
    throw new ConfigurationError(
      `Token file is invalid (${describeFirstError(StoredTokenSchema, value)})`,
    );
  }

  const token = value.token ?? value.access_token ?? "";
  const refreshToken = value.refresh_token ?? undefined;
  if (!token && !refreshToken) {
    throw new ConfigurationError("Token file holds neither an access nor a refresh token");
  }

  let expiry: number | undefined;
  if (typeof value.expiry === "string") {
    expiry = parseExpiry(value.expiry);
  } else if (typeof value.expiry_date === "number") {
    expiry = value.expiry_date;
  }

  const scopes =
    value.scopes ??
    (value.scope ? value.scope.split(/\s+/).filter(Boolean) : [...fallbackScopes]);

  return {
    type: "authorized_user",
    source: "token_file",
    token,
    refreshToken,
    expiry,
    clientId: value.client_id,
    clientSecret: value.client_secret,
    tokenUri: value.token_uri ?? GOOGLE_TOKEN_URI,
    scopes,
  };
}

/**
 * Serialize a user credential in the authorized-user layout.
 */
export function serializeStoredToken(credential: AuthorizedUserCredential): string {
  const document: StoredToken = {
    token: credential.token,
    refresh_token: credential.refreshToken,
    token_uri: credential.tokenUri,
    client_id: credential.clientId,
    client_secret: credential.clientSecret,
    scopes: credential.scopes,
    expiry:
      credential.expiry === undefined
        ? undefined
        : new Date(credential.expiry).toISOString(),
  };
  return `${JSON.stringify(document, null, 2)}\n`;
}
