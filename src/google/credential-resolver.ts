/**
 * Resolves a usable Google credential for a set of scopes.
 *
 * Strategies, first success wins:
 * 1. CREDENTIALS_CONFIG (inline base64 service-account key)
 * 2. service-account key file
 * 3. stored user token, refreshed and re-persisted when expired
 * 4. interactive browser consent using the OAuth client-secrets file
 *
 * Only strategies 3 and 4 write, and only to the token file.
 */

import open from "open";

import type { WorkspaceConfig } from "../config/config.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging.js";
import {
  type InteractiveFlowOptions,
  type RefreshTokenParams,
  refreshGoogleToken,
  runInteractiveFlow,
} from "./auth.js";
import {
  decodeInlineServiceAccount,
  parseClientSecrets,
  parseServiceAccountKey,
  parseStoredToken,
} from "./credential-files.js";
import { AuthenticationError, formatErrorMessage } from "./errors.js";
import { hasRequiredScopes } from "./scopes.js";
import { readOptionalFile, writeTokenFile } from "./token-store.js";
import type {
  AuthorizedUserCredential,
  CredentialRecord,
  CredentialSpec,
  OAuthClientSecrets,
  ServiceAccountCredential,
  TokenGrant,
} from "./types.js";

/** Tokens expiring within this window are treated as expired. */
export const REFRESH_BUFFER_MS = 5 * 60 * 1000;

export type CredentialPaths = Pick<
  WorkspaceConfig,
  "credentialsConfig" | "tokenPath" | "credentialsPath" | "serviceAccountPath"
>;

export type CredentialResolverOptions = {
  config: CredentialPaths;
  /** Set false to fail instead of starting a browser consent flow. */
  interactive?: boolean;
  /** Allow pasting the redirect URL on stdin (CLI login only). */
  allowManual?: boolean;
  /** Set false to ignore the stored token; a successful sign-in replaces it. */
  useStoredToken?: boolean;
  openBrowser?: boolean;
  onUrl?: (url: string) => void | Promise<void>;
  onProgress?: (message: string) => void;
  logger?: SubsystemLogger;
  now?: () => number;
  refreshToken?: (params: RefreshTokenParams) => Promise<TokenGrant>;
  runInteractiveFlow?: (options: InteractiveFlowOptions) => Promise<TokenGrant>;
};

export function isCredentialValid(
  credential: AuthorizedUserCredential,
  spec: CredentialSpec,
  now: number,
): boolean {
  if (!credential.token) return false;
  if (credential.expiry !== undefined && credential.expiry <= now + REFRESH_BUFFER_MS) {
    return false;
  }
  return hasRequiredScopes(credential.scopes, spec.scopes);
}

export function createCredentialResolver(options: CredentialResolverOptions) {
  const { config } = options;
  const log = options.logger ?? createSubsystemLogger("auth");
  const now = options.now ?? Date.now;
  const refresh = options.refreshToken ?? ((params) => refreshGoogleToken(params));
  const interactiveFlow = options.runInteractiveFlow ?? runInteractiveFlow;

  function fromInline(spec: CredentialSpec): ServiceAccountCredential | undefined {
    if (!config.credentialsConfig) return undefined;
    try {
      const credential = decodeInlineServiceAccount(config.credentialsConfig, spec.scopes);
      log.info("Using inline service account credentials", {
        clientEmail: credential.clientEmail,
      });
      return credential;
    } catch (err) {
      log.warn(`Ignoring CREDENTIALS_CONFIG: ${formatErrorMessage(err)}`);
      return undefined;
    }
  }

  async function fromServiceAccountFile(
    spec: CredentialSpec,
  ): Promise<ServiceAccountCredential | undefined> {
    try {
      const raw = await readOptionalFile(config.serviceAccountPath);
      if (raw === undefined) return undefined;
      const credential = parseServiceAccountKey(raw, "service_account_file", spec.scopes);
      log.info("Using service account key file", {
        path: config.serviceAccountPath,
        clientEmail: credential.clientEmail,
      });
      return credential;
    } catch (err) {
      log.warn(`Ignoring service account file: ${formatErrorMessage(err)}`, {
        path: config.serviceAccountPath,
      });
      return undefined;
    }
  }

  async function loadClientSecrets(): Promise<OAuthClientSecrets | undefined> {
    const raw = await readOptionalFile(config.credentialsPath);
    return raw === undefined ? undefined : parseClientSecrets(raw);
  }

  async function persist(credential: AuthorizedUserCredential): Promise<void> {
    try {
      await writeTokenFile(config.tokenPath, credential);
      log.debug("Token saved", { path: config.tokenPath });
    } catch (err) {
      log.error(`Failed to save token: ${formatErrorMessage(err)}`, {
        path: config.tokenPath,
      });
    }
  }

  async function refreshStored(
    stored: AuthorizedUserCredential,
    refreshToken: string,
  ): Promise<AuthorizedUserCredential | undefined> {
    try {
      let clientId = stored.clientId;
      let clientSecret = stored.clientSecret;
      if (!clientId || !clientSecret) {
        const secrets = await loadClientSecrets();
        clientId = secrets?.clientId;
        clientSecret = secrets?.clientSecret;
      }
      if (!clientId || !clientSecret) {
        log.warn("Cannot refresh token: no OAuth client id/secret available");
        return undefined;
      }

      const grant = await refresh({
        refreshToken,
        clientId,
        clientSecret,
        tokenUri: stored.tokenUri,
      });
      const refreshed: AuthorizedUserCredential = {
        ...stored,
        source: "refreshed",
        token: grant.access,
        refreshToken: grant.refresh ?? refreshToken,
        expiry: grant.expires,
        clientId,
        clientSecret,
        scopes: grant.scopes ?? stored.scopes,
      };
      await persist(refreshed);
      log.info("Refreshed stored user token");
      return refreshed;
    } catch (err) {
      log.warn(`Token refresh failed: ${formatErrorMessage(err)}`);
      return undefined;
    }
  }

  async function fromTokenFile(
    spec: CredentialSpec,
  ): Promise<AuthorizedUserCredential | undefined> {
    let stored: AuthorizedUserCredential;
    try {
      const raw = await readOptionalFile(config.tokenPath);
      if (raw === undefined) return undefined;
      stored = parseStoredToken(raw, spec.scopes);
    } catch (err) {
      log.warn(`Ignoring token file: ${formatErrorMessage(err)}`, {
        path: config.tokenPath,
      });
      return undefined;
    }

    if (isCredentialValid(stored, spec, now())) {
      log.debug("Using stored user token", { path: config.tokenPath });
      return stored;
    }
    if (!hasRequiredScopes(stored.scopes, spec.scopes)) {
      log.info("Stored token does not cover the requested scopes");
      return undefined;
    }
    if (!stored.refreshToken) {
      log.info("Stored token expired and has no refresh token");
      return undefined;
    }
    return refreshStored(stored, stored.refreshToken);
  }

  async function defaultOnUrl(url: string): Promise<void> {
    log.info(`Authorize access by visiting:\n${url}`);
    if (options.openBrowser === false) return;
    try {
      await open(url);
    } catch (err) {
      log.warn(`Could not open browser: ${formatErrorMessage(err)}`);
    }
  }

  async function fromInteractiveFlow(
    spec: CredentialSpec,
  ): Promise<AuthorizedUserCredential> {
    if (options.interactive === false) {
      throw new AuthenticationError(
        "No valid Google credentials found and interactive authorization is disabled",
      );
    }

    let secrets: OAuthClientSecrets | undefined;
    try {
      secrets = await loadClientSecrets();
    } catch (err) {
      throw new AuthenticationError(
        `Cannot read OAuth client secrets at ${config.credentialsPath}: ${formatErrorMessage(err)}`,
        { cause: err },
      );
    }
    if (!secrets) {
      throw new AuthenticationError(
        `No valid Google credentials found and no OAuth client secrets at ${config.credentialsPath}`,
      );
    }

    let grant: TokenGrant;
    try {
      grant = await interactiveFlow({
        secrets,
        scopes: spec.scopes,
        onUrl: options.onUrl ?? defaultOnUrl,
        onProgress: options.onProgress ?? ((message) => log.info(message)),
        allowManual: options.allowManual ?? false,
      });
    } catch (err) {
      if (err instanceof AuthenticationError) throw err;
      throw new AuthenticationError(
        `Interactive authorization failed: ${formatErrorMessage(err)}`,
        { cause: err },
      );
    }

    const credential: AuthorizedUserCredential = {
      type: "authorized_user",
      source: "interactive",
      token: grant.access,
      refreshToken: grant.refresh,
      expiry: grant.expires,
      clientId: secrets.clientId,
      clientSecret: secrets.clientSecret,
      tokenUri: secrets.tokenUri,
      scopes: grant.scopes ?? [...spec.scopes],
    };
    await persist(credential);
    log.info("Authorization complete", { path: config.tokenPath });
    return credential;
  }

  return {
    /**
     * Return a credential covering `spec`, or throw AuthenticationError.
     */
    resolve: async (spec: CredentialSpec): Promise<CredentialRecord> => {
      return (
        fromInline(spec) ??
        (await fromServiceAccountFile(spec)) ??
        (options.useStoredToken === false ? undefined : await fromTokenFile(spec)) ??
        (await fromInteractiveFlow(spec))
      );
    },
  };
}

export type CredentialResolver = ReturnType<typeof createCredentialResolver>;
