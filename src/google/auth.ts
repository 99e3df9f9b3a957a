/**
 * Installed-app OAuth flow for Google Workspace.
 *
 * On local machines: loopback callback server on an ephemeral port.
 * On SSH/headless hosts: prints the URL and asks for the redirect URL to be
 * pasted back (only when the caller owns stdin).
 */

import { createHash, randomBytes } from "node:crypto";
import { readFileSync } from "node:fs";
import http from "node:http";
import type { AddressInfo } from "node:net";
import { stdin, stdout } from "node:process";
import { createInterface } from "node:readline/promises";

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { AuthenticationError } from "./errors.js";
import type { OAuthClientSecrets, TokenGrant } from "./types.js";

const CALLBACK_PATH = "/oauth-callback";
const LOOPBACK_HOST = "127.0.0.1";
// Manual mode has no listener; the browser lands on a page that won't load.
const MANUAL_REDIRECT_PORT = 51122;
const DEFAULT_CALLBACK_TIMEOUT_MS = 5 * 60 * 1000;

const TokenResponseSchema = Type.Object({
  access_token: Type.String({ minLength: 1 }),
  refresh_token: Type.Optional(Type.String()),
  expires_in: Type.Number(),
  scope: Type.Optional(Type.String()),
});

type Env = Record<string, string | undefined>;
type FetchLike = typeof fetch;

function readProcVersion(): string {
  try {
    return readFileSync("/proc/version", "utf8").toLowerCase();
  } catch {
    return "";
  }
}

function isWSL(): boolean {
  if (process.platform !== "linux") return false;
  const release = readProcVersion();
  return release.includes("microsoft") || release.includes("wsl");
}

function isWSL2(): boolean {
  if (!isWSL()) return false;
  const version = readProcVersion();
  return version.includes("wsl2") || version.includes("microsoft-standard");
}

/**
 * Detect if running somewhere a browser on this host can't reach localhost.
 */
export function isRemoteEnvironment(env: Env = process.env): boolean {
  if (env.SSH_CLIENT || env.SSH_TTY || env.SSH_CONNECTION) {
    return true;
  }
  if (env.REMOTE_CONTAINERS || env.CODESPACES) {
    return true;
  }
  if (
    process.platform === "linux" &&
    !env.DISPLAY &&
    !env.WAYLAND_DISPLAY &&
    !isWSL()
  ) {
    return true;
  }
  return false;
}

export function shouldUseManualOAuthFlow(env: Env = process.env): boolean {
  return isWSL2() || isRemoteEnvironment(env);
}

function generatePKCE(): { verifier: string; challenge: string } {
  const verifier = randomBytes(32).toString("hex");
  const challenge = createHash("sha256").update(verifier).digest("base64url");
  return { verifier, challenge };
}

export function buildAuthUrl(params: {
  secrets: OAuthClientSecrets;
  scopes: readonly string[];
  redirectUri: string;
  challenge: string;
  state: string;
}): string {
  const query = new URLSearchParams({
    client_id: params.secrets.clientId,
    response_type: "code",
    redirect_uri: params.redirectUri,
    scope: params.scopes.join(" "),
    code_challenge: params.challenge,
    code_challenge_method: "S256",
    state: params.state,
    access_type: "offline",
    prompt: "consent",
  });
  return `${params.secrets.authUri}?${query.toString()}`;
}

/**
 * Parse a pasted redirect URL, or a bare authorization code.
 */
export function parseCallbackInput(
  input: string,
  expectedState: string,
): { code: string; state: string } | { error: string } {
  const trimmed = input.trim();
  if (!trimmed) {
    return { error: "No input provided" };
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return { code: trimmed, state: expectedState };
  }

  const oauthError = url.searchParams.get("error");
  if (oauthError) {
    return { error: `OAuth error: ${oauthError}` };
  }
  const code = url.searchParams.get("code");
  if (!code) {
    return { error: "Missing 'code' parameter in URL" };
  }
  const state = url.searchParams.get("state");
  if (!state) {
    return { error: "Missing 'state' parameter. Paste the full URL." };
  }
  return { code, state };
}

async function postTokenEndpoint(
  tokenUri: string,
  body: URLSearchParams,
  fetchImpl: FetchLike,
  failure: string,
): Promise<TokenGrant> {
  const response = await fetchImpl(tokenUri, {
    method: "POST",
    headers: {
      "Content-Type": "application/x-www-form-urlencoded",
    },
    body,
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new AuthenticationError(`${failure}: ${errorText}`);
  }

  const data: unknown = await response.json();
  if (!Value.Check(TokenResponseSchema, data)) {
    throw new AuthenticationError(`${failure}: unexpected token response`);
  }

  return {
    access: data.access_token,
    refresh: data.refresh_token,
    expires: Date.now() + data.expires_in * 1000,
    scopes: data.scope ? data.scope.split(/\s+/).filter(Boolean) : undefined,
  };
}

async function exchangeCodeForTokens(params: {
  secrets: OAuthClientSecrets;
  code: string;
  verifier: string;
  redirectUri: string;
  fetchImpl: FetchLike;
}): Promise<TokenGrant> {
  const grant = await postTokenEndpoint(
    params.secrets.tokenUri,
    new URLSearchParams({
      client_id: params.secrets.clientId,
      client_secret: params.secrets.clientSecret,
      code: params.code,
      grant_type: "authorization_code",
      redirect_uri: params.redirectUri,
      code_verifier: params.verifier,
    }),
    params.fetchImpl,
    "Token exchange failed",
  );

  if (!grant.refresh) {
    throw new AuthenticationError(
      "No refresh token received. You may need to revoke access at https://myaccount.google.com/permissions and try again.",
    );
  }
  return grant;
}

export type RefreshTokenParams = {
  refreshToken: string;
  clientId: string;
  clientSecret: string;
  tokenUri: string;
};

/**
 * Exchange a refresh token for a new access token. Google may rotate the
 * refresh token; when it doesn't, `refresh` is undefined.
 */
export async function refreshGoogleToken(
  params: RefreshTokenParams,
  fetchImpl: FetchLike = fetch,
): Promise<TokenGrant> {
  return postTokenEndpoint(
    params.tokenUri,
    new URLSearchParams({
      client_id: params.clientId,
      client_secret: params.clientSecret,
      refresh_token: params.refreshToken,
      grant_type: "refresh_token",
    }),
    fetchImpl,
    "Token refresh failed",
  );
}

async function promptInput(message: string): Promise<string> {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    return (await rl.question(message)).trim();
  } finally {
    rl.close();
  }
}

type CallbackServer = {
  redirectUri: string;
  code: Promise<string>;
  close: () => void;
};

/**
 * Start a loopback listener on an ephemeral port for the OAuth redirect.
 */
export function startCallbackServer(
  expectedState: string,
  timeoutMs: number = DEFAULT_CALLBACK_TIMEOUT_MS,
): Promise<CallbackServer> {
  return new Promise((resolveServer, rejectServer) => {
    let settleCode: { resolve: (code: string) => void; reject: (err: Error) => void } | undefined;
    const code = new Promise<string>((resolve, reject) => {
      settleCode = { resolve, reject };
    });
    // Rejections surface through `code`.
    code.catch(() => undefined);

    let timer: NodeJS.Timeout | undefined;
    const server = http.createServer((req, res) => {
      const url = new URL(req.url ?? "/", `http://${LOOPBACK_HOST}`);

      if (url.pathname !== CALLBACK_PATH) {
        res.writeHead(404);
        res.end("Not found");
        return;
      }

      const parsed = parseCallbackInput(url.toString(), expectedState);
      if ("error" in parsed) {
        res.writeHead(400);
        res.end(parsed.error);
        finish(new AuthenticationError(parsed.error));
        return;
      }
      if (parsed.state !== expectedState) {
        res.writeHead(400);
        res.end("State mismatch");
        finish(new AuthenticationError("OAuth state mismatch"));
        return;
      }

      res.writeHead(200, { "Content-Type": "text/html" });
      res.end(`
        <html>
          <body style="font-family: system-ui; text-align: center; padding: 50px;">
            <h1>Success!</h1>
            <p>Google Workspace connected. You can close this window.</p>
          </body>
        </html>
      `);
      finish(parsed.code);
    });

    const close = () => {
      if (timer) clearTimeout(timer);
      server.close();
    };

    function finish(result: string | Error) {
      close();
      if (typeof result === "string") settleCode?.resolve(result);
      else settleCode?.reject(result);
    }

    server.on("error", (err) => {
      if (server.listening) finish(err);
      else rejectServer(err);
    });

    server.listen(0, LOOPBACK_HOST, () => {
      const address: AddressInfo | string | null = server.address();
      if (!address || typeof address === "string") {
        close();
        rejectServer(new Error("Callback server has no TCP address"));
        return;
      }
      timer = setTimeout(() => {
        finish(new AuthenticationError("Timed out waiting for the OAuth redirect"));
      }, timeoutMs);
      timer.unref();
      resolveServer({
        redirectUri: `http://${LOOPBACK_HOST}:${address.port}${CALLBACK_PATH}`,
        code,
        close,
      });
    });
  });
}

export type InteractiveFlowOptions = {
  secrets: OAuthClientSecrets;
  scopes: readonly string[];
  onUrl: (url: string) => void | Promise<void>;
  onProgress?: (message: string) => void;
  /** Allow falling back to pasting the redirect URL on stdin. */
  allowManual?: boolean;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

/**
 * Run the browser consent flow and return the granted tokens.
 */
export async function runInteractiveFlow(
  options: InteractiveFlowOptions,
): Promise<TokenGrant> {
  if (options.allowManual && shouldUseManualOAuthFlow()) {
    return runManualFlow(options);
  }

  try {
    return await runLoopbackFlow(options);
  } catch (err) {
    if (
      options.allowManual &&
      err instanceof Error &&
      "code" in err &&
      (err.code === "EADDRINUSE" || err.code === "EACCES")
    ) {
      options.onProgress?.("Local callback server failed. Switching to manual mode...");
      return runManualFlow(options);
    }
    throw err;
  }
}

async function runLoopbackFlow(options: InteractiveFlowOptions): Promise<TokenGrant> {
  const { verifier, challenge } = generatePKCE();
  const state = randomBytes(16).toString("hex");
  const callback = await startCallbackServer(state, options.timeoutMs);

  try {
    const authUrl = buildAuthUrl({
      secrets: options.secrets,
      scopes: options.scopes,
      redirectUri: callback.redirectUri,
      challenge,
      state,
    });
    await options.onUrl(authUrl);
    options.onProgress?.("Waiting for authorization in browser...");

    const code = await callback.code;
    options.onProgress?.("Exchanging authorization code for tokens...");
    return await exchangeCodeForTokens({
      secrets: options.secrets,
      code,
      verifier,
      redirectUri: callback.redirectUri,
      fetchImpl: options.fetchImpl ?? fetch,
    });
  } finally {
    callback.close();
  }
}

async function runManualFlow(options: InteractiveFlowOptions): Promise<TokenGrant> {
  const { verifier, challenge } = generatePKCE();
  const state = randomBytes(16).toString("hex");
  const redirectUri = `http://${LOOPBACK_HOST}:${MANUAL_REDIRECT_PORT}${CALLBACK_PATH}`;
  const authUrl = buildAuthUrl({
    secrets: options.secrets,
    scopes: options.scopes,
    redirectUri,
    challenge,
    state,
  });

  await options.onUrl(authUrl);
  options.onProgress?.(
    [
      "Remote mode: open the URL above in a local browser and complete the sign-in.",
      "The browser then redirects to a localhost URL that won't load.",
      "Copy that entire URL from the address bar and paste it below.",
      `It looks like: ${redirectUri}?code=xxx&state=yyy`,
    ].join("\n"),
  );

  const parsed = parseCallbackInput(
    await promptInput("Paste the redirect URL here: "),
    state,
  );
  if ("error" in parsed) {
    throw new AuthenticationError(parsed.error);
  }
  if (parsed.state !== state) {
    throw new AuthenticationError("OAuth state mismatch - please try again");
  }

  options.onProgress?.("Exchanging authorization code for tokens...");
  return exchangeCodeForTokens({
    secrets: options.secrets,
    code: parsed.code,
    verifier,
    redirectUri,
    fetchImpl: options.fetchImpl ?? fetch,
  });
}
