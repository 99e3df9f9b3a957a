import { afterEach, describe, expect, it, vi } from "vitest";

import {
  buildAuthUrl,
  parseCallbackInput,
  refreshGoogleToken,
  runInteractiveFlow,
  startCallbackServer,
} from "./auth.js";
import { AuthenticationError } from "./errors.js";
import type { OAuthClientSecrets } from "./types.js";

const SECRETS: OAuthClientSecrets = {
  clientId: "test-client-id",
  clientSecret: "test-secret",
  authUri: "https://accounts.google.com/o/oauth2/v2/auth",
  tokenUri: "https://oauth2.googleapis.com/token",
};

function tokenEndpoint(response: () => Response) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response());
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function sentForm(fetchImpl: ReturnType<typeof tokenEndpoint>): URLSearchParams {
  return new URLSearchParams(String(fetchImpl.mock.calls[0]?.[1]?.body));
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseCallbackInput", () => {
  it("takes a bare code with the expected state", () => {
    expect(parseCallbackInput("  4/abc  ", "state-1")).toEqual({ code: "4/abc", state: "state-1" });
  });

  it("reads code and state from a redirect URL", () => {
    expect(
      parseCallbackInput("http://127.0.0.1:51122/oauth-callback?code=c1&state=s1", "s1"),
    ).toEqual({ code: "c1", state: "s1" });
  });

  it("reports an OAuth error parameter", () => {
    expect(parseCallbackInput("http://127.0.0.1/cb?error=access_denied", "s1")).toEqual({
      error: "OAuth error: access_denied",
    });
  });

  it("requires the state in a pasted URL", () => {
    expect(parseCallbackInput("http://127.0.0.1/cb?code=c1", "s1")).toEqual({
      error: "Missing 'state' parameter. Paste the full URL.",
    });
  });

  it("rejects empty input", () => {
    expect(parseCallbackInput("   ", "s1")).toEqual({ error: "No input provided" });
  });
});

describe("buildAuthUrl", () => {
  it("asks for offline access with a PKCE challenge", () => {
    const url = new URL(
      buildAuthUrl({
        secrets: SECRETS,
        scopes: ["https://www.googleapis.com/auth/drive"],
        redirectUri: "http://127.0.0.1:4000/oauth-callback",
        challenge: "challenge-1",
        state: "state-1",
      }),
    );

    expect(url.origin + url.pathname).toBe(SECRETS.authUri);
    expect(Object.fromEntries(url.searchParams)).toEqual({
      client_id: "test-client-id",
      response_type: "code",
      redirect_uri: "http://127.0.0.1:4000/oauth-callback",
      scope: "https://www.googleapis.com/auth/drive",
      code_challenge: "challenge-1",
      code_challenge_method: "S256",
      state: "state-1",
      access_type: "offline",
      prompt: "consent",
    });
  });
});

describe("startCallbackServer", () => {
  it("resolves the code from the redirect", async () => {
    const server = await startCallbackServer("state-1");

    const res = await fetch(`${server.redirectUri}?code=auth-code&state=state-1`);

    expect(res.status).toBe(200);
    await expect(server.code).resolves.toBe("auth-code");
  });

  it("answers 404 for other paths and keeps waiting", async () => {
    const server = await startCallbackServer("state-1");
    const origin = new URL(server.redirectUri).origin;

    const res = await fetch(`${origin}/favicon.ico`);
    expect(res.status).toBe(404);

    await fetch(`${server.redirectUri}?code=later&state=state-1`);
    await expect(server.code).resolves.toBe("later");
  });

  it("rejects a redirect carrying another state", async () => {
    const server = await startCallbackServer("state-1");

    const res = await fetch(`${server.redirectUri}?code=auth-code&state=forged`);

    expect(res.status).toBe(400);
    expect(await res.text()).toBe("State mismatch");
    await expect(server.code).rejects.toThrow(new AuthenticationError("OAuth state mismatch"));
  });

  it("rejects a redirect reporting a consent error", async () => {
    const server = await startCallbackServer("state-1");

    const res = await fetch(`${server.redirectUri}?error=access_denied`);

    expect(res.status).toBe(400);
    await expect(server.code).rejects.toThrow("OAuth error: access_denied");
  });

  it("times out and stops listening", async () => {
    const server = await startCallbackServer("state-1", 20);

    await expect(server.code).rejects.toThrow("Timed out waiting for the OAuth redirect");
    await expect(fetch(`${server.redirectUri}?code=late&state=state-1`)).rejects.toThrow();
  });
});

describe("refreshGoogleToken", () => {
  const params = {
    refreshToken: "refresh-1",
    clientId: "test-client-id",
    clientSecret: "test-secret",
    tokenUri: SECRETS.tokenUri,
  };

  it("posts a refresh grant and normalizes the response", async () => {
    vi.spyOn(Date, "now").mockReturnValue(1_000);
    const fetchImpl = tokenEndpoint(() =>
      jsonResponse({ access_token: "access-2", expires_in: 3600, scope: "a b" }),
    );

    const grant = await refreshGoogleToken(params, fetchImpl);

    expect(grant).toEqual({
      access: "access-2",
      refresh: undefined,
      expires: 3_601_000,
      scopes: ["a", "b"],
    });
    expect(fetchImpl.mock.calls[0]?.[0]).toBe(SECRETS.tokenUri);
    expect(Object.fromEntries(sentForm(fetchImpl))).toEqual({
      client_id: "test-client-id",
      client_secret: "test-secret",
      refresh_token: "refresh-1",
      grant_type: "refresh_token",
    });
  });

  it("rejects an error status with Google's response text", async () => {
    const fetchImpl = tokenEndpoint(() => new Response("invalid_grant", { status: 400 }));

    await expect(refreshGoogleToken(params, fetchImpl)).rejects.toThrow(
      new AuthenticationError("Token refresh failed: invalid_grant"),
    );
  });

  it("rejects a response without an access token", async () => {
    const fetchImpl = tokenEndpoint(() => jsonResponse({ token_type: "Bearer" }));

    await expect(refreshGoogleToken(params, fetchImpl)).rejects.toThrow(
      new AuthenticationError("Token refresh failed: unexpected token response"),
    );
  });
});

describe("runInteractiveFlow", () => {
  async function completeConsent(url: string): Promise<string> {
    const auth = new URL(url);
    const redirectUri = auth.searchParams.get("redirect_uri") ?? "";
    const state = auth.searchParams.get("state") ?? "";
    await fetch(`${redirectUri}?code=auth-code&state=${state}`);
    return redirectUri;
  }

  it("exchanges the code with the PKCE verifier", async () => {
    let redirectUri = "";
    const fetchImpl = tokenEndpoint(() =>
      jsonResponse({ access_token: "access-1", refresh_token: "refresh-1", expires_in: 3600 }),
    );

    const grant = await runInteractiveFlow({
      secrets: SECRETS,
      scopes: ["https://www.googleapis.com/auth/drive"],
      onUrl: async (url) => {
        redirectUri = await completeConsent(url);
      },
      fetchImpl,
    });

    expect(grant.access).toBe("access-1");
    expect(grant.refresh).toBe("refresh-1");
    const form = sentForm(fetchImpl);
    expect(form.get("grant_type")).toBe("authorization_code");
    expect(form.get("code")).toBe("auth-code");
    expect(form.get("redirect_uri")).toBe(redirectUri);
    expect(form.get("code_verifier")).toMatch(/^[0-9a-f]{64}$/);
  });

  it("rejects a grant without a refresh token", async () => {
    const fetchImpl = tokenEndpoint(() => jsonResponse({ access_token: "access-1", expires_in: 3600 }));

    await expect(
      runInteractiveFlow({
        secrets: SECRETS,
        scopes: ["https://www.googleapis.com/auth/drive"],
        onUrl: async (url) => {
          await completeConsent(url);
        },
        fetchImpl,
      }),
    ).rejects.toThrow(/^No refresh token received/);
  });
});
