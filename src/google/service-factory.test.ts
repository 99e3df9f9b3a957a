import { google } from "googleapis";
import { describe, expect, it, vi } from "vitest";

import type { CredentialResolver } from "./credential-resolver.js";
import { ConfigurationError } from "./errors.js";
import { createCredentialSpec, GOOGLE_SCOPES } from "./scopes.js";
import { createAuthClient, createServiceFactory } from "./service-factory.js";
import type { AuthorizedUserCredential, ServiceAccountCredential } from "./types.js";

const USER_CREDENTIAL: AuthorizedUserCredential = {
  type: "authorized_user",
  source: "token_file",
  token: "access-1",
  refreshToken: "refresh-1",
  expiry: Date.parse("2026-03-01T13:00:00Z"),
  clientId: "test-client-id",
  clientSecret: "test-secret",
  tokenUri: "https://oauth2.googleapis.com/token",
  scopes: [GOOGLE_SCOPES.DOCUMENTS, GOOGLE_SCOPES.DRIVE],
};

const SERVICE_ACCOUNT: ServiceAccountCredential = {
  type: "service_account",
  source: "inline",
  clientEmail: "robot@test-project.iam.gserviceaccount.com",
  privateKey: "test-private-key",
  scopes: [GOOGLE_SCOPES.DRIVE],
};

function createStubResolver() {
  const resolve = vi.fn(async () => USER_CREDENTIAL);
  const resolver: CredentialResolver = { resolve };
  return { resolver, resolve };
}

const DOCS_SPEC = createCredentialSpec([GOOGLE_SCOPES.DOCUMENTS, GOOGLE_SCOPES.DRIVE]);

describe("createServiceFactory", () => {
  it("builds a handle for a supported API", async () => {
    const { resolver, resolve } = createStubResolver();
    const factory = createServiceFactory({ resolver });

    const handle = await factory.build("drive", "v3", DOCS_SPEC);

    expect(resolve).toHaveBeenCalledWith(DOCS_SPEC);
    expect(handle.apiName).toBe("drive");
    expect(handle.apiVersion).toBe("v3");
    expect(handle.credential).toBe(USER_CREDENTIAL);
    expect(typeof handle.client.files.list).toBe("function");
  });

  it("rejects an unsupported version before resolving credentials", async () => {
    const { resolver, resolve } = createStubResolver();
    const factory = createServiceFactory({ resolver });

    await expect(factory.build("drive", "v2", DOCS_SPEC)).rejects.toThrow(
      new ConfigurationError("Unsupported API: drive v2"),
    );
    expect(resolve).not.toHaveBeenCalled();
  });

  it("resolves once for several APIs", async () => {
    const { resolver, resolve } = createStubResolver();
    const factory = createServiceFactory({ resolver });

    const handles = await factory.buildAll(["docs", "drive"], DOCS_SPEC);

    expect(resolve).toHaveBeenCalledTimes(1);
    expect(Object.keys(handles)).toEqual(["docs", "drive"]);
    expect(handles.docs?.credential).toBe(handles.drive?.credential);
    expect(typeof handles.docs?.client.documents.get).toBe("function");
  });

  it("builds every API with its pinned version and no others", async () => {
    const { resolver } = createStubResolver();
    const factory = createServiceFactory({ resolver });

    const handles = await factory.buildAll(["sheets", "gmail", "calendar"], DOCS_SPEC);

    expect(Object.keys(handles)).toEqual(["sheets", "gmail", "calendar"]);
    expect(handles.sheets?.apiVersion).toBe("v4");
    expect(handles.gmail?.apiVersion).toBe("v1");
    expect(handles.calendar?.apiName).toBe("calendar");
    expect(typeof handles.sheets?.client.spreadsheets.get).toBe("function");
    expect(typeof handles.gmail?.client.users.messages.list).toBe("function");
    expect(handles.drive).toBeUndefined();
  });
});

describe("createAuthClient", () => {
  it("uses a JWT client for service accounts", () => {
    const auth = createAuthClient(SERVICE_ACCOUNT);

    expect(auth).toBeInstanceOf(google.auth.JWT);
  });

  it("seeds an OAuth2 client with the stored tokens", () => {
    const auth = createAuthClient(USER_CREDENTIAL);

    expect(auth.credentials).toEqual({
      access_token: "access-1",
      refresh_token: "refresh-1",
      expiry_date: Date.parse("2026-03-01T13:00:00Z"),
      scope: `${GOOGLE_SCOPES.DOCUMENTS} ${GOOGLE_SCOPES.DRIVE}`,
      token_type: "Bearer",
    });
  });
});
