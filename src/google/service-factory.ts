import {
  type Auth,
  type calendar_v3,
  type docs_v1,
  type drive_v3,
  type gmail_v1,
  google,
  type sheets_v4,
} from "googleapis";

import { createSubsystemLogger, type SubsystemLogger } from "../logging.js";
import type { CredentialResolver } from "./credential-resolver.js";
import { ConfigurationError } from "./errors.js";
import type { CredentialRecord, CredentialSpec } from "./types.js";

export const API_VERSIONS = {
  calendar: "v3",
  docs: "v1",
  drive: "v3",
  gmail: "v1",
  sheets: "v4",
} as const;

export type ApiName = keyof typeof API_VERSIONS;

export type ApiClients = {
  calendar: calendar_v3.Calendar;
  docs: docs_v1.Docs;
  drive: drive_v3.Drive;
  gmail: gmail_v1.Gmail;
  sheets: sheets_v4.Sheets;
};

export type ServiceHandle<N extends ApiName = ApiName> = {
  apiName: N;
  apiVersion: (typeof API_VERSIONS)[N];
  credential: CredentialRecord;
  client: ApiClients[N];
};

export type ServiceHandles = { [N in ApiName]?: ServiceHandle<N> };

const CLIENT_BUILDERS: {
  [N in ApiName]: (auth: Auth.OAuth2Client) => ApiClients[N];
} = {
  calendar: (auth) => google.calendar({ version: "v3", auth }),
  docs: (auth) => google.docs({ version: "v1", auth }),
  drive: (auth) => google.drive({ version: "v3", auth }),
  gmail: (auth) => google.gmail({ version: "v1", auth }),
  sheets: (auth) => google.sheets({ version: "v4", auth }),
};

export function isApiName(value: string): value is ApiName {
  return Object.hasOwn(API_VERSIONS, value);
}

/**
 * Auth client for a resolved credential. User credentials carry the client
 * id/secret so googleapis can refresh the access token on its own.
 */
export function createAuthClient(credential: CredentialRecord): Auth.OAuth2Client {
  if (credential.type === "service_account") {
    return new google.auth.JWT({
      email: credential.clientEmail,
      key: credential.privateKey,
      keyId: credential.privateKeyId,
      scopes: credential.scopes,
    });
  }

  const client = new google.auth.OAuth2(credential.clientId, credential.clientSecret);
  client.setCredentials({
    access_token: credential.token,
    refresh_token: credential.refreshToken,
    expiry_date: credential.expiry,
    scope: credential.scopes.join(" "),
    token_type: "Bearer",
  });
  return client;
}

function createHandle<N extends ApiName>(
  apiName: N,
  credential: CredentialRecord,
): ServiceHandle<N> {
  return {
    apiName,
    apiVersion: API_VERSIONS[apiName],
    credential,
    client: CLIENT_BUILDERS[apiName](createAuthClient(credential)),
  };
}

function buildHandles(apis: readonly ApiName[], credential: CredentialRecord): ServiceHandles {
  const handles: ServiceHandles = {};
  for (const api of apis) {
    switch (api) {
      case "calendar":
        handles.calendar = createHandle("calendar", credential);
        break;
      case "docs":
        handles.docs = createHandle("docs", credential);
        break;
      case "drive":
        handles.drive = createHandle("drive", credential);
        break;
      case "gmail":
        handles.gmail = createHandle("gmail", credential);
        break;
      case "sheets":
        handles.sheets = createHandle("sheets", credential);
        break;
    }
  }
  return handles;
}

function assertSupported(apiName: string, apiVersion: string): asserts apiName is ApiName {
  if (!isApiName(apiName) || API_VERSIONS[apiName] !== apiVersion) {
    throw new ConfigurationError(`Unsupported API: ${apiName} ${apiVersion}`);
  }
}

export type ServiceFactoryOptions = {
  resolver: CredentialResolver;
  logger?: SubsystemLogger;
};

export function createServiceFactory(options: ServiceFactoryOptions) {
  const log = options.logger ?? createSubsystemLogger("services");

  return {
    /**
     * Resolve credentials for `spec` and build one API client.
     */
    build: async <N extends ApiName>(
      apiName: N,
      apiVersion: string,
      spec: CredentialSpec,
    ): Promise<ServiceHandle<N>> => {
      assertSupported(apiName, apiVersion);
      const credential = await options.resolver.resolve(spec);
      log.debug("Built API client", { api: apiName, version: apiVersion, source: credential.source });
      return createHandle(apiName, credential);
    },

    /**
     * Resolve credentials once and build a client for each API.
     */
    buildAll: async (
      apis: readonly ApiName[],
      spec: CredentialSpec,
    ): Promise<ServiceHandles> => {
      for (const api of apis) assertSupported(api, API_VERSIONS[api]);
      const credential = await options.resolver.resolve(spec);
      const handles = buildHandles(apis, credential);
      log.debug("Built API clients", { apis: apis.join(","), source: credential.source });
      return handles;
    },
  };
}

export type ServiceFactory = ReturnType<typeof createServiceFactory>;
