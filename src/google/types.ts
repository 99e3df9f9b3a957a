/**
 * Shared types for Google Workspace credential handling.
 */

// -----------------------------------------------------------------------------
// Credential requests
// -----------------------------------------------------------------------------

export type CredentialSpec = {
  readonly scopes: readonly string[];
};

// -----------------------------------------------------------------------------
// Resolved credentials
// -----------------------------------------------------------------------------

export type ServiceAccountCredential = {
  type: "service_account";
  source: "inline" | "service_account_file";
  clientEmail: string;
  privateKey: string;
  privateKeyId?: string;
  projectId?: string;
  scopes: string[];
};

export type AuthorizedUserCredential = {
  type: "authorized_user";
  source: "token_file" | "refreshed" | "interactive";
  token: string;
  refreshToken?: string;
  expiry?: number; // Unix timestamp (ms)
  clientId?: string;
  clientSecret?: string;
  tokenUri: string;
  scopes: string[];
};

export type CredentialRecord =
  | ServiceAccountCredential
  | AuthorizedUserCredential;

export type CredentialSource = CredentialRecord["source"];

// -----------------------------------------------------------------------------
// OAuth client configuration
// -----------------------------------------------------------------------------

export type OAuthClientSecrets = {
  clientId: string;
  clientSecret: string;
  authUri: string;
  tokenUri: string;
};

/**
 * Tokens returned by Google's token endpoint, normalized.
 */
export type TokenGrant = {
  access: string;
  refresh?: string;
  expires: number; // Unix timestamp (ms)
  scopes?: string[];
};
