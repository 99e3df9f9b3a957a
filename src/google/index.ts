/**
 * Google Workspace credentials and API clients.
 */

export { runInteractiveFlow, refreshGoogleToken } from "./auth.js";
export {
  createCredentialResolver,
  type CredentialResolver,
  type CredentialResolverOptions,
} from "./credential-resolver.js";
export {
  AuthenticationError,
  ConfigurationError,
  ExternalApiError,
  formatErrorMessage,
} from "./errors.js";
export { createCredentialSpec, GOOGLE_SCOPES, hasRequiredScopes } from "./scopes.js";
export {
  API_VERSIONS,
  type ApiClients,
  type ApiName,
  createServiceFactory,
  type ServiceFactory,
  type ServiceHandle,
} from "./service-factory.js";
export type {
  AuthorizedUserCredential,
  CredentialRecord,
  CredentialSpec,
  ServiceAccountCredential,
} from "./types.js";
