import { ConfigurationError } from "./errors.js";
import type { CredentialSpec } from "./types.js";

export const GOOGLE_SCOPES = {
  CALENDAR: "https://www.googleapis.com/auth/calendar",
  DOCUMENTS: "https://www.googleapis.com/auth/documents",
  DRIVE: "https://www.googleapis.com/auth/drive",
  SPREADSHEETS: "https://www.googleapis.com/auth/spreadsheets",
  GMAIL_MODIFY: "https://www.googleapis.com/auth/gmail.modify",
  GMAIL_READONLY: "https://www.googleapis.com/auth/gmail.readonly",
  GMAIL_SEND: "https://www.googleapis.com/auth/gmail.send",
  GMAIL_COMPOSE: "https://www.googleapis.com/auth/gmail.compose",
} as const;

const SCOPE_PREFIX = "https://www.googleapis.com/auth/";

/**
 * Expand short scope names ("drive", "gmail.send") to full scope URLs.
 */
export function expandScope(scope: string): string {
  const trimmed = scope.trim();
  return trimmed.startsWith("https://") ? trimmed : `${SCOPE_PREFIX}${trimmed}`;
}

/**
 * Build an immutable credential request. Order is kept, duplicates dropped.
 */
export function createCredentialSpec(scopes: Iterable<string>): CredentialSpec {
  const unique: string[] = [];
  for (const scope of scopes) {
    if (!scope.trim()) continue;
    const expanded = expandScope(scope);
    if (!unique.includes(expanded)) unique.push(expanded);
  }
  if (unique.length === 0) {
    throw new ConfigurationError("A credential request needs at least one scope");
  }
  return Object.freeze({ scopes: Object.freeze(unique) });
}

/**
 * Check that every requested scope was granted.
 */
export function hasRequiredScopes(
  granted: readonly string[],
  required: readonly string[],
): boolean {
  return required.every((scope) => granted.includes(scope));
}
