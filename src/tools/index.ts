import { GOOGLE_SCOPES } from "../google/scopes.js";
import type { ApiName } from "../google/service-factory.js";
import { createCalendarTools } from "./calendar-tools.js";
import type { AnyWorkspaceTool } from "./common.js";
import { createDocsTools } from "./docs-tools.js";
import { createDriveTools } from "./drive-tools.js";
import { createGmailTools } from "./gmail-tools.js";
import { createMeetTools } from "./meet-tools.js";
import { createSheetsTools } from "./sheets-tools.js";

export const VARIANT_NAMES = ["calendar", "docs", "drive", "gmail", "meet", "sheets"] as const;

export type VariantName = (typeof VARIANT_NAMES)[number];

export type ServerVariant = {
  name: VariantName;
  title: string;
  apis: readonly ApiName[];
  scopes: readonly string[];
  createTools: () => AnyWorkspaceTool[];
};

const VARIANTS: Record<VariantName, ServerVariant> = {
  calendar: {
    name: "calendar",
    title: "Google Calendar",
    apis: ["calendar"],
    scopes: [GOOGLE_SCOPES.CALENDAR],
    createTools: createCalendarTools,
  },
  docs: {
    name: "docs",
    title: "Google Docs",
    apis: ["docs", "drive"],
    scopes: [GOOGLE_SCOPES.DOCUMENTS, GOOGLE_SCOPES.DRIVE],
    createTools: createDocsTools,
  },
  drive: {
    name: "drive",
    title: "Google Drive",
    apis: ["drive"],
    scopes: [GOOGLE_SCOPES.DRIVE],
    createTools: createDriveTools,
  },
  gmail: {
    name: "gmail",
    title: "Gmail",
    apis: ["gmail"],
    scopes: [
      GOOGLE_SCOPES.GMAIL_MODIFY,
      GOOGLE_SCOPES.GMAIL_READONLY,
      GOOGLE_SCOPES.GMAIL_SEND,
      GOOGLE_SCOPES.GMAIL_COMPOSE,
    ],
    createTools: createGmailTools,
  },
  meet: {
    name: "meet",
    title: "Google Meet",
    apis: ["calendar"],
    scopes: [GOOGLE_SCOPES.CALENDAR],
    createTools: createMeetTools,
  },
  sheets: {
    name: "sheets",
    title: "Google Sheets",
    apis: ["sheets", "drive"],
    scopes: [GOOGLE_SCOPES.SPREADSHEETS, GOOGLE_SCOPES.DRIVE],
    createTools: createSheetsTools,
  },
};

export function isVariantName(value: string): value is VariantName {
  return VARIANT_NAMES.some((name) => name === value);
}

export function getVariant(name: VariantName): ServerVariant {
  return VARIANTS[name];
}

export function listVariants(): ServerVariant[] {
  return VARIANT_NAMES.map((name) => VARIANTS[name]);
}

/**
 * Scopes covering every variant, for a single login that serves them all.
 */
export function allVariantScopes(): string[] {
  return [...new Set(listVariants().flatMap((variant) => variant.scopes))];
}

export type { AnyWorkspaceTool, ToolContext, ToolResult } from "./common.js";
export { ToolInputError } from "./common.js";
