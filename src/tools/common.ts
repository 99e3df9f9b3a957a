import { type Static, type TObject, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { drive_v3 } from "googleapis";

import {
  ExternalApiError,
  formatErrorMessage,
  toExternalApiError,
} from "../google/errors.js";
import type { ApiClients, ApiName } from "../google/service-factory.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  structuredContent: Record<string, unknown>;
};

/**
 * What a tool sees of the running server.
 */
export type ToolContext = {
  readonly variant: string;
  readonly driveFolderId?: string;
  service<N extends ApiName>(apiName: N): Promise<ApiClients[N]>;
};

export type WorkspaceTool<T extends TObject> = {
  name: string;
  label: string;
  description: string;
  parameters: T;
  execute: (
    toolCallId: string,
    params: Static<T>,
    context: ToolContext,
  ) => Promise<ToolResult>;
};

export type AnyWorkspaceTool = {
  name: string;
  label: string;
  description: string;
  parameters: TObject;
  execute: (
    toolCallId: string,
    args: unknown,
    context: ToolContext,
  ) => Promise<ToolResult>;
};

/**
 * Arguments that fail the tool's schema or its own checks.
 */
export class ToolInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolInputError";
  }
}

function describeSchemaError(schema: TSchema, value: unknown): string {
  const first = Value.Errors(schema, value).First();
  if (!first) return "invalid arguments";
  return `${first.path || "/"}: ${first.message}`;
}

/**
 * Erase a tool's parameter type behind a schema check, so the dispatcher can
 * hold tools of different shapes in one list.
 */
export function defineTool<T extends TObject>(tool: WorkspaceTool<T>): AnyWorkspaceTool {
  return {
    name: tool.name,
    label: tool.label,
    description: tool.description,
    parameters: tool.parameters,
    execute: async (toolCallId, args, context) => {
      const params = args ?? {};
      if (!Value.Check(tool.parameters, params)) {
        throw new ToolInputError(
          `Invalid arguments for ${tool.name}: ${describeSchemaError(tool.parameters, params)}`,
        );
      }
      return tool.execute(toolCallId, params, context);
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function jsonResult(payload: unknown): ToolResult {
  const structured = isRecord(payload) ? payload : { result: payload ?? null };
  return {
    content: [{ type: "text", text: JSON.stringify(payload ?? null, null, 2) }],
    structuredContent: structured,
  };
}

export const Recipient = Type.Object(
  {
    emailAddress: Type.String({ minLength: 1, description: "Email of the person to share with" }),
    role: Type.Union(
      [Type.Literal("reader"), Type.Literal("commenter"), Type.Literal("writer")],
      { description: "Access level to grant" },
    ),
  },
  { additionalProperties: false },
);

export type Recipient = Static<typeof Recipient>;

export const Recipients = Type.Array(Recipient, {
  minItems: 1,
  description: "People to share with",
});

export type ShareOutcome = {
  successes: Array<{ emailAddress: string; role: string; permissionId: string | null }>;
  failures: Array<{ emailAddress: string; error: string; status?: number }>;
};

/**
 * Grant each recipient access to a Drive file. One failing address does not
 * stop the others.
 */
export async function shareWithRecipients(
  drive: drive_v3.Drive,
  fileId: string,
  recipients: readonly Recipient[],
  sendNotification: boolean,
): Promise<ShareOutcome> {
  const outcome: ShareOutcome = { successes: [], failures: [] };
  for (const recipient of recipients) {
    try {
      const res = await drive.permissions.create({
        fileId,
        sendNotificationEmail: sendNotification,
        fields: "id",
        requestBody: {
          type: "user",
          role: recipient.role,
          emailAddress: recipient.emailAddress,
        },
      });
      outcome.successes.push({
        emailAddress: recipient.emailAddress,
        role: recipient.role,
        permissionId: res.data.id ?? null,
      });
    } catch (err) {
      const wrapped = toExternalApiError(err);
      outcome.failures.push({
        emailAddress: recipient.emailAddress,
        error: formatErrorMessage(err),
        status: wrapped instanceof ExternalApiError ? wrapped.status : undefined,
      });
    }
  }
  return outcome;
}

/**
 * Move a Drive file under `folderId`, detaching it from its current parents.
 */
export async function moveToFolder(
  drive: drive_v3.Drive,
  fileId: string,
  folderId: string,
): Promise<drive_v3.Schema$File> {
  const current = await drive.files.get({ fileId, fields: "parents" });
  const previousParents = (current.data.parents ?? []).join(",");
  const res = await drive.files.update({
    fileId,
    addParents: folderId,
    removeParents: previousParents || undefined,
    fields: "id, name, parents",
  });
  return res.data;
}

export const GOOGLE_DOC_MIME = "application/vnd.google-apps.document";
export const GOOGLE_SHEET_MIME = "application/vnd.google-apps.spreadsheet";
export const GOOGLE_SLIDES_MIME = "application/vnd.google-apps.presentation";
export const GOOGLE_FOLDER_MIME = "application/vnd.google-apps.folder";

/**
 * Quote a value for a Drive `q` expression.
 */
export function driveQueryString(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

export function isTextMimeType(mimeType: string): boolean {
  return (
    mimeType.startsWith("text/") ||
    mimeType.endsWith("+json") ||
    mimeType.endsWith("+xml") ||
    ["application/json", "application/xml", "application/javascript"].includes(mimeType)
  );
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (typeof data === "string") return Buffer.from(data, "utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  return Buffer.from(JSON.stringify(data ?? null), "utf8");
}

/** Media download body as text. */
export function mediaText(data: unknown): string {
  return typeof data === "string" ? data : toBuffer(data).toString("utf8");
}

/** Media download body as base64. */
export function mediaBase64(data: unknown): string {
  return toBuffer(data).toString("base64");
}
