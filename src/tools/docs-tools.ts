/**
 * Google Docs tools. Listing, export and sharing go through Drive.
 */

import { type Static, Type } from "@sinclair/typebox";
import type { docs_v1 } from "googleapis";

import {
  type AnyWorkspaceTool,
  defineTool,
  driveQueryString,
  GOOGLE_DOC_MIME,
  jsonResult,
  mediaText,
  moveToFolder,
  Recipients,
  shareWithRecipients,
  ToolInputError,
} from "./common.js";

const DocumentId = Type.String({ minLength: 1, description: "Document ID from its URL" });

const TextStyle = Type.Object(
  {
    bold: Type.Optional(Type.Boolean()),
    italic: Type.Optional(Type.Boolean()),
    underline: Type.Optional(Type.Boolean()),
    strikethrough: Type.Optional(Type.Boolean()),
    fontSize: Type.Optional(Type.Number({ exclusiveMinimum: 0, description: "Points" })),
    fontFamily: Type.Optional(Type.String({ minLength: 1, description: "e.g. 'Roboto'" })),
    foregroundColor: Type.Optional(
      Type.String({ pattern: "^#[0-9a-fA-F]{6}$", description: "Hex color, e.g. '#1a73e8'" }),
    ),
  },
  { additionalProperties: false },
);

type TextStyle = Static<typeof TextStyle>;

const NamedStyleType = Type.Union([
  Type.Literal("NORMAL_TEXT"),
  Type.Literal("TITLE"),
  Type.Literal("SUBTITLE"),
  Type.Literal("HEADING_1"),
  Type.Literal("HEADING_2"),
  Type.Literal("HEADING_3"),
  Type.Literal("HEADING_4"),
  Type.Literal("HEADING_5"),
  Type.Literal("HEADING_6"),
]);

const CreateSchema = Type.Object(
  {
    title: Type.String({ minLength: 1 }),
    content: Type.Optional(Type.String({ description: "Initial body text" })),
  },
  { additionalProperties: false },
);

const DocumentIdSchema = Type.Object({ documentId: DocumentId }, { additionalProperties: false });

const ListSchema = Type.Object(
  {
    query: Type.Optional(Type.String({ description: "Full-text search within documents" })),
    pageSize: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000, description: "Default 20" })),
    pageToken: Type.Optional(Type.String()),
    orderBy: Type.Optional(Type.String({ description: "e.g. 'modifiedTime desc'" })),
  },
  { additionalProperties: false },
);

const GetContentSchema = Type.Object(
  {
    documentId: DocumentId,
    mimeType: Type.Optional(
      Type.Union(
        [Type.Literal("text/plain"), Type.Literal("text/html"), Type.Literal("text/markdown")],
        { description: "Export format (default: text/plain)" },
      ),
    ),
  },
  { additionalProperties: false },
);

const InsertTextSchema = Type.Object(
  {
    documentId: DocumentId,
    text: Type.String({ minLength: 1 }),
    index: Type.Integer({ minimum: 1, description: "Body index; 1 is the start" }),
  },
  { additionalProperties: false },
);

const ReplaceTextSchema = Type.Object(
  {
    documentId: DocumentId,
    text: Type.String(),
    startIndex: Type.Integer({ minimum: 1 }),
    endIndex: Type.Integer({ minimum: 2, description: "Exclusive" }),
  },
  { additionalProperties: false },
);

const FormatTextSchema = Type.Object(
  {
    documentId: DocumentId,
    startIndex: Type.Integer({ minimum: 1 }),
    endIndex: Type.Integer({ minimum: 2 }),
    style: TextStyle,
  },
  { additionalProperties: false },
);

const AppendParagraphSchema = Type.Object(
  {
    documentId: DocumentId,
    text: Type.String({ minLength: 1 }),
    namedStyleType: Type.Optional(NamedStyleType),
  },
  { additionalProperties: false },
);

const BatchUpdateSchema = Type.Object(
  {
    documentId: DocumentId,
    requests: Type.Array(Type.Record(Type.String(), Type.Unknown()), {
      minItems: 1,
      description: "Docs API requests, e.g. [{ insertText: { location: { index: 1 }, text: 'Hi' } }]",
    }),
  },
  { additionalProperties: false },
);

const ShareSchema = Type.Object(
  {
    documentId: DocumentId,
    recipients: Recipients,
    sendNotification: Type.Optional(Type.Boolean({ description: "Default false" })),
  },
  { additionalProperties: false },
);

function assertRange(startIndex: number, endIndex: number): void {
  if (endIndex <= startIndex) {
    throw new ToolInputError(
      `endIndex (${endIndex}) must be greater than startIndex (${startIndex})`,
    );
  }
}

function hexToRgb(hex: string): docs_v1.Schema$RgbColor {
  const value = Number.parseInt(hex.slice(1), 16);
  return {
    red: ((value >> 16) & 0xff) / 255,
    green: ((value >> 8) & 0xff) / 255,
    blue: (value & 0xff) / 255,
  };
}

/**
 * Translate the tool's flat style into a Docs TextStyle plus the field mask
 * naming exactly the properties that were given.
 */
export function toDocsTextStyle(style: TextStyle): {
  textStyle: docs_v1.Schema$TextStyle;
  fields: string;
} {
  const textStyle: docs_v1.Schema$TextStyle = {};
  const fields: string[] = [];
  if (style.bold !== undefined) {
    textStyle.bold = style.bold;
    fields.push("bold");
  }
  if (style.italic !== undefined) {
    textStyle.italic = style.italic;
    fields.push("italic");
  }
  if (style.underline !== undefined) {
    textStyle.underline = style.underline;
    fields.push("underline");
  }
  if (style.strikethrough !== undefined) {
    textStyle.strikethrough = style.strikethrough;
    fields.push("strikethrough");
  }
  if (style.fontSize !== undefined) {
    textStyle.fontSize = { magnitude: style.fontSize, unit: "PT" };
    fields.push("fontSize");
  }
  if (style.fontFamily !== undefined) {
    textStyle.weightedFontFamily = { fontFamily: style.fontFamily };
    fields.push("weightedFontFamily");
  }
  if (style.foregroundColor !== undefined) {
    textStyle.foregroundColor = { color: { rgbColor: hexToRgb(style.foregroundColor) } };
    fields.push("foregroundColor");
  }
  if (fields.length === 0) {
    throw new ToolInputError("style needs at least one property");
  }
  return { textStyle, fields: fields.join(",") };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * A Docs request names exactly one operation, e.g. `{ insertText: {...} }`.
 */
function isDocsRequest(value: unknown): value is docs_v1.Schema$Request {
  if (!isPlainRecord(value)) return false;
  const keys = Object.keys(value);
  return keys.length === 1 && isPlainRecord(value[keys[0] ?? ""]);
}

function documentEndIndex(document: docs_v1.Schema$Document): number {
  const content = document.body?.content ?? [];
  return content.at(-1)?.endIndex ?? 2;
}

export function createDocsTools(): AnyWorkspaceTool[] {
  return [
    defineTool({
      name: "docs_create",
      label: "Create document",
      description: "Create a document, optionally with initial text.",
      parameters: CreateSchema,
      execute: async (_id, params, ctx) => {
        const docs = await ctx.service("docs");
        const created = await docs.documents.create({ requestBody: { title: params.title } });
        const documentId = created.data.documentId;
        if (!documentId) throw new Error("Docs API returned no documentId");

        if (params.content) {
          await docs.documents.batchUpdate({
            documentId,
            requestBody: {
              requests: [{ insertText: { location: { index: 1 }, text: params.content } }],
            },
          });
        }
        if (ctx.driveFolderId) {
          await moveToFolder(await ctx.service("drive"), documentId, ctx.driveFolderId);
        }
        return jsonResult({
          documentId,
          title: created.data.title ?? params.title,
          url: `https://docs.google.com/document/d/${documentId}/edit`,
          folderId: ctx.driveFolderId ?? null,
        });
      },
    }),
    defineTool({
      name: "docs_get",
      label: "Get document",
      description: "Fetch a document's full structure.",
      parameters: DocumentIdSchema,
      execute: async (_id, params, ctx) => {
        const docs = await ctx.service("docs");
        const res = await docs.documents.get({ documentId: params.documentId });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "docs_list",
      label: "List documents",
      description: "List Google Docs the account can see.",
      parameters: ListSchema,
      execute: async (_id, params, ctx) => {
        const drive = await ctx.service("drive");
        const clauses = [`mimeType=${driveQueryString(GOOGLE_DOC_MIME)}`, "trashed=false"];
        if (params.query) clauses.push(`fullText contains ${driveQueryString(params.query)}`);
        const res = await drive.files.list({
          q: clauses.join(" and "),
          pageSize: params.pageSize ?? 20,
          pageToken: params.pageToken,
          orderBy: params.orderBy,
          fields: "nextPageToken, files(id, name, createdTime, modifiedTime, webViewLink)",
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "docs_get_content",
      label: "Get document content",
      description: "Export a document's body as plain text, HTML or Markdown.",
      parameters: GetContentSchema,
      execute: async (_id, params, ctx) => {
        const drive = await ctx.service("drive");
        const mimeType = params.mimeType ?? "text/plain";
        const res = await drive.files.export(
          { fileId: params.documentId, mimeType },
          { responseType: "text" },
        );
        return jsonResult({
          documentId: params.documentId,
          mimeType,
          content: mediaText(res.data),
        });
      },
    }),
    defineTool({
      name: "docs_insert_text",
      label: "Insert text",
      description: "Insert text at a body index.",
      parameters: InsertTextSchema,
      execute: async (_id, params, ctx) => {
        const docs = await ctx.service("docs");
        const res = await docs.documents.batchUpdate({
          documentId: params.documentId,
          requestBody: {
            requests: [{ insertText: { location: { index: params.index }, text: params.text } }],
          },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "docs_replace_text",
      label: "Replace text",
      description: "Replace the text in [startIndex, endIndex) with new text.",
      parameters: ReplaceTextSchema,
      execute: async (_id, params, ctx) => {
        assertRange(params.startIndex, params.endIndex);
        const docs = await ctx.service("docs");
        const requests: docs_v1.Schema$Request[] = [
          {
            deleteContentRange: {
              range: { startIndex: params.startIndex, endIndex: params.endIndex },
            },
          },
        ];
        if (params.text) {
          requests.push({
            insertText: { location: { index: params.startIndex }, text: params.text },
          });
        }
        const res = await docs.documents.batchUpdate({
          documentId: params.documentId,
          requestBody: { requests },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "docs_format_text",
      label: "Format text",
      description: "Apply character formatting to [startIndex, endIndex).",
      parameters: FormatTextSchema,
      execute: async (_id, params, ctx) => {
        assertRange(params.startIndex, params.endIndex);
        const { textStyle, fields } = toDocsTextStyle(params.style);
        const docs = await ctx.service("docs");
        const res = await docs.documents.batchUpdate({
          documentId: params.documentId,
          requestBody: {
            requests: [
              {
                updateTextStyle: {
                  range: { startIndex: params.startIndex, endIndex: params.endIndex },
                  textStyle,
                  fields,
                },
              },
            ],
          },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "docs_append_paragraph",
      label: "Append paragraph",
      description: "Add a paragraph at the end of the document.",
      parameters: AppendParagraphSchema,
      execute: async (_id, params, ctx) => {
        const docs = await ctx.service("docs");
        const current = await docs.documents.get({
          documentId: params.documentId,
          fields: "body(content(endIndex))",
        });
        // The final newline of the body cannot be moved; insert before it.
        const insertAt = documentEndIndex(current.data) - 1;
        const requests: docs_v1.Schema$Request[] = [
          { insertText: { location: { index: insertAt }, text: `\n${params.text}` } },
        ];
        if (params.namedStyleType) {
          requests.push({
            updateParagraphStyle: {
              range: { startIndex: insertAt + 1, endIndex: insertAt + 1 + params.text.length },
              paragraphStyle: { namedStyleType: params.namedStyleType },
              fields: "namedStyleType",
            },
          });
        }
        const res = await docs.documents.batchUpdate({
          documentId: params.documentId,
          requestBody: { requests },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "docs_batch_update",
      label: "Batch update",
      description: "Send raw Docs API requests in one atomic batch.",
      parameters: BatchUpdateSchema,
      execute: async (_id, params, ctx) => {
        const requests: docs_v1.Schema$Request[] = [];
        params.requests.forEach((request, index) => {
          if (!isDocsRequest(request)) {
            throw new ToolInputError(
              `requests[${index}] must name exactly one operation, e.g. { "insertText": { ... } }`,
            );
          }
          requests.push(request);
        });
        const docs = await ctx.service("docs");
        const res = await docs.documents.batchUpdate({
          documentId: params.documentId,
          requestBody: { requests },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "docs_share",
      label: "Share document",
      description: "Grant people access to a document.",
      parameters: ShareSchema,
      execute: async (_id, params, ctx) => {
        const drive = await ctx.service("drive");
        const outcome = await shareWithRecipients(
          drive,
          params.documentId,
          params.recipients,
          params.sendNotification ?? false,
        );
        return jsonResult({ documentId: params.documentId, ...outcome });
      },
    }),
  ];
}
