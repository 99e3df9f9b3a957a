/**
 * Google Drive tools: search, folders, uploads, content and sharing.
 */

import { Readable } from "node:stream";

import { Type } from "@sinclair/typebox";

import {
  type AnyWorkspaceTool,
  defineTool,
  GOOGLE_DOC_MIME,
  GOOGLE_FOLDER_MIME,
  GOOGLE_SHEET_MIME,
  GOOGLE_SLIDES_MIME,
  isTextMimeType,
  jsonResult,
  mediaBase64,
  mediaText,
  moveToFolder,
  Recipients,
  shareWithRecipients,
  ToolInputError,
} from "./common.js";

const FILE_FIELDS = "id, name, mimeType, parents, webViewLink";

const METADATA_FIELDS =
  "id, name, mimeType, size, createdTime, modifiedTime, parents, owners(displayName, emailAddress), webViewLink, shared, trashed";

/** Export format used when reading a native Google file. */
export const EXPORT_MIME_TYPES: Readonly<Record<string, string>> = {
  [GOOGLE_DOC_MIME]: "text/plain",
  [GOOGLE_SHEET_MIME]: "text/csv",
  [GOOGLE_SLIDES_MIME]: "text/plain",
};

const FileId = Type.String({ minLength: 1 });

const SearchSchema = Type.Object(
  {
    query: Type.String({
      description: "Drive query, e.g. \"name contains 'report' and trashed = false\"",
    }),
    pageSize: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000, description: "Default 100" })),
    pageToken: Type.Optional(Type.String()),
    orderBy: Type.Optional(Type.String({ description: "e.g. 'modifiedTime desc'" })),
  },
  { additionalProperties: false },
);

const CreateFolderSchema = Type.Object(
  {
    name: Type.String({ minLength: 1 }),
    parentId: Type.Optional(Type.String({ minLength: 1, description: "Defaults to DRIVE_FOLDER_ID" })),
  },
  { additionalProperties: false },
);

const UploadSchema = Type.Object(
  {
    name: Type.String({ minLength: 1 }),
    mimeType: Type.String({ minLength: 1 }),
    contentBase64: Type.String({ description: "File content, base64 encoded" }),
    parentId: Type.Optional(Type.String({ minLength: 1, description: "Defaults to DRIVE_FOLDER_ID" })),
  },
  { additionalProperties: false },
);

const MoveSchema = Type.Object(
  { fileId: FileId, newParentId: Type.String({ minLength: 1 }) },
  { additionalProperties: false },
);

const RenameSchema = Type.Object(
  { fileId: FileId, newName: Type.String({ minLength: 1 }) },
  { additionalProperties: false },
);

const FileIdSchema = Type.Object({ fileId: FileId }, { additionalProperties: false });

const ShareSchema = Type.Object(
  {
    fileId: FileId,
    recipients: Recipients,
    sendNotification: Type.Optional(Type.Boolean({ description: "Default false" })),
  },
  { additionalProperties: false },
);

function parentsFor(parentId: string | undefined, fallback: string | undefined): string[] | undefined {
  const parent = parentId ?? fallback;
  return parent ? [parent] : undefined;
}

export function createDriveTools(): AnyWorkspaceTool[] {
  return [
    defineTool({
      name: "search_files",
      label: "Search files",
      description: "Search Drive with a query expression.",
      parameters: SearchSchema,
      execute: async (_id, params, ctx) => {
        const drive = await ctx.service("drive");
        const res = await drive.files.list({
          q: params.query,
          pageSize: params.pageSize ?? 100,
          pageToken: params.pageToken,
          orderBy: params.orderBy,
          fields: "nextPageToken, files(id, name, mimeType, size, modifiedTime, parents, webViewLink)",
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "create_folder",
      label: "Create folder",
      description: "Create a folder.",
      parameters: CreateFolderSchema,
      execute: async (_id, params, ctx) => {
        const drive = await ctx.service("drive");
        const res = await drive.files.create({
          requestBody: {
            name: params.name,
            mimeType: GOOGLE_FOLDER_MIME,
            parents: parentsFor(params.parentId, ctx.driveFolderId),
          },
          fields: FILE_FIELDS,
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "upload_file",
      label: "Upload file",
      description: "Upload a file from base64 content.",
      parameters: UploadSchema,
      execute: async (_id, params, ctx) => {
        const content = Buffer.from(params.contentBase64, "base64");
        const drive = await ctx.service("drive");
        const res = await drive.files.create({
          requestBody: {
            name: params.name,
            mimeType: params.mimeType,
            parents: parentsFor(params.parentId, ctx.driveFolderId),
          },
          media: { mimeType: params.mimeType, body: Readable.from(content) },
          fields: FILE_FIELDS,
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "move_file",
      label: "Move file",
      description: "Move a file into another folder.",
      parameters: MoveSchema,
      execute: async (_id, params, ctx) => {
        const drive = await ctx.service("drive");
        return jsonResult(await moveToFolder(drive, params.fileId, params.newParentId));
      },
    }),
    defineTool({
      name: "rename_file",
      label: "Rename file",
      description: "Rename a file or folder.",
      parameters: RenameSchema,
      execute: async (_id, params, ctx) => {
        const drive = await ctx.service("drive");
        const res = await drive.files.update({
          fileId: params.fileId,
          requestBody: { name: params.newName },
          fields: "id, name",
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "delete_file",
      label: "Delete file",
      description: "Permanently delete a file, bypassing the trash.",
      parameters: FileIdSchema,
      execute: async (_id, params, ctx) => {
        const drive = await ctx.service("drive");
        await drive.files.delete({ fileId: params.fileId });
        return jsonResult({ ok: true, fileId: params.fileId });
      },
    }),
    defineTool({
      name: "get_file_content",
      label: "Get file content",
      description:
        "Read a file. Docs and Slides come back as plain text, Sheets as CSV, other text files as text, anything else as base64.",
      parameters: FileIdSchema,
      execute: async (_id, params, ctx) => {
        const drive = await ctx.service("drive");
        const meta = await drive.files.get({ fileId: params.fileId, fields: "id, name, mimeType" });
        const name = meta.data.name ?? null;
        const sourceType = meta.data.mimeType ?? "application/octet-stream";

        const exportType = EXPORT_MIME_TYPES[sourceType];
        if (exportType) {
          const res = await drive.files.export(
            { fileId: params.fileId, mimeType: exportType },
            { responseType: "text" },
          );
          return jsonResult({
            fileId: params.fileId,
            name,
            mimeType: exportType,
            encoding: "text",
            content: mediaText(res.data),
          });
        }
        if (sourceType.startsWith("application/vnd.google-apps.")) {
          throw new ToolInputError(`Cannot read content of Google file type ${sourceType}`);
        }

        const asText = isTextMimeType(sourceType);
        const res = await drive.files.get(
          { fileId: params.fileId, alt: "media" },
          { responseType: asText ? "text" : "arraybuffer" },
        );
        return jsonResult({
          fileId: params.fileId,
          name,
          mimeType: sourceType,
          encoding: asText ? "text" : "base64",
          content: asText ? mediaText(res.data) : mediaBase64(res.data),
        });
      },
    }),
    defineTool({
      name: "share_file",
      label: "Share file",
      description: "Grant people access to a file or folder.",
      parameters: ShareSchema,
      execute: async (_id, params, ctx) => {
        const drive = await ctx.service("drive");
        const outcome = await shareWithRecipients(
          drive,
          params.fileId,
          params.recipients,
          params.sendNotification ?? false,
        );
        return jsonResult({ fileId: params.fileId, ...outcome });
      },
    }),
    defineTool({
      name: "get_file_metadata",
      label: "Get file metadata",
      description: "Fetch a file's metadata.",
      parameters: FileIdSchema,
      execute: async (_id, params, ctx) => {
        const drive = await ctx.service("drive");
        const res = await drive.files.get({ fileId: params.fileId, fields: METADATA_FIELDS });
        return jsonResult(res.data);
      },
    }),
  ];
}
