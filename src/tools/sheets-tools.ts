/**
 * Google Sheets tools. Listing, folder placement and sharing go through Drive.
 */

import { Type } from "@sinclair/typebox";

import {
  type AnyWorkspaceTool,
  defineTool,
  driveQueryString,
  GOOGLE_SHEET_MIME,
  jsonResult,
  moveToFolder,
  Recipients,
  shareWithRecipients,
} from "./common.js";

const SpreadsheetId = Type.String({ minLength: 1, description: "Spreadsheet ID from its URL" });
const Range = Type.String({ minLength: 1, description: "A1 notation, e.g. 'Sheet1!A1:C10'" });
const SheetId = Type.Integer({ minimum: 0, description: "Numeric sheet (tab) ID" });

const Values = Type.Array(
  Type.Array(Type.Union([Type.String(), Type.Number(), Type.Boolean(), Type.Null()])),
  { description: "Rows of cell values" },
);

const ValueInputOption = Type.Optional(
  Type.Union([Type.Literal("RAW"), Type.Literal("USER_ENTERED")], {
    description: "RAW stores values as given; USER_ENTERED parses them like the UI (default: RAW)",
  }),
);

const CreateSchema = Type.Object(
  {
    title: Type.String({ minLength: 1 }),
    sheets: Type.Optional(Type.Array(Type.String({ minLength: 1 }), { description: "Tab titles" })),
  },
  { additionalProperties: false },
);

const GetSchema = Type.Object(
  { spreadsheetId: SpreadsheetId, includeGridData: Type.Optional(Type.Boolean()) },
  { additionalProperties: false },
);

const ListSchema = Type.Object(
  {
    query: Type.Optional(Type.String({ description: "Full-text search within spreadsheets" })),
    pageSize: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000, description: "Default 20" })),
    pageToken: Type.Optional(Type.String()),
    orderBy: Type.Optional(Type.String()),
  },
  { additionalProperties: false },
);

const SpreadsheetIdSchema = Type.Object(
  { spreadsheetId: SpreadsheetId },
  { additionalProperties: false },
);

const GetValuesSchema = Type.Object(
  {
    spreadsheetId: SpreadsheetId,
    range: Range,
    valueRenderOption: Type.Optional(
      Type.Union(
        [
          Type.Literal("FORMATTED_VALUE"),
          Type.Literal("UNFORMATTED_VALUE"),
          Type.Literal("FORMULA"),
        ],
        { description: "Default FORMATTED_VALUE" },
      ),
    ),
  },
  { additionalProperties: false },
);

const UpdateValuesSchema = Type.Object(
  { spreadsheetId: SpreadsheetId, range: Range, values: Values, valueInputOption: ValueInputOption },
  { additionalProperties: false },
);

const AppendValuesSchema = Type.Object(
  {
    spreadsheetId: SpreadsheetId,
    range: Range,
    values: Values,
    valueInputOption: ValueInputOption,
    insertDataOption: Type.Optional(
      Type.Union([Type.Literal("INSERT_ROWS"), Type.Literal("OVERWRITE")], {
        description: "Default INSERT_ROWS",
      }),
    ),
  },
  { additionalProperties: false },
);

const ClearValuesSchema = Type.Object(
  { spreadsheetId: SpreadsheetId, range: Range },
  { additionalProperties: false },
);

const AddSheetSchema = Type.Object(
  {
    spreadsheetId: SpreadsheetId,
    title: Type.String({ minLength: 1 }),
    rows: Type.Optional(Type.Integer({ minimum: 1, description: "Default 1000" })),
    columns: Type.Optional(Type.Integer({ minimum: 1, description: "Default 26" })),
  },
  { additionalProperties: false },
);

const DeleteSheetSchema = Type.Object(
  { spreadsheetId: SpreadsheetId, sheetId: SheetId },
  { additionalProperties: false },
);

const RenameSheetSchema = Type.Object(
  { spreadsheetId: SpreadsheetId, sheetId: SheetId, newTitle: Type.String({ minLength: 1 }) },
  { additionalProperties: false },
);

const ShareSchema = Type.Object(
  {
    spreadsheetId: SpreadsheetId,
    recipients: Recipients,
    sendNotification: Type.Optional(Type.Boolean({ description: "Default false" })),
  },
  { additionalProperties: false },
);

export function createSheetsTools(): AnyWorkspaceTool[] {
  return [
    defineTool({
      name: "create_spreadsheet",
      label: "Create spreadsheet",
      description: "Create a spreadsheet, optionally with named tabs.",
      parameters: CreateSchema,
      execute: async (_id, params, ctx) => {
        const sheets = await ctx.service("sheets");
        const res = await sheets.spreadsheets.create({
          requestBody: {
            properties: { title: params.title },
            sheets: params.sheets?.map((title) => ({ properties: { title } })),
          },
        });
        const spreadsheetId = res.data.spreadsheetId;
        if (!spreadsheetId) throw new Error("Sheets API returned no spreadsheetId");
        if (ctx.driveFolderId) {
          await moveToFolder(await ctx.service("drive"), spreadsheetId, ctx.driveFolderId);
        }
        return jsonResult({
          spreadsheetId,
          title: res.data.properties?.title ?? params.title,
          url: res.data.spreadsheetUrl ?? null,
          sheets: (res.data.sheets ?? []).map((sheet) => sheet.properties?.title ?? ""),
          folderId: ctx.driveFolderId ?? null,
        });
      },
    }),
    defineTool({
      name: "get_spreadsheet",
      label: "Get spreadsheet",
      description: "Fetch spreadsheet metadata, optionally with cell data.",
      parameters: GetSchema,
      execute: async (_id, params, ctx) => {
        const sheets = await ctx.service("sheets");
        const res = await sheets.spreadsheets.get({
          spreadsheetId: params.spreadsheetId,
          includeGridData: params.includeGridData ?? false,
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "list_spreadsheets",
      label: "List spreadsheets",
      description: "List spreadsheets the account can see.",
      parameters: ListSchema,
      execute: async (_id, params, ctx) => {
        const drive = await ctx.service("drive");
        const clauses = [`mimeType=${driveQueryString(GOOGLE_SHEET_MIME)}`, "trashed=false"];
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
      name: "list_sheets",
      label: "List sheets",
      description: "List the tab titles of a spreadsheet.",
      parameters: SpreadsheetIdSchema,
      execute: async (_id, params, ctx) => {
        const sheets = await ctx.service("sheets");
        const res = await sheets.spreadsheets.get({
          spreadsheetId: params.spreadsheetId,
          fields: "sheets(properties(title))",
        });
        return jsonResult({
          spreadsheetId: params.spreadsheetId,
          sheets: (res.data.sheets ?? []).map((sheet) => sheet.properties?.title ?? ""),
        });
      },
    }),
    defineTool({
      name: "get_values",
      label: "Get values",
      description: "Read a range of cells.",
      parameters: GetValuesSchema,
      execute: async (_id, params, ctx) => {
        const sheets = await ctx.service("sheets");
        const res = await sheets.spreadsheets.values.get({
          spreadsheetId: params.spreadsheetId,
          range: params.range,
          valueRenderOption: params.valueRenderOption ?? "FORMATTED_VALUE",
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "update_values",
      label: "Update values",
      description: "Overwrite a range of cells.",
      parameters: UpdateValuesSchema,
      execute: async (_id, params, ctx) => {
        const sheets = await ctx.service("sheets");
        const res = await sheets.spreadsheets.values.update({
          spreadsheetId: params.spreadsheetId,
          range: params.range,
          valueInputOption: params.valueInputOption ?? "RAW",
          requestBody: { values: params.values },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "append_values",
      label: "Append values",
      description: "Append rows after the table found in a range.",
      parameters: AppendValuesSchema,
      execute: async (_id, params, ctx) => {
        const sheets = await ctx.service("sheets");
        const res = await sheets.spreadsheets.values.append({
          spreadsheetId: params.spreadsheetId,
          range: params.range,
          valueInputOption: params.valueInputOption ?? "RAW",
          insertDataOption: params.insertDataOption ?? "INSERT_ROWS",
          requestBody: { values: params.values },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "clear_values",
      label: "Clear values",
      description: "Clear the values in a range, keeping formatting.",
      parameters: ClearValuesSchema,
      execute: async (_id, params, ctx) => {
        const sheets = await ctx.service("sheets");
        const res = await sheets.spreadsheets.values.clear({
          spreadsheetId: params.spreadsheetId,
          range: params.range,
          requestBody: {},
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "add_sheet",
      label: "Add sheet",
      description: "Add a tab to a spreadsheet.",
      parameters: AddSheetSchema,
      execute: async (_id, params, ctx) => {
        const sheets = await ctx.service("sheets");
        const res = await sheets.spreadsheets.batchUpdate({
          spreadsheetId: params.spreadsheetId,
          requestBody: {
            requests: [
              {
                addSheet: {
                  properties: {
                    title: params.title,
                    gridProperties: {
                      rowCount: params.rows ?? 1000,
                      columnCount: params.columns ?? 26,
                    },
                  },
                },
              },
            ],
          },
        });
        const added = res.data.replies?.[0]?.addSheet?.properties;
        return jsonResult({
          spreadsheetId: params.spreadsheetId,
          sheetId: added?.sheetId ?? null,
          title: added?.title ?? params.title,
        });
      },
    }),
    defineTool({
      name: "delete_sheet",
      label: "Delete sheet",
      description: "Remove a tab from a spreadsheet.",
      parameters: DeleteSheetSchema,
      execute: async (_id, params, ctx) => {
        const sheets = await ctx.service("sheets");
        await sheets.spreadsheets.batchUpdate({
          spreadsheetId: params.spreadsheetId,
          requestBody: { requests: [{ deleteSheet: { sheetId: params.sheetId } }] },
        });
        return jsonResult({ ok: true, spreadsheetId: params.spreadsheetId, sheetId: params.sheetId });
      },
    }),
    defineTool({
      name: "rename_sheet",
      label: "Rename sheet",
      description: "Change a tab's title.",
      parameters: RenameSheetSchema,
      execute: async (_id, params, ctx) => {
        const sheets = await ctx.service("sheets");
        await sheets.spreadsheets.batchUpdate({
          spreadsheetId: params.spreadsheetId,
          requestBody: {
            requests: [
              {
                updateSheetProperties: {
                  properties: { sheetId: params.sheetId, title: params.newTitle },
                  fields: "title",
                },
              },
            ],
          },
        });
        return jsonResult({
          spreadsheetId: params.spreadsheetId,
          sheetId: params.sheetId,
          title: params.newTitle,
        });
      },
    }),
    defineTool({
      name: "share_spreadsheet",
      label: "Share spreadsheet",
      description: "Grant people access to a spreadsheet.",
      parameters: ShareSchema,
      execute: async (_id, params, ctx) => {
        const drive = await ctx.service("drive");
        const outcome = await shareWithRecipients(
          drive,
          params.spreadsheetId,
          params.recipients,
          params.sendNotification ?? false,
        );
        return jsonResult({ spreadsheetId: params.spreadsheetId, ...outcome });
      },
    }),
  ];
}
