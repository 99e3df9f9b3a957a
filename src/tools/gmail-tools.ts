/**
 * Gmail tools: messages, threads, labels and composition.
 */

import { Type } from "@sinclair/typebox";

import {
  buildForwardBody,
  buildMimeMessage,
  encodeRawMessage,
  forwardSubject,
  getHeader,
  replySubject,
} from "../google/mime.js";
import { type AnyWorkspaceTool, defineTool, jsonResult } from "./common.js";

const Format = Type.Optional(
  Type.Union(
    [Type.Literal("full"), Type.Literal("metadata"), Type.Literal("minimal"), Type.Literal("raw")],
    { description: "Response format (default: full)" },
  ),
);

const Addresses = Type.Array(Type.String({ minLength: 1 }));

const Attachment = Type.Object(
  {
    filename: Type.String({ minLength: 1 }),
    mimeType: Type.String({ minLength: 1, description: "e.g. 'application/pdf'" }),
    contentBase64: Type.String({ description: "File content, base64 encoded" }),
  },
  { additionalProperties: false },
);

const LabelColor = Type.Object(
  {
    textColor: Type.String({ description: "Hex color from Gmail's palette, e.g. '#000000'" }),
    backgroundColor: Type.String(),
  },
  { additionalProperties: false },
);

const MessageListVisibility = Type.Union([Type.Literal("show"), Type.Literal("hide")]);

const LabelListVisibility = Type.Union([
  Type.Literal("labelShow"),
  Type.Literal("labelShowIfUnread"),
  Type.Literal("labelHide"),
]);

const ListFields = {
  query: Type.Optional(Type.String({ description: "Gmail search, e.g. 'from:ada is:unread'" })),
  labelIds: Type.Optional(Type.Array(Type.String())),
  includeSpamTrash: Type.Optional(Type.Boolean()),
  pageSize: Type.Optional(Type.Integer({ minimum: 1, maximum: 500, description: "Default 20" })),
  pageToken: Type.Optional(Type.String()),
};

const GetMessageSchema = Type.Object(
  { messageId: Type.String({ minLength: 1 }), format: Format },
  { additionalProperties: false },
);

const ListSchema = Type.Object(ListFields, { additionalProperties: false });

const SendSchema = Type.Object(
  {
    to: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
    subject: Type.String(),
    body: Type.String(),
    cc: Type.Optional(Addresses),
    bcc: Type.Optional(Addresses),
    isHtml: Type.Optional(Type.Boolean()),
    attachments: Type.Optional(Type.Array(Attachment)),
  },
  { additionalProperties: false },
);

const ReplySchema = Type.Object(
  {
    messageId: Type.String({ minLength: 1 }),
    body: Type.String(),
    isHtml: Type.Optional(Type.Boolean()),
    attachments: Type.Optional(Type.Array(Attachment)),
  },
  { additionalProperties: false },
);

const ForwardSchema = Type.Object(
  {
    messageId: Type.String({ minLength: 1 }),
    to: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
    body: Type.Optional(Type.String({ description: "Note placed above the forwarded message" })),
    cc: Type.Optional(Addresses),
    bcc: Type.Optional(Addresses),
    isHtml: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);

const AttachmentSchema = Type.Object(
  { messageId: Type.String({ minLength: 1 }), attachmentId: Type.String({ minLength: 1 }) },
  { additionalProperties: false },
);

const EmptySchema = Type.Object({}, { additionalProperties: false });

const CreateLabelSchema = Type.Object(
  {
    name: Type.String({ minLength: 1 }),
    messageListVisibility: Type.Optional(MessageListVisibility),
    labelListVisibility: Type.Optional(LabelListVisibility),
    color: Type.Optional(LabelColor),
  },
  { additionalProperties: false },
);

const UpdateLabelSchema = Type.Object(
  {
    labelId: Type.String({ minLength: 1 }),
    name: Type.Optional(Type.String({ minLength: 1 })),
    messageListVisibility: Type.Optional(MessageListVisibility),
    labelListVisibility: Type.Optional(LabelListVisibility),
    color: Type.Optional(LabelColor),
  },
  { additionalProperties: false },
);

const LabelIdSchema = Type.Object(
  { labelId: Type.String({ minLength: 1 }) },
  { additionalProperties: false },
);

const GetThreadSchema = Type.Object(
  { threadId: Type.String({ minLength: 1 }), format: Format },
  { additionalProperties: false },
);

const MessageIds = Type.Array(Type.String({ minLength: 1 }), { minItems: 1, maxItems: 1000 });

const BatchModifySchema = Type.Object(
  {
    messageIds: MessageIds,
    addLabelIds: Type.Optional(Type.Array(Type.String())),
    removeLabelIds: Type.Optional(Type.Array(Type.String())),
  },
  { additionalProperties: false },
);

const BatchDeleteSchema = Type.Object({ messageIds: MessageIds }, { additionalProperties: false });

const REPLY_HEADERS = ["Subject", "From", "Reply-To", "Message-ID", "References"];

export function createGmailTools(): AnyWorkspaceTool[] {
  return [
    defineTool({
      name: "gmail_get_message",
      label: "Get message",
      description: "Fetch a message by ID.",
      parameters: GetMessageSchema,
      execute: async (_id, params, ctx) => {
        const gmail = await ctx.service("gmail");
        const res = await gmail.users.messages.get({
          userId: "me",
          id: params.messageId,
          format: params.format ?? "full",
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "gmail_list_messages",
      label: "List messages",
      description: "List message IDs matching a Gmail search or labels.",
      parameters: ListSchema,
      execute: async (_id, params, ctx) => {
        const gmail = await ctx.service("gmail");
        const res = await gmail.users.messages.list({
          userId: "me",
          q: params.query,
          labelIds: params.labelIds,
          includeSpamTrash: params.includeSpamTrash ?? false,
          maxResults: params.pageSize ?? 20,
          pageToken: params.pageToken,
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "gmail_send_message",
      label: "Send message",
      description: "Send an email, optionally HTML and with attachments.",
      parameters: SendSchema,
      execute: async (_id, params, ctx) => {
        const gmail = await ctx.service("gmail");
        const mime = buildMimeMessage({
          to: params.to,
          cc: params.cc,
          bcc: params.bcc,
          subject: params.subject,
          body: params.body,
          isHtml: params.isHtml,
          attachments: params.attachments,
        });
        const res = await gmail.users.messages.send({
          userId: "me",
          requestBody: { raw: encodeRawMessage(mime) },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "gmail_reply",
      label: "Reply",
      description: "Reply to the sender of a message, in the same thread.",
      parameters: ReplySchema,
      execute: async (_id, params, ctx) => {
        const gmail = await ctx.service("gmail");
        const original = await gmail.users.messages.get({
          userId: "me",
          id: params.messageId,
          format: "metadata",
          metadataHeaders: REPLY_HEADERS,
        });
        const recipient = getHeader(original.data, "Reply-To") || getHeader(original.data, "From");
        const messageId = getHeader(original.data, "Message-ID");
        const references = [getHeader(original.data, "References"), messageId]
          .filter(Boolean)
          .join(" ");
        const mime = buildMimeMessage({
          to: [recipient],
          subject: replySubject(getHeader(original.data, "Subject")),
          body: params.body,
          isHtml: params.isHtml,
          attachments: params.attachments,
          inReplyTo: messageId || undefined,
          references: references || undefined,
        });
        const res = await gmail.users.messages.send({
          userId: "me",
          requestBody: {
            raw: encodeRawMessage(mime),
            threadId: original.data.threadId ?? undefined,
          },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "gmail_forward",
      label: "Forward",
      description: "Forward a message with its text quoted below an optional note.",
      parameters: ForwardSchema,
      execute: async (_id, params, ctx) => {
        const gmail = await ctx.service("gmail");
        const original = await gmail.users.messages.get({
          userId: "me",
          id: params.messageId,
          format: "full",
        });
        const isHtml = params.isHtml ?? false;
        const mime = buildMimeMessage({
          to: params.to,
          cc: params.cc,
          bcc: params.bcc,
          subject: forwardSubject(getHeader(original.data, "Subject")),
          body: buildForwardBody({ note: params.body, original: original.data, isHtml }),
          isHtml,
        });
        const res = await gmail.users.messages.send({
          userId: "me",
          requestBody: { raw: encodeRawMessage(mime) },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "gmail_get_attachment",
      label: "Get attachment",
      description: "Download an attachment as URL-safe base64.",
      parameters: AttachmentSchema,
      execute: async (_id, params, ctx) => {
        const gmail = await ctx.service("gmail");
        const res = await gmail.users.messages.attachments.get({
          userId: "me",
          messageId: params.messageId,
          id: params.attachmentId,
        });
        return jsonResult({
          messageId: params.messageId,
          attachmentId: params.attachmentId,
          size: res.data.size ?? null,
          data: res.data.data ?? null,
        });
      },
    }),
    defineTool({
      name: "gmail_list_labels",
      label: "List labels",
      description: "List the mailbox's system and user labels.",
      parameters: EmptySchema,
      execute: async (_id, _params, ctx) => {
        const gmail = await ctx.service("gmail");
        const res = await gmail.users.labels.list({ userId: "me" });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "gmail_create_label",
      label: "Create label",
      description: "Create a user label.",
      parameters: CreateLabelSchema,
      execute: async (_id, params, ctx) => {
        const gmail = await ctx.service("gmail");
        const res = await gmail.users.labels.create({
          userId: "me",
          requestBody: {
            name: params.name,
            messageListVisibility: params.messageListVisibility ?? "show",
            labelListVisibility: params.labelListVisibility ?? "labelShow",
            color: params.color,
          },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "gmail_update_label",
      label: "Update label",
      description: "Rename a label or change its visibility or color.",
      parameters: UpdateLabelSchema,
      execute: async (_id, params, ctx) => {
        const gmail = await ctx.service("gmail");
        const res = await gmail.users.labels.patch({
          userId: "me",
          id: params.labelId,
          requestBody: {
            name: params.name,
            messageListVisibility: params.messageListVisibility,
            labelListVisibility: params.labelListVisibility,
            color: params.color,
          },
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "gmail_delete_label",
      label: "Delete label",
      description: "Delete a user label. Messages keep their other labels.",
      parameters: LabelIdSchema,
      execute: async (_id, params, ctx) => {
        const gmail = await ctx.service("gmail");
        await gmail.users.labels.delete({ userId: "me", id: params.labelId });
        return jsonResult({ ok: true, labelId: params.labelId });
      },
    }),
    defineTool({
      name: "gmail_get_thread",
      label: "Get thread",
      description: "Fetch a conversation with all of its messages.",
      parameters: GetThreadSchema,
      execute: async (_id, params, ctx) => {
        const gmail = await ctx.service("gmail");
        const res = await gmail.users.threads.get({
          userId: "me",
          id: params.threadId,
          format: params.format ?? "full",
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "gmail_list_threads",
      label: "List threads",
      description: "List conversations matching a Gmail search or labels.",
      parameters: ListSchema,
      execute: async (_id, params, ctx) => {
        const gmail = await ctx.service("gmail");
        const res = await gmail.users.threads.list({
          userId: "me",
          q: params.query,
          labelIds: params.labelIds,
          includeSpamTrash: params.includeSpamTrash ?? false,
          maxResults: params.pageSize ?? 20,
          pageToken: params.pageToken,
        });
        return jsonResult(res.data);
      },
    }),
    defineTool({
      name: "gmail_batch_modify",
      label: "Batch modify",
      description: "Add or remove labels on many messages at once.",
      parameters: BatchModifySchema,
      execute: async (_id, params, ctx) => {
        const gmail = await ctx.service("gmail");
        await gmail.users.messages.batchModify({
          userId: "me",
          requestBody: {
            ids: params.messageIds,
            addLabelIds: params.addLabelIds,
            removeLabelIds: params.removeLabelIds,
          },
        });
        return jsonResult({ ok: true, modified: params.messageIds.length });
      },
    }),
    defineTool({
      name: "gmail_batch_delete",
      label: "Batch delete",
      description: "Permanently delete messages. This bypasses the trash.",
      parameters: BatchDeleteSchema,
      execute: async (_id, params, ctx) => {
        const gmail = await ctx.service("gmail");
        await gmail.users.messages.batchDelete({
          userId: "me",
          requestBody: { ids: params.messageIds },
        });
        return jsonResult({ ok: true, deleted: params.messageIds.length });
      },
    }),
  ];
}
