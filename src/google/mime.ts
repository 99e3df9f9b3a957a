/**
 * RFC 2822 message composition and Gmail payload helpers.
 */

import { randomBytes } from "node:crypto";

import type { gmail_v1 } from "googleapis";

export type MailAttachment = {
  filename: string;
  mimeType: string;
  /** Standard or URL-safe base64. */
  contentBase64: string;
};

export type MailDraft = {
  to: readonly string[];
  cc?: readonly string[];
  bcc?: readonly string[];
  subject: string;
  body: string;
  isHtml?: boolean;
  attachments?: readonly MailAttachment[];
  inReplyTo?: string;
  references?: string;
  boundary?: string;
};

const CRLF = "\r\n";

/**
 * RFC 2047 encoded-word for non-ASCII header values.
 */
export function encodeHeaderValue(value: string): string {
  if (Buffer.byteLength(value, "utf8") === value.length) return value;
  return `=?UTF-8?B?${Buffer.from(value, "utf8").toString("base64")}?=`;
}

function wrapBase64(data: string): string {
  return data.replace(/.{1,76}/g, (line) => `${line}${CRLF}`).trimEnd();
}

function normalizeBase64(data: string): string {
  return data.replace(/-/g, "+").replace(/_/g, "/").replace(/\s+/g, "");
}

function quoteFilename(filename: string): string {
  return `"${filename.replace(/["\\\r\n]/g, "_")}"`;
}

function bodyPart(body: string, isHtml: boolean): string[] {
  return [
    `Content-Type: ${isHtml ? "text/html" : "text/plain"}; charset="UTF-8"`,
    "Content-Transfer-Encoding: base64",
    "",
    wrapBase64(Buffer.from(body, "utf8").toString("base64")),
  ];
}

/**
 * Compose a MIME message. With attachments it becomes multipart/mixed.
 */
export function buildMimeMessage(draft: MailDraft): string {
  const headers = [`To: ${draft.to.join(", ")}`];
  if (draft.cc?.length) headers.push(`Cc: ${draft.cc.join(", ")}`);
  if (draft.bcc?.length) headers.push(`Bcc: ${draft.bcc.join(", ")}`);
  headers.push(`Subject: ${encodeHeaderValue(draft.subject)}`);
  if (draft.inReplyTo) headers.push(`In-Reply-To: ${draft.inReplyTo}`);
  if (draft.references) headers.push(`References: ${draft.references}`);
  headers.push("MIME-Version: 1.0");

  const attachments = draft.attachments ?? [];
  if (attachments.length === 0) {
    return [...headers, ...bodyPart(draft.body, draft.isHtml ?? false)].join(CRLF);
  }

  const boundary = draft.boundary ?? `mixed_${randomBytes(12).toString("hex")}`;
  const lines = [
    ...headers,
    `Content-Type: multipart/mixed; boundary="${boundary}"`,
    "",
    `--${boundary}`,
    ...bodyPart(draft.body, draft.isHtml ?? false),
  ];
  for (const attachment of attachments) {
    const name = quoteFilename(attachment.filename);
    lines.push(
      `--${boundary}`,
      `Content-Type: ${attachment.mimeType}; name=${name}`,
      `Content-Disposition: attachment; filename=${name}`,
      "Content-Transfer-Encoding: base64",
      "",
      wrapBase64(normalizeBase64(attachment.contentBase64)),
    );
  }
  lines.push(`--${boundary}--`, "");
  return lines.join(CRLF);
}

/**
 * Gmail's `raw` field: the whole message as URL-safe base64.
 */
export function encodeRawMessage(mime: string): string {
  return Buffer.from(mime, "utf8").toString("base64url");
}

export function decodeBase64Url(data: string): string {
  return Buffer.from(normalizeBase64(data), "base64").toString("utf-8");
}

export function getHeader(message: gmail_v1.Schema$Message, name: string): string {
  const headers = message.payload?.headers ?? [];
  return (
    headers.find((h) => h.name?.toLowerCase() === name.toLowerCase())?.value ?? ""
  );
}

/**
 * First text/plain and text/html bodies found in a message payload.
 */
export function extractBodyContent(payload: gmail_v1.Schema$MessagePart): {
  text?: string;
  html?: string;
} {
  let text: string | undefined;
  let html: string | undefined;

  function processPayload(part: gmail_v1.Schema$MessagePart) {
    const mimeType = part.mimeType ?? "";
    const isAttachment = Boolean(part.filename);

    if (!isAttachment && mimeType === "text/plain" && part.body?.data && text === undefined) {
      text = decodeBase64Url(part.body.data);
    } else if (!isAttachment && mimeType === "text/html" && part.body?.data && html === undefined) {
      html = decodeBase64Url(part.body.data);
    }

    for (const subPart of part.parts ?? []) {
      processPayload(subPart);
    }
  }

  processPayload(payload);
  return { text, html };
}

export function stripHtml(html: string): string {
  return html
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/p>/gi, "\n")
    .replace(/<[^>]+>/g, "")
    .replace(/&nbsp;/g, " ")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, "&")
    .trim();
}

export function replySubject(subject: string): string {
  return /^re:/i.test(subject.trim()) ? subject : `Re: ${subject}`;
}

export function forwardSubject(subject: string): string {
  return /^(fwd?|fw):/i.test(subject.trim()) ? subject : `Fwd: ${subject}`;
}

/**
 * Body of a forwarded message: the note, then the original quoted.
 */
export function buildForwardBody(params: {
  note?: string;
  original: gmail_v1.Schema$Message;
  isHtml: boolean;
}): string {
  const { original } = params;
  const content: { text?: string; html?: string } = original.payload
    ? extractBodyContent(original.payload)
    : {};
  const originalText =
    content.text ?? (content.html ? stripHtml(content.html) : (original.snippet ?? ""));
  const header = [
    "---------- Forwarded message ---------",
    `From: ${getHeader(original, "From")}`,
    `Date: ${getHeader(original, "Date")}`,
    `Subject: ${getHeader(original, "Subject")}`,
    `To: ${getHeader(original, "To")}`,
  ];

  if (params.isHtml) {
    const escape = (value: string) =>
      value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
    return [
      params.note ?? "",
      "<br><br>",
      header.map(escape).join("<br>"),
      "<br><br>",
      escape(originalText).replace(/\n/g, "<br>"),
    ].join("");
  }
  return [params.note ?? "", "", ...header, "", originalText].join("\n");
}
