import type { gmail_v1 } from "googleapis";
import { describe, expect, it } from "vitest";

import {
  buildForwardBody,
  buildMimeMessage,
  decodeBase64Url,
  encodeHeaderValue,
  encodeRawMessage,
  extractBodyContent,
  forwardSubject,
  getHeader,
  replySubject,
} from "./mime.js";

function b64url(text: string): string {
  return Buffer.from(text, "utf8").toString("base64url");
}

describe("buildMimeMessage", () => {
  it("composes a single-part plain text message", () => {
    const mime = buildMimeMessage({
      to: ["a@example.test", "b@example.test"],
      cc: ["c@example.test"],
      subject: "Hello",
      body: "Hi",
    });

    expect(mime).toBe(
      [
        "To: a@example.test, b@example.test",
        "Cc: c@example.test",
        "Subject: Hello",
        "MIME-Version: 1.0",
        'Content-Type: text/plain; charset="UTF-8"',
        "Content-Transfer-Encoding: base64",
        "",
        "SGk=",
      ].join("\r\n"),
    );
  });

  it("adds threading headers and html bodies", () => {
    const mime = buildMimeMessage({
      to: ["a@example.test"],
      subject: "Re: Plan",
      body: "<p>Hi</p>",
      isHtml: true,
      inReplyTo: "<m1@example.test>",
      references: "<m0@example.test> <m1@example.test>",
    });

    expect(mime.split("\r\n")).toEqual([
      "To: a@example.test",
      "Subject: Re: Plan",
      "In-Reply-To: <m1@example.test>",
      "References: <m0@example.test> <m1@example.test>",
      "MIME-Version: 1.0",
      'Content-Type: text/html; charset="UTF-8"',
      "Content-Transfer-Encoding: base64",
      "",
      "PHA+SGk8L3A+",
    ]);
  });

  it("wraps attachments in multipart/mixed", () => {
    const mime = buildMimeMessage({
      to: ["a@example.test"],
      subject: "Report",
      body: "Hi",
      attachments: [
        { filename: "notes.txt", mimeType: "text/plain", contentBase64: "aGVsbG8_" },
      ],
      boundary: "b1",
    });

    expect(mime.split("\r\n")).toEqual([
      "To: a@example.test",
      "Subject: Report",
      "MIME-Version: 1.0",
      'Content-Type: multipart/mixed; boundary="b1"',
      "",
      "--b1",
      'Content-Type: text/plain; charset="UTF-8"',
      "Content-Transfer-Encoding: base64",
      "",
      "SGk=",
      "--b1",
      'Content-Type: text/plain; name="notes.txt"',
      'Content-Disposition: attachment; filename="notes.txt"',
      "Content-Transfer-Encoding: base64",
      "",
      "aGVsbG8/",
      "--b1--",
      "",
    ]);
  });
});

describe("header helpers", () => {
  it("encodes non-ASCII header values", () => {
    expect(encodeHeaderValue("Plain")).toBe("Plain");
    expect(encodeHeaderValue("Café")).toBe("=?UTF-8?B?Q2Fmw6k=?=");
  });

  it("prefixes reply and forward subjects once", () => {
    expect(replySubject("Plan")).toBe("Re: Plan");
    expect(replySubject("RE: Plan")).toBe("RE: Plan");
    expect(forwardSubject("Plan")).toBe("Fwd: Plan");
    expect(forwardSubject("Fw: Plan")).toBe("Fw: Plan");
  });

  it("encodes raw messages as URL-safe base64", () => {
    expect(encodeRawMessage("To: a\r\n")).toBe("VG86IGENCg");
  });
});

const ORIGINAL: gmail_v1.Schema$Message = {
  id: "m1",
  snippet: "snippet text",
  payload: {
    mimeType: "multipart/mixed",
    headers: [
      { name: "From", value: "Ada <ada@example.test>" },
      { name: "To", value: "grace@example.test" },
      { name: "Subject", value: "Plan" },
      { name: "Date", value: "Tue, 10 Mar 2026 09:00:00 +0000" },
    ],
    parts: [
      {
        mimeType: "multipart/alternative",
        parts: [
          { mimeType: "text/plain", body: { data: b64url("Line one\nLine two") } },
          { mimeType: "text/html", body: { data: b64url("<p>Line one</p>") } },
        ],
      },
      {
        mimeType: "text/plain",
        filename: "attached.txt",
        body: { attachmentId: "att-1", data: b64url("not the body") },
      },
    ],
  },
};

describe("payload helpers", () => {
  it("reads headers case-insensitively", () => {
    expect(getHeader(ORIGINAL, "subject")).toBe("Plan");
    expect(getHeader(ORIGINAL, "Message-ID")).toBe("");
  });

  it("extracts the first text and html bodies, skipping attachments", () => {
    expect(extractBodyContent(ORIGINAL.payload ?? {})).toEqual({
      text: "Line one\nLine two",
      html: "<p>Line one</p>",
    });
  });

  it("decodes URL-safe base64", () => {
    expect(decodeBase64Url(b64url("ünïcode?"))).toBe("ünïcode?");
  });

  it("quotes the original message when forwarding", () => {
    expect(buildForwardBody({ note: "FYI", original: ORIGINAL, isHtml: false })).toBe(
      [
        "FYI",
        "",
        "---------- Forwarded message ---------",
        "From: Ada <ada@example.test>",
        "Date: Tue, 10 Mar 2026 09:00:00 +0000",
        "Subject: Plan",
        "To: grace@example.test",
        "",
        "Line one\nLine two",
      ].join("\n"),
    );
  });
});
