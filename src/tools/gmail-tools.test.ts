import { beforeEach, describe, expect, it } from "vitest";

import { decodeBase64Url } from "../google/mime.js";
import { createFakeGoogleApi, type FakeGoogleApi, type FakeRequest } from "../testing/fake-google.js";
import { type AnyWorkspaceTool, ToolInputError } from "./common.js";
import { createGmailTools } from "./gmail-tools.js";

const tools = createGmailTools();

function tool(name: string): AnyWorkspaceTool {
  const found = tools.find((candidate) => candidate.name === name);
  if (!found) throw new Error(`missing tool ${name}`);
  return found;
}

function sentMime(request: FakeRequest | undefined): string {
  const body = request?.body;
  if (typeof body !== "object" || body === null || !("raw" in body)) {
    throw new Error("request has no raw message");
  }
  if (typeof body.raw !== "string") throw new Error("raw is not a string");
  return decodeBase64Url(body.raw);
}

function b64url(text: string): string {
  return Buffer.from(text, "utf8").toString("base64url");
}

const MESSAGES = "/gmail/v1/users/me/messages";

describe("gmail tools", () => {
  let api: FakeGoogleApi;

  beforeEach(() => {
    api = createFakeGoogleApi();
  });

  it("exposes the fourteen gmail tools", () => {
    expect(tools.map((t) => t.name)).toEqual([
      "gmail_get_message",
      "gmail_list_messages",
      "gmail_send_message",
      "gmail_reply",
      "gmail_forward",
      "gmail_get_attachment",
      "gmail_list_labels",
      "gmail_create_label",
      "gmail_update_label",
      "gmail_delete_label",
      "gmail_get_thread",
      "gmail_list_threads",
      "gmail_batch_modify",
      "gmail_batch_delete",
    ]);
  });

  it("lists messages with default paging", async () => {
    api.on("GET", MESSAGES, { body: { messages: [{ id: "m1", threadId: "t1" }] } });

    const result = await tool("gmail_list_messages").execute(
      "call-1",
      { query: "is:unread" },
      api.context(),
    );

    const [request] = api.find("GET", MESSAGES);
    expect(request?.query.get("q")).toBe("is:unread");
    expect(request?.query.get("maxResults")).toBe("20");
    expect(request?.query.get("includeSpamTrash")).toBe("false");
    expect(result.structuredContent).toEqual({ messages: [{ id: "m1", threadId: "t1" }] });
  });

  it("sends a composed message as raw base64url", async () => {
    api.on("POST", `${MESSAGES}/send`, { body: { id: "sent-1", threadId: "t9" } });

    const result = await tool("gmail_send_message").execute(
      "call-1",
      { to: ["grace@example.test"], subject: "Hello", body: "Hi" },
      api.context(),
    );

    expect(sentMime(api.find("POST", `${MESSAGES}/send`)[0])).toBe(
      [
        "To: grace@example.test",
        "Subject: Hello",
        "MIME-Version: 1.0",
        'Content-Type: text/plain; charset="UTF-8"',
        "Content-Transfer-Encoding: base64",
        "",
        "SGk=",
      ].join("\r\n"),
    );
    expect(result.structuredContent).toEqual({ id: "sent-1", threadId: "t9" });
  });

  it("threads replies to the original sender", async () => {
    api.on("GET", `${MESSAGES}/m1`, {
      body: {
        id: "m1",
        threadId: "t1",
        payload: {
          headers: [
            { name: "From", value: "Ada <ada@example.test>" },
            { name: "Subject", value: "Plan" },
            { name: "Message-ID", value: "<m1@example.test>" },
            { name: "References", value: "<m0@example.test>" },
          ],
        },
      },
    });
    api.on("POST", `${MESSAGES}/send`, { body: { id: "sent-2", threadId: "t1" } });

    await tool("gmail_reply").execute("call-1", { messageId: "m1", body: "Thanks" }, api.context());

    expect(api.find("GET", `${MESSAGES}/m1`)[0]?.query.get("format")).toBe("metadata");
    const send = api.find("POST", `${MESSAGES}/send`)[0];
    expect(send?.body).toMatchObject({ threadId: "t1" });
    expect(sentMime(send).split("\r\n")).toEqual([
      "To: Ada <ada@example.test>",
      "Subject: Re: Plan",
      "In-Reply-To: <m1@example.test>",
      "References: <m0@example.test> <m1@example.test>",
      "MIME-Version: 1.0",
      'Content-Type: text/plain; charset="UTF-8"',
      "Content-Transfer-Encoding: base64",
      "",
      "VGhhbmtz",
    ]);
  });

  it("forwards with the original text quoted", async () => {
    api.on("GET", `${MESSAGES}/m1`, {
      body: {
        id: "m1",
        payload: {
          mimeType: "text/plain",
          headers: [
            { name: "From", value: "ada@example.test" },
            { name: "To", value: "me@example.test" },
            { name: "Subject", value: "Plan" },
            { name: "Date", value: "Mon, 2 Mar 2026 10:00:00 +0000" },
          ],
          body: { data: b64url("Original text") },
        },
      },
    });
    api.on("POST", `${MESSAGES}/send`, { body: { id: "sent-3" } });

    await tool("gmail_forward").execute(
      "call-1",
      { messageId: "m1", to: ["lin@example.test"], body: "FYI" },
      api.context(),
    );

    const mime = sentMime(api.find("POST", `${MESSAGES}/send`)[0]);
    const [headers = "", encodedBody = ""] = mime.split("\r\n\r\n");
    expect(headers.split("\r\n").slice(0, 2)).toEqual(["To: lin@example.test", "Subject: Fwd: Plan"]);
    expect(Buffer.from(encodedBody.replace(/\r\n/g, ""), "base64").toString("utf8")).toBe(
      [
        "FYI",
        "",
        "---------- Forwarded message ---------",
        "From: ada@example.test",
        "Date: Mon, 2 Mar 2026 10:00:00 +0000",
        "Subject: Plan",
        "To: me@example.test",
        "",
        "Original text",
      ].join("\n"),
    );
  });

  it("creates labels with visible defaults", async () => {
    api.on("POST", "/gmail/v1/users/me/labels", { body: { id: "Label_1", name: "Receipts" } });

    await tool("gmail_create_label").execute("call-1", { name: "Receipts" }, api.context());

    expect(api.find("POST", "/gmail/v1/users/me/labels")[0]?.body).toEqual({
      name: "Receipts",
      messageListVisibility: "show",
      labelListVisibility: "labelShow",
    });
  });

  it("reports batch operations by count", async () => {
    api.on("POST", `${MESSAGES}/batchModify`, { status: 204 });

    const result = await tool("gmail_batch_modify").execute(
      "call-1",
      { messageIds: ["m1", "m2"], addLabelIds: ["STARRED"] },
      api.context(),
    );

    expect(api.find("POST", `${MESSAGES}/batchModify`)[0]?.body).toEqual({
      ids: ["m1", "m2"],
      addLabelIds: ["STARRED"],
    });
    expect(result.structuredContent).toEqual({ ok: true, modified: 2 });
  });

  it("rejects a send without recipients before calling Google", async () => {
    await expect(
      tool("gmail_send_message").execute(
        "call-1",
        { to: [], subject: "x", body: "y" },
        api.context(),
      ),
    ).rejects.toBeInstanceOf(ToolInputError);
    expect(api.requests).toHaveLength(0);
  });

  it("rejects unknown parameters", async () => {
    await expect(
      tool("gmail_list_labels").execute("call-1", { verbose: true }, api.context()),
    ).rejects.toThrow(/^Invalid arguments for gmail_list_labels/);
  });
});
