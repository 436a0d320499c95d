import { describe, expect, it, vi } from "vitest";
import type { DigestEntryPayload } from "@digest/shared";

import { TransportError } from "../src/lib/errors.js";
import { createTransport, LogTransport, WebhookTransport } from "../src/transport/index.js";

type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

const ENTRIES: DigestEntryPayload[] = [
  { title: "Ports", body: "• Dockworkers walk out.", sources: [{ channel: "@harbour", msg_id: 12 }] },
];

function webhookWith(fetchFn: FetchFn) {
  return new WebhookTransport({ url: "http://hooks.test/digest", headers: { "x-hook-token": "test-token" }, fetch: fetchFn });
}

async function publishError(transport: WebhookTransport): Promise<TransportError> {
  const err = await transport.publish("chat-1", ENTRIES).then(
    () => null,
    (e: unknown) => e
  );
  if (!(err instanceof TransportError)) throw new Error("expected a TransportError");
  return err;
}

describe("WebhookTransport", () => {
  it("posts the digest and returns the receipt", async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(Response.json({ messageId: 42 }));

    await expect(webhookWith(fetchFn).publish("chat-1", ENTRIES)).resolves.toEqual({
      chatId: "chat-1",
      messageId: "42",
    });

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("http://hooks.test/digest");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({ "content-type": "application/json", "x-hook-token": "test-token" });
    expect(JSON.parse(String(init.body))).toEqual({ chatId: "chat-1", entries: ENTRIES });
  });

  it("keeps the chat id the receiver reports", async () => {
    const transport = webhookWith(async () => Response.json({ chatId: "-100200", messageId: "m-9" }));
    await expect(transport.publish("chat-1", ENTRIES)).resolves.toEqual({ chatId: "-100200", messageId: "m-9" });
  });

  it.each([
    [503, "transient"],
    [429, "transient"],
    [400, "permanent"],
    [404, "permanent"],
  ])("treats status %i as %s", async (status, kind) => {
    const err = await publishError(webhookWith(async () => new Response("nope", { status })));
    expect(err.kind).toBe(kind);
    expect(err.message).toBe(`webhook returned ${status}`);
  });

  it("treats network failures as transient", async () => {
    const err = await publishError(
      webhookWith(async () => {
        throw new TypeError("fetch failed");
      })
    );
    expect(err).toMatchObject({ kind: "transient", message: "webhook request failed: fetch failed" });
  });

  it("rejects a receipt without a message id", async () => {
    const err = await publishError(webhookWith(async () => Response.json({ ok: true })));
    expect(err).toMatchObject({ kind: "permanent", message: "webhook response missing messageId" });
  });
});

describe("LogTransport", () => {
  it("returns a generated message id", async () => {
    const receipt = await new LogTransport().publish("chat-1", ENTRIES);
    expect(receipt.chatId).toBe("chat-1");
    expect(receipt.messageId).toMatch(/^log-[0-9a-f-]{36}$/);
  });
});

describe("createTransport", () => {
  it("uses the webhook only when a URL is configured", () => {
    expect(createTransport({ webhookUrl: "http://hooks.test/digest" })).toBeInstanceOf(WebhookTransport);
    expect(createTransport({})).toBeInstanceOf(LogTransport);
  });
});
