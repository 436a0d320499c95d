import { z } from "zod";
import type { DigestEntryPayload } from "@digest/shared";

import { TransportError } from "../lib/errors.js";
import type { DigestTransport, PublishReceipt } from "./types.js";

const receiptSchema = z.object({
  chatId: z.string().optional(),
  messageId: z.union([z.string(), z.number()]).transform(String),
});

export type WebhookTransportOptions = {
  url: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  fetch?: (input: string, init: RequestInit) => Promise<Response>;
};

/**
 * POSTs `{ chatId, entries }` and expects `{ messageId }` back. Network
 * failures and 5xx are transient; other non-2xx responses are permanent.
 */
export class WebhookTransport implements DigestTransport {
  private readonly fetchFn: (input: string, init: RequestInit) => Promise<Response>;

  constructor(private readonly opts: WebhookTransportOptions) {
    this.fetchFn = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  async publish(
    chatId: string,
    entries: DigestEntryPayload[],
    opts: { signal?: AbortSignal } = {}
  ): Promise<PublishReceipt> {
    const timeout = AbortSignal.timeout(this.opts.timeoutMs ?? 30_000);
    const signal = opts.signal ? AbortSignal.any([opts.signal, timeout]) : timeout;

    let res: Response;
    try {
      res = await this.fetchFn(this.opts.url, {
        method: "POST",
        headers: { "content-type": "application/json", ...this.opts.headers },
        body: JSON.stringify({ chatId, entries }),
        signal,
      });
    } catch (err) {
      if (opts.signal?.aborted) throw opts.signal.reason;
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError("transient", `webhook request failed: ${message}`, { cause: err });
    }

    if (!res.ok) {
      const kind = res.status >= 500 || res.status === 429 ? "transient" : "permanent";
      throw new TransportError(kind, `webhook returned ${res.status}`);
    }

    const parsed = receiptSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new TransportError("permanent", "webhook response missing messageId", { cause: parsed.error });
    }
    return { chatId: parsed.data.chatId ?? chatId, messageId: parsed.data.messageId };
  }
}
