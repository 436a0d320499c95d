import { randomUUID } from "node:crypto";
import type { DigestEntryPayload } from "@digest/shared";

import { createLogger, type Logger } from "../lib/logger.js";
import type { DigestTransport, PublishReceipt } from "./types.js";

/** Writes digests to the log. Used when no webhook is configured. */
export class LogTransport implements DigestTransport {
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger("log-transport");
  }

  async publish(chatId: string, entries: DigestEntryPayload[]): Promise<PublishReceipt> {
    const messageId = `log-${randomUUID()}`;
    this.log.info({ chatId, messageId, entries }, "digest published");
    return { chatId, messageId };
  }
}
