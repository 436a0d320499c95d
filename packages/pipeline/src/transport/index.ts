import type { Logger } from "../lib/logger.js";
import { LogTransport } from "./log.js";
import type { DigestTransport } from "./types.js";
import { WebhookTransport } from "./webhook.js";

export function createTransport(config: { webhookUrl?: string }, logger?: Logger): DigestTransport {
  if (config.webhookUrl) return new WebhookTransport({ url: config.webhookUrl });
  return new LogTransport(logger);
}

export { LogTransport, WebhookTransport };
export type { DigestTransport, PublishReceipt } from "./types.js";
