import type { DigestEntryPayload } from "@digest/shared";

export type PublishReceipt = {
  chatId: string;
  messageId: string;
};

/** Delivers an assembled digest to subscribers. */
export interface DigestTransport {
  publish(chatId: string, entries: DigestEntryPayload[], opts?: { signal?: AbortSignal }): Promise<PublishReceipt>;
}
