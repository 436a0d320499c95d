import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";

import { ingestMessageSchema } from "@digest/shared";
import type { AppEnv } from "../types/env.js";
import type { StorageGateway } from "../storage/gateway.js";

export function messageRoutes(store: StorageGateway) {
  return new Hono<AppEnv>().post(
    "/",
    zValidator("json", ingestMessageSchema, (result) => {
      if (!result.success) throw result.error;
    }),
    async (c) => {
      const input = c.req.valid("json");

      const { rawMessage, channelId } = await store.withTransaction(async (tx) => {
        const channelId = await tx.upsertChannel({
          peerId: input.channel.peerId,
          username: input.channel.username,
          title: input.channel.title,
          description: input.channel.description,
          importanceWeight: input.channel.importanceWeight,
          importanceThreshold: input.channel.importanceThreshold,
        });
        const rawMessage = await tx.upsertRawMessage({
          channelId,
          sourceMessageId: input.messageId,
          sourceDate: new Date(input.date),
          text: input.text,
          entities: input.entities,
          media: input.media,
          isForward: input.isForward,
        });
        return { rawMessage, channelId };
      });

      return c.json(
        { id: rawMessage.id, channelId, inserted: rawMessage.inserted },
        rawMessage.inserted ? 201 : 200
      );
    }
  );
}
