import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";

import type { AppEnv } from "../types/env.js";
import type { StorageGateway } from "../storage/gateway.js";
import { channelSettingsSchema } from "../db/validation.js";
import { notFound } from "../lib/errors.js";

const peerIdParamsSchema = z.object({
  peerId: z.coerce.number().int(),
});

export function channelRoutes(store: StorageGateway) {
  return new Hono<AppEnv>().patch(
    "/:peerId",
    zValidator("param", peerIdParamsSchema, (result) => {
      if (!result.success) throw result.error;
    }),
    zValidator("json", channelSettingsSchema, (result) => {
      if (!result.success) throw result.error;
    }),
    async (c) => {
      const { peerId } = c.req.valid("param");
      const settings = c.req.valid("json");

      const ok = await store.updateChannelSettings(peerId, settings);
      if (!ok) throw notFound("channel", String(peerId));
      return c.json({ ok: true });
    }
  );
}
