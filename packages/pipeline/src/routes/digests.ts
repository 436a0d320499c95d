import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";

import { digestWindowRequestSchema } from "@digest/shared";
import type { AppEnv } from "../types/env.js";
import type { StorageGateway } from "../storage/gateway.js";
import type { DigestWindowEnqueuer } from "../jobs/queue.js";
import { serviceUnavailable } from "../lib/errors.js";

export function digestRoutes(store: StorageGateway, enqueue: DigestWindowEnqueuer | null) {
  return new Hono<AppEnv>()
    .post(
      "/run",
      zValidator("json", digestWindowRequestSchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        if (!enqueue) throw serviceUnavailable("Digest queue unavailable: REDIS_URL is not set");

        const body = c.req.valid("json");
        const window = { start: new Date(body.windowStart), end: new Date(body.windowEnd) };
        const { jobId } = await enqueue(window, body.chatId);
        return c.json({ jobId }, 202);
      }
    )
    .post("/clear-errors", async (c) => {
      const count = await store.clearDigestErrors();
      return c.json({ count });
    });
}
