import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";

import type { AppEnv } from "../types/env.js";
import type { StorageGateway } from "../storage/gateway.js";
import { notFound } from "../lib/errors.js";

const itemIdParamsSchema = z.object({
  id: z.string().uuid(),
});

const listErrorsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export function itemRoutes(store: StorageGateway) {
  return new Hono<AppEnv>()
    .get(
      "/errors",
      zValidator("query", listErrorsQuerySchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        const { limit } = c.req.valid("query");
        const items = await store.getRecentErrors(limit);
        return c.json({ items });
      }
    )
    .post("/retry-failed", async (c) => {
      const count = await store.retryFailedItems();
      return c.json({ count }, 202);
    })
    .post(
      "/:id/retry",
      zValidator("param", itemIdParamsSchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        const { id } = c.req.valid("param");
        const ok = await store.retryItem(id);
        if (!ok) throw notFound("failed item", id);
        return c.json({ ok: true }, 202);
      }
    );
}
