import { Hono } from "hono";
import { randomUUID } from "node:crypto";

import type { AppEnv } from "./types/env.js";
import type { StorageGateway } from "./storage/gateway.js";
import type { DigestWindowEnqueuer } from "./jobs/queue.js";
import { errorMessage, toErrorResponse } from "./lib/errors.js";
import { logger } from "./lib/logger.js";
import { createAuthMiddleware } from "./middleware/auth.js";
import { messageRoutes } from "./routes/messages.js";
import { itemRoutes } from "./routes/items.js";
import { digestRoutes } from "./routes/digests.js";
import { channelRoutes } from "./routes/channels.js";

export type HealthCheck = () => Promise<unknown>;

export type AppDeps = {
  store: StorageGateway;
  operatorApiToken: string | undefined;
  enqueueDigestWindow: DigestWindowEnqueuer | null;
  /** Named dependency probes reported by /api/health. */
  healthChecks: Record<string, HealthCheck>;
  healthTimeoutMs?: number;
};

async function withTimeout<T>(p: Promise<T>, ms: number) {
  let t: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      p,
      new Promise<T>((_, reject) => {
        t = setTimeout(() => reject(new Error("timeout")), ms);
      }),
    ]);
  } finally {
    if (t) clearTimeout(t);
  }
}

async function runCheck(check: HealthCheck, timeoutMs: number) {
  const started = Date.now();
  try {
    await withTimeout(check(), timeoutMs);
    return { status: "ok" as const, latencyMs: Date.now() - started };
  } catch (err) {
    return { status: "fail" as const, latencyMs: Date.now() - started, error: errorMessage(err) };
  }
}

export function createApp(deps: AppDeps) {
  const base = new Hono<AppEnv>();

  base.onError((err, c) => toErrorResponse(c, err));

  // RequestId + lightweight structured logging.
  base.use("/api/*", async (c, next) => {
    const requestId = c.req.header("x-request-id") ?? randomUUID();
    c.set("requestId", requestId);
    c.header("x-request-id", requestId);

    const started = Date.now();
    try {
      await next();
    } finally {
      logger.info(
        {
          requestId,
          method: c.req.method,
          url: c.req.url,
          statusCode: c.res.status,
          responseTime: Date.now() - started,
        },
        "request"
      );
    }
  });

  // Public routes
  const withHealth = base.get("/api/health", async (c) => {
    const timeoutMs = deps.healthTimeoutMs ?? 5000;
    const names = Object.keys(deps.healthChecks);
    const results = await Promise.all(names.map((name) => runCheck(deps.healthChecks[name], timeoutMs)));
    const checks = Object.fromEntries(names.map((name, i) => [name, results[i]]));
    const ok = results.every((r) => r.status === "ok");

    return c.json({ status: ok ? "ok" : "degraded", timestamp: new Date().toISOString(), checks }, ok ? 200 : 503);
  });

  // Auth middleware applied to all other API routes.
  withHealth.use("/api/*", createAuthMiddleware(deps.operatorApiToken));

  const withRoutes = withHealth
    .route("/api/messages", messageRoutes(deps.store))
    .route("/api/items", itemRoutes(deps.store))
    .route("/api/digests", digestRoutes(deps.store, deps.enqueueDigestWindow))
    .route("/api/channels", channelRoutes(deps.store));

  withRoutes.notFound((c) =>
    c.json(
      {
        error: {
          code: "NOT_FOUND",
          message: "Not found",
          status: 404,
          requestId: c.get("requestId"),
        },
      },
      404
    )
  );

  return withRoutes;
}

export type AppType = ReturnType<typeof createApp>;
