import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { eq } from "drizzle-orm";
import { z } from "zod";

import { createApp, type AppDeps } from "../src/app.js";
import { createStorageGateway } from "../src/container.js";
import { channels } from "../src/db/schema/index.js";
import type { DigestWindowEnqueuer } from "../src/jobs/queue.js";
import { loadConfig } from "../src/lib/config.js";
import type { StorageGateway } from "../src/storage/gateway.js";
import { createTestChannel, createTestMessage } from "./factories.js";
import { authedRequest, createTestClock, createTestDb, expectError, resetDb, type TestDb } from "./helpers.js";

const TOKEN = "test-token";
const T0 = "2026-03-07T07:00:00.000Z";

const ingestResponseSchema = z.object({ id: z.string().uuid(), channelId: z.string().uuid(), inserted: z.boolean() });

describe("operator API", () => {
  let t: TestDb;
  let store: StorageGateway;
  const time = createTestClock(T0);

  beforeAll(async () => {
    t = await createTestDb();
    store = createStorageGateway(t.db, loadConfig({ DATABASE_URL: "postgres://unused" }), time.clock);
  });

  afterAll(async () => {
    await t.client.close();
  });

  beforeEach(async () => {
    await resetDb(t.client);
    time.set(T0);
  });

  function appWith(overrides: Partial<AppDeps> = {}) {
    return createApp({
      store,
      operatorApiToken: TOKEN,
      enqueueDigestWindow: null,
      healthChecks: { database: async () => undefined },
      ...overrides,
    });
  }

  const message = {
    channel: { peerId: 5005, username: "harbour_news", title: "Harbour News" },
    messageId: 77,
    date: "2026-03-07T06:30:00Z",
    text: "Dockworkers begin a 48 hour strike at the container terminal",
  };

  describe("health", () => {
    it("is public and reports each check", async () => {
      const res = await appWith().request("/api/health");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: "ok", checks: { database: { status: "ok" } } });
    });

    it("degrades when a dependency fails", async () => {
      const app = appWith({
        healthChecks: {
          database: async () => undefined,
          redis: async () => {
            throw new Error("connection refused");
          },
        },
      });

      const res = await app.request("/api/health");

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({
        status: "degraded",
        checks: { database: { status: "ok" }, redis: { status: "fail", error: "connection refused" } },
      });
    });
  });

  describe("auth", () => {
    it("requires a bearer token", async () => {
      const res = await appWith().request("/api/items/errors");
      await expectError(res, { status: 401, code: "UNAUTHORIZED" });
    });

    it("rejects a wrong token", async () => {
      const res = await authedRequest(appWith(), { method: "GET", path: "/api/items/errors", token: "other-token" });
      await expectError(res, { status: 401, code: "UNAUTHORIZED" });
    });

    it("rejects every token when none is configured", async () => {
      const app = appWith({ operatorApiToken: undefined });
      const res = await authedRequest(app, { method: "GET", path: "/api/items/errors", token: TOKEN });
      await expectError(res, { status: 401, code: "UNAUTHORIZED" });
    });

    it("echoes the request id", async () => {
      const res = await appWith().request("/api/health", { headers: { "x-request-id": "req-1" } });
      expect(res.headers.get("x-request-id")).toBe("req-1");
    });
  });

  describe("POST /api/messages", () => {
    it("stores a message once", async () => {
      const app = appWith();

      const first = await authedRequest(app, { method: "POST", path: "/api/messages", token: TOKEN, json: message });
      expect(first.status).toBe(201);
      const created = ingestResponseSchema.parse(await first.json());
      expect(created.inserted).toBe(true);

      const again = await authedRequest(app, { method: "POST", path: "/api/messages", token: TOKEN, json: message });
      expect(again.status).toBe(200);
      expect(await again.json()).toEqual({ ...created, inserted: false });
    });

    it("moves a username to the peer that now uses it", async () => {
      const app = appWith();
      const first = await authedRequest(app, { method: "POST", path: "/api/messages", token: TOKEN, json: message });
      const before = ingestResponseSchema.parse(await first.json());

      const res = await authedRequest(app, {
        method: "POST",
        path: "/api/messages",
        token: TOKEN,
        json: { ...message, channel: { ...message.channel, peerId: 5006 } },
      });

      expect(res.status).toBe(201);
      const after = ingestResponseSchema.parse(await res.json());
      expect(after.channelId).not.toBe(before.channelId);
      const [old] = await t.db.select().from(channels).where(eq(channels.id, before.channelId));
      expect(old.username).toBeNull();
    });

    it("validates the payload", async () => {
      const res = await authedRequest(appWith(), {
        method: "POST",
        path: "/api/messages",
        token: TOKEN,
        json: { ...message, messageId: 7.5 },
      });
      await expectError(res, { status: 422, code: "VALIDATION_ERROR" });
    });
  });

  describe("items", () => {
    async function seedFailedItem(username = "ops") {
      const channelId = await createTestChannel(store, { username });
      const rawMessageId = await createTestMessage(store, {
        channelId,
        sourceDate: new Date(T0),
        sourceMessageId: 31,
      });
      const { itemId } = await store.saveItemError({
        rawMessageId,
        firstSeenAt: new Date(T0),
        kind: "permanent",
        message: "Enrichment output failed validation",
      });
      await store.markProcessed(rawMessageId);
      return itemId;
    }

    it("lists recent errors", async () => {
      const itemId = await seedFailedItem();

      const res = await authedRequest(appWith(), { method: "GET", path: "/api/items/errors?limit=5", token: TOKEN });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        items: [
          {
            itemId,
            source: { channel: "ops", msg_id: 31 },
            status: "error",
            retryCount: 1,
            error: { kind: "permanent", message: "Enrichment output failed validation" },
          },
        ],
      });
    });

    it("rejects an out of range limit", async () => {
      const res = await authedRequest(appWith(), { method: "GET", path: "/api/items/errors?limit=0", token: TOKEN });
      await expectError(res, { status: 422, code: "VALIDATION_ERROR" });
    });

    it("reschedules every failed item", async () => {
      await seedFailedItem("ops");
      await seedFailedItem("ops_backup");

      const res = await authedRequest(appWith(), { method: "POST", path: "/api/items/retry-failed", token: TOKEN });

      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ count: 2 });
    });

    it("reschedules one item", async () => {
      const itemId = await seedFailedItem();
      const app = appWith();

      const res = await authedRequest(app, { method: "POST", path: `/api/items/${itemId}/retry`, token: TOKEN });
      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ ok: true });

      const again = await authedRequest(app, { method: "POST", path: `/api/items/${itemId}/retry`, token: TOKEN });
      expect(again.status).toBe(202);
    });

    it("returns 404 for an unknown item", async () => {
      const res = await authedRequest(appWith(), {
        method: "POST",
        path: "/api/items/00000000-0000-4000-8000-000000000000/retry",
        token: TOKEN,
      });
      await expectError(res, { status: 404, code: "NOT_FOUND" });
    });

    it("validates the item id", async () => {
      const res = await authedRequest(appWith(), { method: "POST", path: "/api/items/nope/retry", token: TOKEN });
      await expectError(res, { status: 422, code: "VALIDATION_ERROR" });
    });
  });

  describe("digests", () => {
    const run = { windowStart: "2026-03-07T06:00:00Z", windowEnd: "2026-03-07T07:00:00Z", chatId: "chat-1" };

    it("enqueues a window", async () => {
      const enqueue = vi.fn<DigestWindowEnqueuer>().mockResolvedValue({ jobId: "digest-1" });

      const res = await authedRequest(appWith({ enqueueDigestWindow: enqueue }), {
        method: "POST",
        path: "/api/digests/run",
        token: TOKEN,
        json: run,
      });

      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ jobId: "digest-1" });
      expect(enqueue).toHaveBeenCalledWith(
        { start: new Date("2026-03-07T06:00:00Z"), end: new Date("2026-03-07T07:00:00Z") },
        "chat-1"
      );
    });

    it("reports a missing queue", async () => {
      const res = await authedRequest(appWith(), { method: "POST", path: "/api/digests/run", token: TOKEN, json: run });
      await expectError(res, { status: 503, code: "SERVICE_UNAVAILABLE" });
    });

    it("rejects an empty window", async () => {
      const enqueue = vi.fn<DigestWindowEnqueuer>();
      const res = await authedRequest(appWith({ enqueueDigestWindow: enqueue }), {
        method: "POST",
        path: "/api/digests/run",
        token: TOKEN,
        json: { ...run, windowEnd: run.windowStart },
      });

      await expectError(res, { status: 422, code: "VALIDATION_ERROR" });
      expect(enqueue).not.toHaveBeenCalled();
    });

    it("clears failed digest attempts", async () => {
      const window = { start: new Date("2026-03-07T06:00:00Z"), end: new Date("2026-03-07T07:00:00Z") };
      await store.saveDigestError(window, "chat-1", { kind: "transient", message: "webhook returned 503" });

      const res = await authedRequest(appWith(), { method: "POST", path: "/api/digests/clear-errors", token: TOKEN });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ count: 1 });
    });
  });

  describe("PATCH /api/channels/:peerId", () => {
    it("updates channel settings", async () => {
      await createTestChannel(store, { peerId: 5005 });

      const res = await authedRequest(appWith(), {
        method: "PATCH",
        path: "/api/channels/5005",
        token: TOKEN,
        json: { importanceWeight: 2, importanceThreshold: 0.5 },
      });

      expect(res.status).toBe(200);
      const [row] = await t.db.select().from(channels).where(eq(channels.peerId, 5005));
      expect(row).toMatchObject({ importanceWeight: 2, importanceThreshold: 0.5 });
    });

    it("returns 404 for an unknown channel", async () => {
      const res = await authedRequest(appWith(), {
        method: "PATCH",
        path: "/api/channels/9999",
        token: TOKEN,
        json: { importanceWeight: 2 },
      });
      await expectError(res, { status: 404, code: "NOT_FOUND" });
    });

    it("requires at least one setting", async () => {
      await createTestChannel(store, { peerId: 5005 });
      const res = await authedRequest(appWith(), { method: "PATCH", path: "/api/channels/5005", token: TOKEN, json: {} });
      await expectError(res, { status: 422, code: "VALIDATION_ERROR" });
    });
  });

  it("returns JSON 404s for unknown routes", async () => {
    const res = await authedRequest(appWith(), { method: "GET", path: "/api/nothing-here", token: TOKEN });
    await expectError(res, { status: 404, code: "NOT_FOUND" });
  });
});
