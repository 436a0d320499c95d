import { Queue } from "bullmq";
import { Redis as IORedis } from "ioredis";
import type { DigestWindow } from "@digest/shared";

import { logger } from "../lib/logger.js";

export const DIGEST_WINDOW_QUEUE = "digest:window";

export type DigestWindowJob = { windowStart: string; windowEnd: string; chatId: string };

let redis: IORedis | null = null;

export function isRedisConfigured(): boolean {
  return !!process.env.REDIS_URL;
}

/** Shared IORedis connection, or null if REDIS_URL is not set. */
export function getRedisConnection(): IORedis | null {
  if (redis) return redis;

  const url = process.env.REDIS_URL;
  if (!url) return null;

  redis = new IORedis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
    lazyConnect: true,
  });

  return redis;
}

/** Strict variant for the worker process. */
export function getRedisConnectionOrThrow(): IORedis {
  const conn = getRedisConnection();
  if (!conn) throw new Error("REDIS_URL is required for the worker process");
  return conn;
}

export async function closeRedisConnection(): Promise<void> {
  const conn = redis;
  redis = null;
  _digestWindow = undefined;
  if (conn) await conn.quit();
}

let _digestWindow: Queue<DigestWindowJob> | null | undefined;

export function getDigestWindowQueue(): Queue<DigestWindowJob> | null {
  if (_digestWindow !== undefined) return _digestWindow;

  const conn = getRedisConnection();
  if (!conn) {
    logger.warn({ queue: DIGEST_WINDOW_QUEUE }, "Queue unavailable, REDIS_URL not set");
    _digestWindow = null;
  } else {
    _digestWindow = new Queue<DigestWindowJob>(DIGEST_WINDOW_QUEUE, { connection: conn });
  }
  return _digestWindow;
}

export const DEFAULT_JOB_OPTS = {
  removeOnComplete: true,
  removeOnFail: 500,
} as const;

/** One job per window: repeated enqueues of the same window collapse. */
export function digestWindowJobId(window: DigestWindow): string {
  return `digest-${window.start.getTime()}-${window.end.getTime()}`;
}

export type DigestWindowEnqueuer = (window: DigestWindow, chatId: string) => Promise<{ jobId: string }>;

export function createDigestWindowEnqueuer(queue: Pick<Queue<DigestWindowJob>, "add">): DigestWindowEnqueuer {
  return async (window, chatId) => {
    const jobId = digestWindowJobId(window);
    await queue.add(
      "assemble",
      { windowStart: window.start.toISOString(), windowEnd: window.end.toISOString(), chatId },
      { ...DEFAULT_JOB_OPTS, jobId }
    );
    return { jobId };
  };
}
