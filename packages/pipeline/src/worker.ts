import { Worker } from "bullmq";
import { sql } from "drizzle-orm";

import { createJobLogger, logger } from "./lib/logger.js";
import { loadConfig } from "./lib/config.js";
import { createDatabase } from "./db/index.js";
import { DIGEST_WINDOW_QUEUE, closeRedisConnection, getRedisConnectionOrThrow, type DigestWindowJob } from "./jobs/queue.js";
import { createDigestWindowProcessor } from "./jobs/digest-window.js";
import { createDigestServices, createProviders, createStorageGateway, createWorkerPool } from "./container.js";

const config = loadConfig();
const { sql: client, db } = createDatabase(config.database);
await db.execute(sql`select 1`);

const store = createStorageGateway(db, config);
const pool = createWorkerPool(db, store, config, createProviders(config));

const connection = getRedisConnectionOrThrow();
const digestWorker = new Worker<DigestWindowJob>(
  DIGEST_WINDOW_QUEUE,
  createDigestWindowProcessor(createDigestServices(store, config)),
  { connection, concurrency: 1 }
);

digestWorker.on("completed", (job) => {
  createJobLogger(job).info({ queue: digestWorker.name }, "job completed");
});
digestWorker.on("failed", (job, err) => {
  if (job) createJobLogger(job).error({ queue: digestWorker.name, err }, "job failed");
  else logger.error({ queue: digestWorker.name, err }, "job failed");
});
digestWorker.on("error", (err) => {
  logger.error({ err, queue: digestWorker.name }, "worker error");
});

pool.start();
logger.info({ queues: [digestWorker.name], workers: config.worker.workers }, "worker started");

async function shutdown(signal: string) {
  logger.info({ signal }, "worker shutting down");
  await Promise.allSettled([pool.stop(), digestWorker.close()]);
  await closeRedisConnection();
  await client.end({ timeout: 5 });
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "worker shutdown failed");
      process.exit(1);
    });
  });
}
