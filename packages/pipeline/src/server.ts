import { serve } from "@hono/node-server";
import { sql } from "drizzle-orm";

import { createApp } from "./app.js";
import { createDatabase } from "./db/index.js";
import { loadConfig } from "./lib/config.js";
import { logger } from "./lib/logger.js";
import { createDigestWindowEnqueuer, getDigestWindowQueue, getRedisConnection } from "./jobs/queue.js";
import { createStorageGateway } from "./container.js";

const config = loadConfig();
const { db } = createDatabase(config.database);
const store = createStorageGateway(db, config);

const queue = getDigestWindowQueue();
const redis = getRedisConnection();

const app = createApp({
  store,
  operatorApiToken: config.operatorApiToken,
  enqueueDigestWindow: queue ? createDigestWindowEnqueuer(queue) : null,
  healthChecks: {
    db: () => db.execute(sql`select 1`),
    ...(redis ? { redis: () => redis.ping() } : {}),
  },
});

serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port }, "api listening");
});
