// src/db/schema/channels.ts

import { pgTable, uuid, text, boolean, real, bigint, timestamp, index, uniqueIndex } from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";

export const channels = pgTable(
  "channels",
  {
    id: uuid().primaryKey().defaultRandom(),
    peerId: bigint("peer_id", { mode: "number" }).notNull(),
    username: text(),
    title: text(),
    description: text(),
    isActive: boolean("is_active").notNull().default(true),
    // Multiplier applied to provider importance; clamped when used.
    importanceWeight: real("importance_weight").notNull().default(1),
    // Per-channel override of the digest importance threshold.
    importanceThreshold: real("importance_threshold"),
    addedAt: timestamp("added_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex("channels_peer_id_uq").on(table.peerId),
    uniqueIndex("channels_username_uq")
      .on(table.username)
      .where(sql`username IS NOT NULL`),
    index("channels_active_idx").on(table.isActive),
  ]
);
