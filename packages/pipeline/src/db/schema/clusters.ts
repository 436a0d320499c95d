// src/db/schema/clusters.ts

import { pgTable, uuid, text, timestamp, index, primaryKey } from "drizzle-orm/pg-core";
import { items } from "./items.js";

export const clusters = pgTable(
  "clusters",
  {
    id: uuid().primaryKey().defaultRandom(),
    windowStart: timestamp("window_start", { withTimezone: true }).notNull(),
    windowEnd: timestamp("window_end", { withTimezone: true }).notNull(),
    topic: text(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("clusters_window_idx").on(table.windowStart, table.windowEnd)]
);

export const clusterItems = pgTable(
  "cluster_items",
  {
    clusterId: uuid("cluster_id")
      .notNull()
      .references(() => clusters.id, { onDelete: "cascade" }),
    itemId: uuid("item_id")
      .notNull()
      .references(() => items.id, { onDelete: "cascade" }),
  },
  (table) => [
    primaryKey({ columns: [table.clusterId, table.itemId] }),
    index("cluster_items_item_idx").on(table.itemId),
  ]
);
