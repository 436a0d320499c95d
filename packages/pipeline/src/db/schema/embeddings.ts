// src/db/schema/embeddings.ts

import { pgTable, uuid, vector, timestamp, index } from "drizzle-orm/pg-core";
import { EMBEDDING_DIMENSIONS } from "@digest/shared";
import { items } from "./items.js";

export const embeddings = pgTable(
  "embeddings",
  {
    itemId: uuid("item_id")
      .primaryKey()
      .references(() => items.id, { onDelete: "cascade" }),
    embedding: vector({ dimensions: EMBEDDING_DIMENSIONS }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index("embeddings_hnsw_idx").using("hnsw", table.embedding.op("vector_cosine_ops")),
    index("embeddings_created_at_idx").on(table.createdAt),
  ]
);
