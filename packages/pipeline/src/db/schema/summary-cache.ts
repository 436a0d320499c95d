// src/db/schema/summary-cache.ts

import { pgTable, text, real, timestamp, primaryKey } from "drizzle-orm/pg-core";

/** Enrichment outputs memoized by content. Embeddings are never cached here. */
export const summaryCache = pgTable(
  "summary_cache",
  {
    canonicalHash: text("canonical_hash").notNull(),
    digestLanguage: text("digest_language").notNull(),
    summary: text().notNull(),
    topic: text().notNull(),
    language: text().notNull(),
    relevanceScore: real("relevance_score").notNull(),
    importanceScore: real("importance_score").notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [primaryKey({ columns: [table.canonicalHash, table.digestLanguage] })]
);
