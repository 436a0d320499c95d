// src/db/schema/items.ts

import {
  pgTable,
  uuid,
  text,
  real,
  integer,
  timestamp,
  jsonb,
  index,
  uniqueIndex,
  check,
  type AnyPgColumn,
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import type { ItemErrorPayload } from "@digest/shared";
import { itemStatusEnum } from "./enums.js";
import { rawMessages } from "./raw-messages.js";
import { digests } from "./digests.js";

export const items = pgTable(
  "items",
  {
    id: uuid().primaryKey().defaultRandom(),
    rawMessageId: uuid("raw_message_id")
      .notNull()
      .references(() => rawMessages.id, { onDelete: "cascade" }),
    relevanceScore: real("relevance_score").notNull().default(0),
    importanceScore: real("importance_score").notNull().default(0),
    topic: text(),
    summary: text(),
    language: text(),
    status: itemStatusEnum().notNull().default("ready"),
    retryCount: integer("retry_count").notNull().default(0),
    nextRetryAt: timestamp("next_retry_at", { withTimezone: true }),
    // Source time of the raw message; windows are evaluated against it.
    firstSeenAt: timestamp("first_seen_at", { withTimezone: true }).notNull(),
    digestedAt: timestamp("digested_at", { withTimezone: true }),
    digestId: uuid("digest_id").references(() => digests.id, { onDelete: "set null" }),
    duplicateOfItemId: uuid("duplicate_of_item_id").references((): AnyPgColumn => items.id, {
      onDelete: "set null",
    }),
    errorJson: jsonb("error_json").$type<ItemErrorPayload>(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex("items_raw_message_uq").on(table.rawMessageId),
    index("items_status_idx").on(table.status),
    index("items_first_seen_at_idx").on(table.firstSeenAt),
    index("items_scores_idx").on(table.importanceScore, table.relevanceScore),
    index("items_duplicate_of_idx")
      .on(table.duplicateOfItemId)
      .where(sql`duplicate_of_item_id IS NOT NULL`),

    check("items_digested_has_timestamp", sql`(status <> 'digested' OR digested_at IS NOT NULL)`),
    check(
      "items_error_has_retry",
      sql`(status <> 'error' OR (retry_count >= 1 AND next_retry_at IS NOT NULL))`
    ),
    check("items_not_self_duplicate", sql`(duplicate_of_item_id IS NULL OR duplicate_of_item_id <> id)`),
  ]
);
