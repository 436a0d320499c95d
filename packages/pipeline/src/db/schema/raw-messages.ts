// src/db/schema/raw-messages.ts

import { pgTable, uuid, text, boolean, bigint, timestamp, jsonb, index, uniqueIndex } from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import type { MessageEntity, MessageMedia } from "@digest/shared";
import { channels } from "./channels.js";

export const rawMessages = pgTable(
  "raw_messages",
  {
    id: uuid().primaryKey().defaultRandom(),
    channelId: uuid("channel_id")
      .notNull()
      .references(() => channels.id),
    sourceMessageId: bigint("source_message_id", { mode: "number" }).notNull(),
    sourceDate: timestamp("source_date", { withTimezone: true }).notNull(),
    text: text().notNull().default(""),
    entitiesJson: jsonb("entities_json").$type<MessageEntity[]>(),
    mediaJson: jsonb("media_json").$type<MessageMedia>(),
    // sha256 of the normalized text; drives strict dedup.
    canonicalHash: text("canonical_hash").notNull(),
    isForward: boolean("is_forward").notNull().default(false),
    discoveriesExtracted: boolean("discoveries_extracted").notNull().default(false),
    insertedAt: timestamp("inserted_at", { withTimezone: true }).notNull().defaultNow(),
    processedAt: timestamp("processed_at", { withTimezone: true }),
    // Claim marker: set while a worker owns the row.
    processingStartedAt: timestamp("processing_started_at", { withTimezone: true }),
  },
  (table) => [
    uniqueIndex("raw_messages_channel_message_uq").on(table.channelId, table.sourceMessageId),
    // The claim query: "unprocessed messages ordered by source time"
    index("raw_messages_pending_idx")
      .on(table.sourceDate)
      .where(sql`processed_at IS NULL`),
    index("raw_messages_hash_idx").on(table.canonicalHash),
    index("raw_messages_stuck_idx")
      .on(table.processingStartedAt)
      .where(sql`processing_started_at IS NOT NULL AND processed_at IS NULL`),
  ]
);
