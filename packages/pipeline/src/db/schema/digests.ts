// src/db/schema/digests.ts

import { pgTable, uuid, text, integer, timestamp, jsonb, index, uniqueIndex } from "drizzle-orm/pg-core";
import type { DigestErrorPayload, DigestSource } from "@digest/shared";
import { digestStatusEnum } from "./enums.js";

export const digests = pgTable(
  "digests",
  {
    id: uuid().primaryKey().defaultRandom(),
    windowStart: timestamp("window_start", { withTimezone: true }).notNull(),
    windowEnd: timestamp("window_end", { withTimezone: true }).notNull(),
    postedChatId: text("posted_chat_id"),
    postedMsgId: text("posted_msg_id"),
    status: digestStatusEnum().notNull(),
    errorJson: jsonb("error_json").$type<DigestErrorPayload>(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    // Last write; the retry grace for failed windows is measured from here.
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
    postedAt: timestamp("posted_at", { withTimezone: true }),
  },
  (table) => [
    uniqueIndex("digests_window_uq").on(table.windowStart, table.windowEnd),
    index("digests_status_idx").on(table.status),
  ]
);

export const digestEntries = pgTable(
  "digest_entries",
  {
    id: uuid().primaryKey().defaultRandom(),
    digestId: uuid("digest_id")
      .notNull()
      .references(() => digests.id, { onDelete: "cascade" }),
    position: integer().notNull(),
    title: text(),
    body: text().notNull(),
    sourcesJson: jsonb("sources_json").$type<DigestSource[]>().notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("digest_entries_digest_idx").on(table.digestId, table.position)]
);
