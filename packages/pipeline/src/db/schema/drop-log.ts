// src/db/schema/drop-log.ts

import { pgTable, uuid, text, timestamp, index } from "drizzle-orm/pg-core";
import type { DropReason } from "@digest/shared";
import { rawMessages } from "./raw-messages.js";

export const rawMessageDropLog = pgTable(
  "raw_message_drop_log",
  {
    rawMessageId: uuid("raw_message_id")
      .primaryKey()
      .references(() => rawMessages.id, { onDelete: "cascade" }),
    reason: text().$type<DropReason>().notNull(),
    detail: text(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("raw_message_drop_log_reason_idx").on(table.reason)]
);
