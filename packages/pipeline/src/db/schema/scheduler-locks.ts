// src/db/schema/scheduler-locks.ts

import { pgTable, bigint, text, timestamp, index } from "drizzle-orm/pg-core";

// Leases instead of pg_advisory_lock: session locks do not survive a pooled connection.
export const schedulerLocks = pgTable(
  "scheduler_locks",
  {
    lockId: bigint("lock_id", { mode: "number" }).primaryKey(),
    holderId: text("holder_id").notNull(),
    acquiredAt: timestamp("acquired_at", { withTimezone: true }).notNull().defaultNow(),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
  },
  (table) => [index("scheduler_locks_expires_idx").on(table.expiresAt)]
);
