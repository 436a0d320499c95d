// src/db/validation.ts

import { createInsertSchema } from "drizzle-zod";
import type { z } from "zod";
import { channels } from "./schema/channels.js";

// ============================================================
// Schemas derived from Drizzle tables
// ============================================================

// -- Channels --
export const channelInsertSchema = createInsertSchema(channels, {
  importanceWeight: (schema) => schema.positive(),
  importanceThreshold: (schema) => schema.min(0).max(1),
});

/** Operator-editable channel settings. At least one field is required. */
export const channelSettingsSchema = channelInsertSchema
  .pick({ importanceWeight: true, importanceThreshold: true })
  .partial()
  .refine((v) => v.importanceWeight !== undefined || v.importanceThreshold !== undefined, {
    message: "Provide importanceWeight or importanceThreshold",
  });

export type ChannelSettings = z.infer<typeof channelSettingsSchema>;
