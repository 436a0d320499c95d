// src/db/schema/relations.ts

import { relations } from "drizzle-orm";
import { channels } from "./channels.js";
import { rawMessages } from "./raw-messages.js";
import { items } from "./items.js";
import { embeddings } from "./embeddings.js";
import { clusters, clusterItems } from "./clusters.js";
import { digests, digestEntries } from "./digests.js";

export const channelsRelations = relations(channels, ({ many }) => ({
  rawMessages: many(rawMessages),
}));

export const rawMessagesRelations = relations(rawMessages, ({ one }) => ({
  channel: one(channels, {
    fields: [rawMessages.channelId],
    references: [channels.id],
  }),
  item: one(items),
}));

export const itemsRelations = relations(items, ({ one, many }) => ({
  rawMessage: one(rawMessages, {
    fields: [items.rawMessageId],
    references: [rawMessages.id],
  }),
  embedding: one(embeddings),
  digest: one(digests, {
    fields: [items.digestId],
    references: [digests.id],
  }),
  duplicateOf: one(items, {
    fields: [items.duplicateOfItemId],
    references: [items.id],
    relationName: "duplicates",
  }),
  duplicates: many(items, { relationName: "duplicates" }),
  clusterMemberships: many(clusterItems),
}));

export const embeddingsRelations = relations(embeddings, ({ one }) => ({
  item: one(items, {
    fields: [embeddings.itemId],
    references: [items.id],
  }),
}));

export const clustersRelations = relations(clusters, ({ many }) => ({
  members: many(clusterItems),
}));

export const clusterItemsRelations = relations(clusterItems, ({ one }) => ({
  cluster: one(clusters, {
    fields: [clusterItems.clusterId],
    references: [clusters.id],
  }),
  item: one(items, {
    fields: [clusterItems.itemId],
    references: [items.id],
  }),
}));

export const digestsRelations = relations(digests, ({ many }) => ({
  entries: many(digestEntries),
  items: many(items),
}));

export const digestEntriesRelations = relations(digestEntries, ({ one }) => ({
  digest: one(digests, {
    fields: [digestEntries.digestId],
    references: [digests.id],
  }),
}));
