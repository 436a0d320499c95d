import { randomUUID } from "node:crypto";
import {
  and,
  asc,
  cosineDistance,
  desc,
  eq,
  gt,
  gte,
  inArray,
  isNotNull,
  isNull,
  lt,
  lte,
  ne,
  notInArray,
  or,
  sql,
  type SQL,
} from "drizzle-orm";

import { DEFAULTS } from "@digest/shared";
import type { DigestEntryPayload, DigestSource, DigestWindow, ItemErrorPayload } from "@digest/shared";
import type { Db } from "../db/index.js";
import {
  channels,
  clusterItems,
  clusters,
  digestEntries,
  digests,
  embeddings,
  items,
  rawMessageDropLog,
  rawMessages,
  schedulerLocks,
} from "../db/schema/index.js";
import { canonicalHash } from "../lib/canonical-hash.js";
import { StorageError, isAbortError } from "../lib/errors.js";
import { computeBackoffMs } from "./backoff.js";
import type {
  Claim,
  Clock,
  ClusterCandidate,
  ClusterDraft,
  DigestCandidate,
  DropRecord,
  ItemErrorResult,
  ItemRef,
  PublishedDigest,
  RecentItemError,
  SaveItemErrorInput,
  SaveItemInput,
  SimilarMatch,
  SimilarityQuery,
  UpsertChannelInput,
  UpsertRawMessageInput,
  WindowCluster,
} from "./types.js";

export type StorageGatewayOptions = {
  clock?: Clock;
  maxRetries?: number;
  baseBackoffMs?: number;
  maxBackoffMs?: number;
  digestRetryGraceMs?: number;
  lockTtlMs?: number;
  /** Identifies this process as a lock holder. Defaults to a fresh uuid. */
  holderId?: string;
};

type ResolvedOptions = Required<StorageGatewayOptions>;

export function channelLabel(row: { username: string | null; peerId: number }): string {
  return row.username ?? String(row.peerId);
}

function toSource(row: { username: string | null; peerId: number; sourceMessageId: number }): DigestSource {
  return { channel: channelLabel(row), msg_id: row.sourceMessageId };
}

function firstOrThrow<T>(rows: T[], operation: string): T {
  if (rows.length === 0) throw new StorageError(operation, new Error("no row returned"));
  return rows[0];
}

/**
 * Typed access to the durable store. Every method is atomic at the
 * granularity of its logical effect; multi-statement operations run in a
 * transaction. Driver failures surface as {@link StorageError}.
 */
export class StorageGateway {
  private readonly opts: ResolvedOptions;

  constructor(
    private readonly db: Db,
    opts: StorageGatewayOptions = {}
  ) {
    this.opts = {
      clock: opts.clock ?? (() => new Date()),
      maxRetries: opts.maxRetries ?? DEFAULTS.maxRetries,
      baseBackoffMs: opts.baseBackoffMs ?? DEFAULTS.baseBackoffMs,
      maxBackoffMs: opts.maxBackoffMs ?? DEFAULTS.maxBackoffMs,
      digestRetryGraceMs: opts.digestRetryGraceMs ?? DEFAULTS.digestRetryGraceMs,
      lockTtlMs: opts.lockTtlMs ?? DEFAULTS.lockTtlMs,
      holderId: opts.holderId ?? randomUUID(),
    };
  }

  get holderId() {
    return this.opts.holderId;
  }

  get maxRetries() {
    return this.opts.maxRetries;
  }

  now(): Date {
    return this.opts.clock();
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StorageError || isAbortError(err)) throw err;
      throw new StorageError(operation, err);
    }
  }

  /** Runs `fn` against a gateway bound to one transaction. */
  async withTransaction<T>(fn: (tx: StorageGateway) => Promise<T>): Promise<T> {
    return this.run("transaction", () =>
      this.db.transaction((tx) => fn(new StorageGateway(tx, this.opts)))
    );
  }

  // ============================================================
  // Ingestion
  // ============================================================

  /** Upsert on peer id. Fields left undefined keep their stored values. */
  async upsertChannel(input: UpsertChannelInput): Promise<string> {
    return this.run("upsertChannel", async () => {
      const provided = {
        ...(input.username !== undefined ? { username: input.username } : {}),
        ...(input.title !== undefined ? { title: input.title } : {}),
        ...(input.description !== undefined ? { description: input.description } : {}),
        ...(input.importanceWeight !== undefined ? { importanceWeight: input.importanceWeight } : {}),
        ...(input.importanceThreshold !== undefined ? { importanceThreshold: input.importanceThreshold } : {}),
      };

      return this.db.transaction(async (tx) => {
        // Usernames can be handed over to another channel; the old holder loses it.
        if (input.username) {
          await tx
            .update(channels)
            .set({ username: null })
            .where(and(eq(channels.username, input.username), ne(channels.peerId, input.peerId)));
        }

        const rows = await tx
          .insert(channels)
          .values({ peerId: input.peerId, ...provided })
          .onConflictDoUpdate({ target: channels.peerId, set: { peerId: input.peerId, ...provided } })
          .returning({ id: channels.id });
        return firstOrThrow(rows, "upsertChannel").id;
      });
    });
  }

  /** Updates the weight and threshold overrides of a known channel. */
  async updateChannelSettings(
    peerId: number,
    settings: { importanceWeight?: number; importanceThreshold?: number | null }
  ): Promise<boolean> {
    return this.run("updateChannelSettings", async () => {
      const rows = await this.db
        .update(channels)
        .set(settings)
        .where(eq(channels.peerId, peerId))
        .returning({ id: channels.id });
      return rows.length > 0;
    });
  }

  async upsertRawMessage(input: UpsertRawMessageInput): Promise<{ id: string; inserted: boolean }> {
    return this.run("upsertRawMessage", async () => {
      const content = {
        text: input.text,
        entitiesJson: input.entities ?? null,
        mediaJson: input.media ?? null,
        canonicalHash: canonicalHash(input.text),
        isForward: input.isForward ?? false,
      };

      const rows = await this.db
        .insert(rawMessages)
        .values({
          channelId: input.channelId,
          sourceMessageId: input.sourceMessageId,
          sourceDate: input.sourceDate,
          insertedAt: this.now(),
          ...content,
        })
        .onConflictDoUpdate({
          target: [rawMessages.channelId, rawMessages.sourceMessageId],
          set: content,
        })
        .returning({ id: rawMessages.id, inserted: sql<boolean>`(xmax = 0)` });
      return firstOrThrow(rows, "upsertRawMessage");
    });
  }

  // ============================================================
  // Claims
  // ============================================================

  /**
   * Claims up to `limit` messages, oldest source time first. Eligible rows are
   * unclaimed and unprocessed, and either have no item yet or an item in
   * error/retry whose backoff has elapsed. Row locks with SKIP LOCKED keep
   * concurrent claimers disjoint.
   */
  async claimPendingBatch(limit: number): Promise<Claim[]> {
    if (limit <= 0) return [];

    return this.run("claimPendingBatch", () =>
      this.db.transaction(async (tx) => {
        const now = this.now();

        const eligible = await tx
          .select({ id: rawMessages.id })
          .from(rawMessages)
          .leftJoin(items, eq(items.rawMessageId, rawMessages.id))
          .where(
            and(
              isNull(rawMessages.processedAt),
              isNull(rawMessages.processingStartedAt),
              or(
                isNull(items.id),
                notInArray(items.status, ["error", "retry"]),
                and(
                  lt(items.retryCount, this.opts.maxRetries),
                  or(isNull(items.nextRetryAt), lte(items.nextRetryAt, now))
                )
              )
            )
          )
          .orderBy(asc(rawMessages.sourceDate), asc(rawMessages.id))
          .limit(limit)
          .for("update", { of: rawMessages, skipLocked: true });

        if (eligible.length === 0) return [];
        const ids = eligible.map((r) => r.id);

        await tx.update(rawMessages).set({ processingStartedAt: now }).where(inArray(rawMessages.id, ids));

        // A claimed failure is being retried.
        await tx
          .update(items)
          .set({ status: "retry", updatedAt: now })
          .where(and(inArray(items.rawMessageId, ids), eq(items.status, "error")));

        const rows = await tx
          .select({
            rawMessageId: rawMessages.id,
            channelId: channels.id,
            channelPeerId: channels.peerId,
            channelUsername: channels.username,
            channelTitle: channels.title,
            channelDescription: channels.description,
            importanceWeight: channels.importanceWeight,
            sourceMessageId: rawMessages.sourceMessageId,
            sourceDate: rawMessages.sourceDate,
            text: rawMessages.text,
            entities: rawMessages.entitiesJson,
            media: rawMessages.mediaJson,
            canonicalHash: rawMessages.canonicalHash,
            isForward: rawMessages.isForward,
            itemStatus: items.status,
            retryCount: items.retryCount,
          })
          .from(rawMessages)
          .innerJoin(channels, eq(channels.id, rawMessages.channelId))
          .leftJoin(items, eq(items.rawMessageId, rawMessages.id))
          .where(inArray(rawMessages.id, ids))
          .orderBy(asc(rawMessages.sourceDate), asc(rawMessages.id));

        return rows.map((r) => ({ ...r, retryCount: r.retryCount ?? 0 }));
      })
    );
  }

  async releaseClaim(rawMessageId: string): Promise<void> {
    await this.run("releaseClaim", () =>
      this.db
        .update(rawMessages)
        .set({ processingStartedAt: null })
        .where(eq(rawMessages.id, rawMessageId))
    );
  }

  async markProcessed(rawMessageId: string): Promise<void> {
    const now = this.now();
    await this.run("markProcessed", () =>
      this.db
        .update(rawMessages)
        .set({
          processedAt: sql`coalesce(${rawMessages.processedAt}, ${now.toISOString()}::timestamptz)`,
          processingStartedAt: null,
        })
        .where(eq(rawMessages.id, rawMessageId))
    );
  }

  /** Clears claims older than `staleAfterMs` that never completed. */
  async recoverStuckClaims(staleAfterMs: number): Promise<number> {
    const cutoff = new Date(this.now().getTime() - staleAfterMs);
    return this.run("recoverStuckClaims", async () => {
      const rows = await this.db
        .update(rawMessages)
        .set({ processingStartedAt: null })
        .where(
          and(
            isNotNull(rawMessages.processingStartedAt),
            isNull(rawMessages.processedAt),
            lt(rawMessages.processingStartedAt, cutoff)
          )
        )
        .returning({ id: rawMessages.id });
      return rows.length;
    });
  }

  async recordDrop(record: DropRecord): Promise<void> {
    const now = this.now();
    await this.run("recordDrop", () =>
      this.db
        .insert(rawMessageDropLog)
        .values({ ...record, detail: record.detail ?? null, updatedAt: now })
        .onConflictDoUpdate({
          target: rawMessageDropLog.rawMessageId,
          set: { reason: record.reason, detail: record.detail ?? null, updatedAt: now },
        })
    );
  }

  // ============================================================
  // Items
  // ============================================================

  /**
   * Writes a successful enrichment. The retry count is kept as error
   * history; the pending retry and error payload are cleared.
   */
  async saveItem(input: SaveItemInput): Promise<string> {
    const now = this.now();
    return this.run("saveItem", async () => {
      const fields = {
        relevanceScore: input.relevanceScore,
        importanceScore: input.importanceScore,
        topic: input.topic,
        summary: input.summary,
        language: input.language,
        firstSeenAt: input.firstSeenAt,
        status: "ready" as const,
        nextRetryAt: null,
        errorJson: null,
        updatedAt: now,
      };

      const rows = await this.db
        .insert(items)
        .values({ rawMessageId: input.rawMessageId, ...fields })
        .onConflictDoUpdate({ target: items.rawMessageId, set: fields })
        .returning({ id: items.id });
      return firstOrThrow(rows, "saveItem").id;
    });
  }

  /** Records a failed attempt and schedules the next one with exponential backoff. */
  async saveItemError(input: SaveItemErrorInput): Promise<ItemErrorResult> {
    return this.run("saveItemError", () =>
      this.db.transaction(async (tx) => {
        const now = this.now();

        const prior = await tx
          .select({ retryCount: items.retryCount })
          .from(items)
          .where(eq(items.rawMessageId, input.rawMessageId))
          .for("update");

        const retryCount = (prior.length > 0 ? prior[0].retryCount : 0) + 1;
        const nextRetryAt = new Date(
          now.getTime() + computeBackoffMs(retryCount, this.opts.baseBackoffMs, this.opts.maxBackoffMs)
        );
        const errorJson: ItemErrorPayload = { kind: input.kind, message: input.message, at: now.toISOString() };

        const fields = {
          status: "error" as const,
          retryCount,
          nextRetryAt,
          errorJson,
          updatedAt: now,
        };

        const rows = await tx
          .insert(items)
          .values({ rawMessageId: input.rawMessageId, firstSeenAt: input.firstSeenAt, ...fields })
          .onConflictDoUpdate({ target: items.rawMessageId, set: fields })
          .returning({ id: items.id });

        return { itemId: firstOrThrow(rows, "saveItemError").id, retryCount, nextRetryAt };
      })
    );
  }

  /**
   * Points `itemId` at `canonicalId`. Items that used `itemId` as their
   * canonical follow it, so chains never form.
   */
  async markItemDuplicate(itemId: string, canonicalId: string): Promise<void> {
    if (itemId === canonicalId) return;
    const now = this.now();

    await this.run("markItemDuplicate", () =>
      this.db.transaction(async (tx) => {
        await tx
          .update(items)
          .set({ duplicateOfItemId: canonicalId, updatedAt: now })
          .where(and(eq(items.duplicateOfItemId, itemId), ne(items.id, canonicalId)));
        await tx
          .update(items)
          .set({ duplicateOfItemId: null, updatedAt: now })
          .where(and(eq(items.id, canonicalId), eq(items.duplicateOfItemId, itemId)));
        await tx
          .update(items)
          .set({ duplicateOfItemId: canonicalId, updatedAt: now })
          .where(eq(items.id, itemId));
      })
    );
  }

  async getItemRef(itemId: string): Promise<ItemRef | null> {
    return this.run("getItemRef", async () => {
      const rows = await this.db
        .select({ itemId: items.id, firstSeenAt: items.firstSeenAt })
        .from(items)
        .where(eq(items.id, itemId))
        .limit(1);
      return rows.length > 0 ? rows[0] : null;
    });
  }

  /**
   * The canonical item behind another processed message with the same
   * canonical hash, if one exists and did not end in error.
   */
  async findStrictDuplicate(hash: string, excludeRawMessageId: string): Promise<ItemRef | null> {
    return this.run("findStrictDuplicate", async () => {
      const rows = await this.db
        .select({
          itemId: items.id,
          firstSeenAt: items.firstSeenAt,
          duplicateOfItemId: items.duplicateOfItemId,
        })
        .from(rawMessages)
        .innerJoin(items, eq(items.rawMessageId, rawMessages.id))
        .where(
          and(
            eq(rawMessages.canonicalHash, hash),
            ne(rawMessages.id, excludeRawMessageId),
            isNotNull(rawMessages.processedAt),
            ne(items.status, "error")
          )
        )
        .orderBy(asc(items.firstSeenAt), asc(items.id))
        .limit(1);

      if (rows.length === 0) return null;
      const match = rows[0];
      if (!match.duplicateOfItemId) return { itemId: match.itemId, firstSeenAt: match.firstSeenAt };
      return this.getItemRef(match.duplicateOfItemId);
    });
  }

  async strictDuplicate(hash: string, excludeRawMessageId: string): Promise<boolean> {
    return (await this.findStrictDuplicate(hash, excludeRawMessageId)) !== null;
  }

  /** Operator retry of every failed item. Returns how many were rescheduled. */
  async retryFailedItems(): Promise<number> {
    return this.rescheduleItems("retryFailedItems", eq(items.status, "error"));
  }

  async retryItem(itemId: string): Promise<boolean> {
    const n = await this.rescheduleItems(
      "retryItem",
      and(eq(items.id, itemId), inArray(items.status, ["error", "retry"]))
    );
    return n > 0;
  }

  private async rescheduleItems(operation: string, where: SQL | undefined): Promise<number> {
    return this.run(operation, () =>
      this.db.transaction(async (tx) => {
        const now = this.now();
        // A message a worker holds is left to that worker.
        const unclaimed = tx
          .select({ id: rawMessages.id })
          .from(rawMessages)
          .where(isNull(rawMessages.processingStartedAt));
        const rows = await tx
          .update(items)
          .set({ status: "retry", retryCount: 0, nextRetryAt: now, updatedAt: now })
          .where(and(where, inArray(items.rawMessageId, unclaimed)))
          .returning({ rawMessageId: items.rawMessageId });
        if (rows.length === 0) return 0;

        await tx
          .update(rawMessages)
          .set({ processedAt: null, processingStartedAt: null })
          .where(
            inArray(
              rawMessages.id,
              rows.map((r) => r.rawMessageId)
            )
          );
        return rows.length;
      })
    );
  }

  async getRecentErrors(limit: number): Promise<RecentItemError[]> {
    return this.run("getRecentErrors", async () => {
      const rows = await this.db
        .select({
          itemId: items.id,
          rawMessageId: items.rawMessageId,
          status: items.status,
          retryCount: items.retryCount,
          nextRetryAt: items.nextRetryAt,
          error: items.errorJson,
          updatedAt: items.updatedAt,
          username: channels.username,
          peerId: channels.peerId,
          sourceMessageId: rawMessages.sourceMessageId,
        })
        .from(items)
        .innerJoin(rawMessages, eq(rawMessages.id, items.rawMessageId))
        .innerJoin(channels, eq(channels.id, rawMessages.channelId))
        .where(eq(items.status, "error"))
        .orderBy(desc(items.updatedAt), asc(items.id))
        .limit(limit);

      return rows.map(({ username, peerId, sourceMessageId, ...rest }) => ({
        ...rest,
        source: toSource({ username, peerId, sourceMessageId }),
      }));
    });
  }

  // ============================================================
  // Embeddings and similarity
  // ============================================================

  async saveEmbedding(itemId: string, vector: number[]): Promise<void> {
    const now = this.now();
    await this.run("saveEmbedding", () =>
      this.db
        .insert(embeddings)
        .values({ itemId, embedding: vector, createdAt: now })
        .onConflictDoUpdate({ target: embeddings.itemId, set: { embedding: vector, createdAt: now } })
    );
  }

  /**
   * Nearest neighbour with cosine similarity strictly above the threshold.
   * A threshold of 1 only matches vectors at distance 0.
   */
  async findSimilarItem(query: SimilarityQuery): Promise<SimilarMatch | null> {
    return this.run("findSimilarItem", () => this.nearest(query));
  }

  async findSimilarItemInChannel(query: SimilarityQuery & { channelId: string }): Promise<SimilarMatch | null> {
    return this.run("findSimilarItemInChannel", () => this.nearest(query, query.channelId));
  }

  private async nearest(query: SimilarityQuery, channelId?: string): Promise<SimilarMatch | null> {
    const distance = sql<number>`(${cosineDistance(embeddings.embedding, query.vector)})`.mapWith(Number);
    const maxDistance = 1 - query.threshold;

    const rows = await this.db
      .select({ itemId: items.id, firstSeenAt: items.firstSeenAt, distance })
      .from(embeddings)
      .innerJoin(items, eq(items.id, embeddings.itemId))
      .innerJoin(rawMessages, eq(rawMessages.id, items.rawMessageId))
      .where(
        and(
          maxDistance > 0 ? lt(distance, maxDistance) : lte(distance, 0),
          gt(embeddings.createdAt, query.since),
          inArray(items.status, ["ready", "digested"]),
          isNull(items.duplicateOfItemId),
          query.excludeItemId ? ne(items.id, query.excludeItemId) : undefined,
          channelId ? eq(rawMessages.channelId, channelId) : undefined
        )
      )
      .orderBy(distance, asc(items.firstSeenAt))
      .limit(1);

    if (rows.length === 0) return null;
    const { itemId, firstSeenAt } = rows[0];
    return { itemId, firstSeenAt, similarity: 1 - rows[0].distance };
  }

  // ============================================================
  // Window reads
  // ============================================================

  private windowFilter(window: DigestWindow, importanceThreshold: number) {
    return and(
      eq(items.status, "ready"),
      isNull(items.digestedAt),
      isNull(items.duplicateOfItemId),
      gte(items.firstSeenAt, window.start),
      lt(items.firstSeenAt, window.end),
      gte(items.importanceScore, sql`coalesce(${channels.importanceThreshold}, ${importanceThreshold})`)
    );
  }

  async getClusterCandidates(
    window: DigestWindow,
    importanceThreshold: number,
    limit: number
  ): Promise<ClusterCandidate[]> {
    return this.run("getClusterCandidates", () =>
      this.db
        .select({
          itemId: items.id,
          topic: items.topic,
          importanceScore: items.importanceScore,
          firstSeenAt: items.firstSeenAt,
          embedding: embeddings.embedding,
        })
        .from(items)
        .innerJoin(embeddings, eq(embeddings.itemId, items.id))
        .innerJoin(rawMessages, eq(rawMessages.id, items.rawMessageId))
        .innerJoin(channels, eq(channels.id, rawMessages.channelId))
        .where(this.windowFilter(window, importanceThreshold))
        .orderBy(desc(items.importanceScore), asc(items.firstSeenAt), asc(items.id))
        .limit(limit)
    );
  }

  async getDigestCandidates(
    window: DigestWindow,
    importanceThreshold: number,
    limit: number
  ): Promise<DigestCandidate[]> {
    return this.run("getDigestCandidates", async () => {
      const rows = await this.db
        .select({
          itemId: items.id,
          topic: items.topic,
          summary: items.summary,
          importanceScore: items.importanceScore,
          relevanceScore: items.relevanceScore,
          firstSeenAt: items.firstSeenAt,
          embeddingItemId: embeddings.itemId,
          username: channels.username,
          peerId: channels.peerId,
          sourceMessageId: rawMessages.sourceMessageId,
        })
        .from(items)
        .innerJoin(rawMessages, eq(rawMessages.id, items.rawMessageId))
        .innerJoin(channels, eq(channels.id, rawMessages.channelId))
        .leftJoin(embeddings, eq(embeddings.itemId, items.id))
        .where(this.windowFilter(window, importanceThreshold))
        .orderBy(desc(items.importanceScore), desc(items.relevanceScore), asc(items.firstSeenAt), asc(items.id))
        .limit(limit);

      if (rows.length === 0) return [];

      const dupes = await this.db
        .select({
          itemId: items.id,
          duplicateOfItemId: items.duplicateOfItemId,
          username: channels.username,
          peerId: channels.peerId,
          sourceMessageId: rawMessages.sourceMessageId,
        })
        .from(items)
        .innerJoin(rawMessages, eq(rawMessages.id, items.rawMessageId))
        .innerJoin(channels, eq(channels.id, rawMessages.channelId))
        .where(
          and(
            inArray(
              items.duplicateOfItemId,
              rows.map((r) => r.itemId)
            ),
            eq(items.status, "ready"),
            isNull(items.digestedAt)
          )
        )
        .orderBy(asc(items.firstSeenAt), asc(items.id));

      const byCanonical = new Map<string, DigestCandidate["duplicates"]>();
      for (const d of dupes) {
        if (!d.duplicateOfItemId) continue;
        const list = byCanonical.get(d.duplicateOfItemId) ?? [];
        list.push({ itemId: d.itemId, source: toSource(d) });
        byCanonical.set(d.duplicateOfItemId, list);
      }

      return rows.map((r) => ({
        itemId: r.itemId,
        topic: r.topic,
        summary: r.summary,
        importanceScore: r.importanceScore,
        relevanceScore: r.relevanceScore,
        firstSeenAt: r.firstSeenAt,
        hasEmbedding: r.embeddingItemId !== null,
        source: toSource(r),
        duplicates: byCanonical.get(r.itemId) ?? [],
      }));
    });
  }

  // ============================================================
  // Clusters
  // ============================================================

  async deleteClustersForWindow(window: DigestWindow): Promise<number> {
    return this.run("deleteClustersForWindow", async () => {
      const rows = await this.db
        .delete(clusters)
        .where(and(eq(clusters.windowStart, window.start), eq(clusters.windowEnd, window.end)))
        .returning({ id: clusters.id });
      return rows.length;
    });
  }

  async createCluster(window: DigestWindow, topic: string | null): Promise<string> {
    return this.run("createCluster", async () => {
      const rows = await this.db
        .insert(clusters)
        .values({ windowStart: window.start, windowEnd: window.end, topic, createdAt: this.now() })
        .returning({ id: clusters.id });
      return firstOrThrow(rows, "createCluster").id;
    });
  }

  async addToCluster(clusterId: string, itemId: string): Promise<void> {
    await this.run("addToCluster", () =>
      this.db.insert(clusterItems).values({ clusterId, itemId }).onConflictDoNothing()
    );
  }

  /** Delete-then-insert of a window's clusters in one transaction. */
  async replaceClustersForWindow(window: DigestWindow, drafts: ClusterDraft[]): Promise<string[]> {
    return this.withTransaction(async (tx) => {
      await tx.deleteClustersForWindow(window);
      const ids: string[] = [];
      for (const draft of drafts) {
        const id = await tx.createCluster(window, draft.topic);
        for (const itemId of draft.itemIds) await tx.addToCluster(id, itemId);
        ids.push(id);
      }
      return ids;
    });
  }

  async getClustersForWindow(window: DigestWindow): Promise<WindowCluster[]> {
    return this.run("getClustersForWindow", async () => {
      const rows = await this.db
        .select({ clusterId: clusters.id, topic: clusters.topic, itemId: clusterItems.itemId })
        .from(clusters)
        .innerJoin(clusterItems, eq(clusterItems.clusterId, clusters.id))
        .where(and(eq(clusters.windowStart, window.start), eq(clusters.windowEnd, window.end)))
        .orderBy(asc(clusters.createdAt), asc(clusters.id), asc(clusterItems.itemId));

      const byId = new Map<string, WindowCluster>();
      for (const r of rows) {
        const cluster = byId.get(r.clusterId) ?? { clusterId: r.clusterId, topic: r.topic, itemIds: [] };
        cluster.itemIds.push(r.itemId);
        byId.set(r.clusterId, cluster);
      }
      return [...byId.values()];
    });
  }

  // ============================================================
  // Digests
  // ============================================================

  /**
   * True when the window already has a posted digest, or a failed attempt
   * younger than the retry grace.
   */
  async digestExists(window: DigestWindow): Promise<boolean> {
    const graceCutoff = new Date(this.now().getTime() - this.opts.digestRetryGraceMs);
    return this.run("digestExists", async () => {
      const rows = await this.db
        .select({ id: digests.id })
        .from(digests)
        .where(
          and(
            eq(digests.windowStart, window.start),
            eq(digests.windowEnd, window.end),
            or(eq(digests.status, "posted"), and(eq(digests.status, "error"), gt(digests.updatedAt, graceCutoff)))
          )
        )
        .limit(1);
      return rows.length > 0;
    });
  }

  async saveDigest(window: DigestWindow, chatId: string, messageId: string): Promise<string> {
    return (await this.upsertPostedDigest(window, chatId, messageId)).id;
  }

  /** `created` is false when the window was already posted. */
  private async upsertPostedDigest(
    window: DigestWindow,
    chatId: string,
    messageId: string
  ): Promise<{ id: string; created: boolean }> {
    const now = this.now();
    return this.run("saveDigest", async () => {
      const fields = {
        postedChatId: chatId,
        postedMsgId: messageId,
        status: "posted" as const,
        errorJson: null,
        postedAt: now,
        updatedAt: now,
      };

      const rows = await this.db
        .insert(digests)
        .values({ windowStart: window.start, windowEnd: window.end, createdAt: now, ...fields })
        .onConflictDoUpdate({
          target: [digests.windowStart, digests.windowEnd],
          set: fields,
          setWhere: ne(digests.status, "posted"),
        })
        .returning({ id: digests.id });
      if (rows.length > 0) return { id: rows[0].id, created: true };

      // Already posted: the existing row stays authoritative.
      const existing = await this.db
        .select({ id: digests.id })
        .from(digests)
        .where(and(eq(digests.windowStart, window.start), eq(digests.windowEnd, window.end)));
      return { id: firstOrThrow(existing, "saveDigest").id, created: false };
    });
  }

  async saveDigestEntries(digestId: string, entries: DigestEntryPayload[]): Promise<void> {
    if (entries.length === 0) return;
    const now = this.now();
    await this.run("saveDigestEntries", () =>
      this.db.insert(digestEntries).values(
        entries.map((e, position) => ({
          digestId,
          position,
          title: e.title,
          body: e.body,
          sourcesJson: e.sources,
          createdAt: now,
        }))
      )
    );
  }

  async saveDigestError(window: DigestWindow, chatId: string, error: { kind: string; message: string }): Promise<void> {
    const now = this.now();
    const fields = {
      postedChatId: chatId,
      status: "error" as const,
      errorJson: { ...error, at: now.toISOString() },
      updatedAt: now,
    };

    await this.run("saveDigestError", () =>
      this.db
        .insert(digests)
        .values({ windowStart: window.start, windowEnd: window.end, createdAt: now, ...fields })
        .onConflictDoUpdate({
          target: [digests.windowStart, digests.windowEnd],
          set: fields,
          setWhere: ne(digests.status, "posted"),
        })
    );
  }

  async clearDigestErrors(): Promise<number> {
    return this.run("clearDigestErrors", async () => {
      const rows = await this.db
        .delete(digests)
        .where(eq(digests.status, "error"))
        .returning({ id: digests.id });
      return rows.length;
    });
  }

  /** Marks items digested. Items already digested are left untouched. */
  async markItemsDigested(itemIds: string[], digestId?: string): Promise<number> {
    if (itemIds.length === 0) return 0;
    const now = this.now();
    return this.run("markItemsDigested", async () => {
      const rows = await this.db
        .update(items)
        .set({ status: "digested", digestedAt: now, updatedAt: now, ...(digestId ? { digestId } : {}) })
        .where(and(inArray(items.id, itemIds), isNull(items.digestedAt)))
        .returning({ id: items.id });
      return rows.length;
    });
  }

  /**
   * The three post-publication writes, all or nothing. Repeating them for a
   * window that is already posted changes nothing.
   */
  async recordPublishedDigest(digest: PublishedDigest): Promise<string> {
    return this.withTransaction(async (tx) => {
      const { id: digestId, created } = await tx.upsertPostedDigest(digest.window, digest.chatId, digest.messageId);
      if (!created) return digestId;
      await tx.saveDigestEntries(digestId, digest.entries);
      await tx.markItemsDigested(digest.itemIds, digestId);
      return digestId;
    });
  }

  // ============================================================
  // Locks
  // ============================================================

  /**
   * Takes a lease on `lockId`. Fails while another holder's lease is live;
   * an expired lease is taken over.
   */
  async tryAcquireLock(lockId: number): Promise<boolean> {
    const now = this.now();
    const expiresAt = new Date(now.getTime() + this.opts.lockTtlMs);
    return this.run("tryAcquireLock", async () => {
      const rows = await this.db
        .insert(schedulerLocks)
        .values({ lockId, holderId: this.opts.holderId, acquiredAt: now, expiresAt })
        .onConflictDoUpdate({
          target: schedulerLocks.lockId,
          set: { holderId: this.opts.holderId, acquiredAt: now, expiresAt },
          setWhere: lte(schedulerLocks.expiresAt, now),
        })
        .returning({ lockId: schedulerLocks.lockId });
      return rows.length > 0;
    });
  }

  async releaseLock(lockId: number): Promise<void> {
    await this.run("releaseLock", () =>
      this.db
        .delete(schedulerLocks)
        .where(and(eq(schedulerLocks.lockId, lockId), eq(schedulerLocks.holderId, this.opts.holderId)))
    );
  }
}
