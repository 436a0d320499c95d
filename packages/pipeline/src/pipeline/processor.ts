import {
  IMPORTANCE_WEIGHT_MAX,
  IMPORTANCE_WEIGHT_MIN,
  type DropReason,
  type EnrichmentErrorKind,
  type EnrichmentResult,
  type FilterAction,
} from "@digest/shared";

import type { EmbeddingProvider } from "../ai/embeddings.js";
import type { EnrichmentProvider } from "../ai/enrichment.js";
import { EmbeddingError, EnrichmentError, isAbortError } from "../lib/errors.js";
import { createLogger, type Logger } from "../lib/logger.js";
import type { StorageGateway } from "../storage/gateway.js";
import type { SummaryCache } from "../storage/summary-cache.js";
import type { Claim } from "../storage/types.js";
import type { DeduplicationEngine, DedupOutcome } from "./dedup.js";
import { allowAll, type MessageFilter } from "./filters.js";

export type ProcessOutcome =
  | { status: "filtered"; reason: DropReason; itemId?: string }
  | {
      status: "ready";
      itemId: string;
      cached: boolean;
      embedded: boolean;
      dedup: DedupOutcome;
    }
  /** Transient failure; the claim is released and retried after backoff. */
  | { status: "retry"; itemId: string; kind: EnrichmentErrorKind; retryCount: number; nextRetryAt: Date }
  /** Permanent failure or retries exhausted. */
  | { status: "failed"; itemId: string; kind: EnrichmentErrorKind; retryCount: number };

/** Whether the raw message is done once this outcome is recorded. */
export function isTerminal(outcome: ProcessOutcome): boolean {
  return outcome.status !== "retry";
}

/**
 * Scales provider importance by the channel weight. Weights below the floor
 * fall back to 1, weights above the ceiling are clamped.
 */
export function applyImportanceWeight(importance: number, weight: number): number {
  const w = Number.isFinite(weight) && weight >= IMPORTANCE_WEIGHT_MIN ? Math.min(weight, IMPORTANCE_WEIGHT_MAX) : 1;
  return Math.min(1, Math.max(0, importance * w));
}

export type MessageProcessorDeps = {
  store: StorageGateway;
  cache: SummaryCache;
  enrichment: EnrichmentProvider;
  embeddings: EmbeddingProvider;
  dedup: DeduplicationEngine;
  filter?: MessageFilter;
};

export type MessageProcessorOptions = {
  digestLanguage: string;
  filterAction: FilterAction;
  minRelevanceForEmbedding: number;
  logger?: Logger;
};

/** Runs one claimed message from filter gate to a recorded item. */
export class MessageProcessor {
  private readonly filter: MessageFilter;
  private readonly log: Logger;

  constructor(
    private readonly deps: MessageProcessorDeps,
    private readonly opts: MessageProcessorOptions
  ) {
    this.filter = deps.filter ?? allowAll;
    this.log = opts.logger ?? createLogger("processor");
  }

  async process(claim: Claim, signal?: AbortSignal): Promise<ProcessOutcome> {
    const { store } = this.deps;
    const log = this.log.child({ rawMessageId: claim.rawMessageId });

    const decision = this.filter(claim);
    if (decision.filtered) {
      if (this.opts.filterAction === "drop") {
        await store.recordDrop({ rawMessageId: claim.rawMessageId, reason: decision.reason, detail: decision.detail });
        log.debug({ reason: decision.reason }, "message dropped");
        return { status: "filtered", reason: decision.reason };
      }

      const itemId = await store.saveItem({
        rawMessageId: claim.rawMessageId,
        relevanceScore: 0,
        importanceScore: 0,
        topic: null,
        summary: null,
        language: null,
        firstSeenAt: claim.sourceDate,
      });
      log.debug({ reason: decision.reason, itemId }, "message scored zero");
      return { status: "filtered", reason: decision.reason, itemId };
    }

    let result: EnrichmentResult;
    let cached = false;
    const hit = await this.deps.cache.find(claim.canonicalHash, this.opts.digestLanguage);
    if (hit) {
      result = {
        topic: hit.topic,
        summary: hit.summary,
        language: hit.language,
        relevance: hit.relevanceScore,
        importance: hit.importanceScore,
      };
      cached = true;
    } else {
      try {
        result = await this.deps.enrichment.enrich(
          {
            text: claim.text,
            channel: {
              title: claim.channelTitle,
              username: claim.channelUsername,
              description: claim.channelDescription,
            },
            languageHint: this.opts.digestLanguage,
          },
          { signal }
        );
      } catch (err) {
        if (signal?.aborted || isAbortError(err) || !(err instanceof EnrichmentError)) throw err;
        return this.recordFailure(claim, err, log);
      }

      await this.deps.cache.upsert({
        canonicalHash: claim.canonicalHash,
        digestLanguage: this.opts.digestLanguage,
        summary: result.summary,
        topic: result.topic,
        language: result.language,
        relevanceScore: result.relevance,
        importanceScore: result.importance,
      });
    }

    const itemId = await store.saveItem({
      rawMessageId: claim.rawMessageId,
      relevanceScore: result.relevance,
      importanceScore: applyImportanceWeight(result.importance, claim.importanceWeight),
      topic: result.topic,
      summary: result.summary,
      language: result.language,
      firstSeenAt: claim.sourceDate,
    });

    let vector: number[] | null = null;
    if (result.relevance >= this.opts.minRelevanceForEmbedding) {
      vector = await this.embed(claim.text, signal, log);
      if (vector) await store.saveEmbedding(itemId, vector);
    }

    const dedup = await this.deps.dedup.check({
      itemId,
      rawMessageId: claim.rawMessageId,
      channelId: claim.channelId,
      canonicalHash: claim.canonicalHash,
      firstSeenAt: claim.sourceDate,
      vector,
    });

    log.debug({ itemId, cached, duplicate: dedup.duplicate }, "message enriched");
    return { status: "ready", itemId, cached, embedded: vector !== null, dedup };
  }

  private async recordFailure(claim: Claim, err: EnrichmentError, log: Logger): Promise<ProcessOutcome> {
    const res = await this.deps.store.saveItemError({
      rawMessageId: claim.rawMessageId,
      firstSeenAt: claim.sourceDate,
      kind: err.kind,
      message: err.message,
    });

    const exhausted = res.retryCount >= this.deps.store.maxRetries;
    if (!err.retryable || exhausted) {
      log.warn({ err, itemId: res.itemId, retryCount: res.retryCount }, "enrichment failed permanently");
      return { status: "failed", itemId: res.itemId, kind: err.kind, retryCount: res.retryCount };
    }

    log.info(
      { kind: err.kind, itemId: res.itemId, retryCount: res.retryCount, nextRetryAt: res.nextRetryAt },
      "enrichment failed, retry scheduled"
    );
    return { status: "retry", ...res, kind: err.kind };
  }

  /** Embedding failures leave the item without a vector. */
  private async embed(text: string, signal: AbortSignal | undefined, log: Logger): Promise<number[] | null> {
    try {
      return await this.deps.embeddings.embed(text, { signal });
    } catch (err) {
      if (signal?.aborted || !(err instanceof EmbeddingError)) throw err;
      log.warn({ err }, "embedding failed");
      return null;
    }
  }
}
