import { DEFAULTS, type DuplicateKind } from "@digest/shared";

import { createLogger, type Logger } from "../lib/logger.js";
import { isEmptyVector } from "../lib/vector.js";
import type { StorageGateway } from "../storage/gateway.js";
import type { SimilarityIndex } from "../storage/similarity-index.js";
import type { Clock, ItemRef } from "../storage/types.js";

export type DedupSubject = {
  itemId: string;
  rawMessageId: string;
  channelId: string;
  canonicalHash: string;
  firstSeenAt: Date;
  /** Null when no embedding was computed. */
  vector: number[] | null;
};

export type DedupOutcome =
  | { duplicate: false }
  | {
      duplicate: true;
      kind: DuplicateKind;
      /** The item that stays canonical after linking. */
      canonicalItemId: string;
      duplicateItemId: string;
      similarity?: number;
    };

export type DeduplicationOptions = {
  globalSimilarity: number;
  globalWindowMs: number;
  intraSimilarity: number;
  intraWindowMs: number;
  clock?: Clock;
  logger?: Logger;
};

export class DeduplicationEngine {
  private readonly opts: Required<Omit<DeduplicationOptions, "logger">>;
  private readonly log: Logger;

  constructor(
    private readonly store: StorageGateway,
    private readonly index: SimilarityIndex,
    opts: Partial<DeduplicationOptions> = {}
  ) {
    this.opts = {
      globalSimilarity: opts.globalSimilarity ?? DEFAULTS.globalSimilarity,
      globalWindowMs: opts.globalWindowMs ?? DEFAULTS.globalWindowMs,
      intraSimilarity: opts.intraSimilarity ?? DEFAULTS.intraSimilarity,
      intraWindowMs: opts.intraWindowMs ?? DEFAULTS.intraWindowMs,
      clock: opts.clock ?? (() => new Date()),
    };
    this.log = opts.logger ?? createLogger("dedup");
  }

  /**
   * Checks strict, then cross-channel, then in-channel duplicates and links
   * the later item to the earlier one. The first hit wins.
   */
  async check(subject: DedupSubject): Promise<DedupOutcome> {
    const strict = await this.store.findStrictDuplicate(subject.canonicalHash, subject.rawMessageId);
    if (strict) {
      // Already the canonical of an earlier repost.
      if (strict.itemId === subject.itemId) return { duplicate: false };
      return this.link(subject, strict, "strict");
    }

    if (!subject.vector || isEmptyVector(subject.vector)) return { duplicate: false };

    const now = this.opts.clock().getTime();

    const global = await this.index.findGlobal({
      vector: subject.vector,
      threshold: this.opts.globalSimilarity,
      since: new Date(now - this.opts.globalWindowMs),
      excludeItemId: subject.itemId,
    });
    if (global) return this.link(subject, global, "global", global.similarity);

    const local = await this.index.findInChannel({
      vector: subject.vector,
      threshold: this.opts.intraSimilarity,
      since: new Date(now - this.opts.intraWindowMs),
      excludeItemId: subject.itemId,
      channelId: subject.channelId,
    });
    if (local) return this.link(subject, local, "channel", local.similarity);

    return { duplicate: false };
  }

  private async link(
    subject: DedupSubject,
    match: ItemRef,
    kind: DuplicateKind,
    similarity?: number
  ): Promise<DedupOutcome> {
    // Earlier first_seen_at is canonical; on a tie the existing item keeps it.
    const subjectIsEarlier = subject.firstSeenAt.getTime() < match.firstSeenAt.getTime();
    const canonicalItemId = subjectIsEarlier ? subject.itemId : match.itemId;
    const duplicateItemId = subjectIsEarlier ? match.itemId : subject.itemId;

    await this.store.markItemDuplicate(duplicateItemId, canonicalItemId);
    this.log.info({ kind, canonicalItemId, duplicateItemId, similarity }, "duplicate linked");

    return { duplicate: true, kind, canonicalItemId, duplicateItemId, similarity };
  }
}
