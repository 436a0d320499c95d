import { and, eq } from "drizzle-orm";

import type { Db } from "../db/index.js";
import { summaryCache } from "../db/schema/index.js";
import { NotFoundError, StorageError } from "../lib/errors.js";
import type { Clock } from "./types.js";

export type SummaryCacheEntry = {
  canonicalHash: string;
  digestLanguage: string;
  summary: string;
  topic: string;
  language: string;
  relevanceScore: number;
  importanceScore: number;
};

/** Enrichment outputs keyed by (canonical hash, digest language). */
export class SummaryCache {
  private readonly clock: Clock;

  constructor(
    private readonly db: Db,
    opts: { clock?: Clock } = {}
  ) {
    this.clock = opts.clock ?? (() => new Date());
  }

  /** @throws NotFoundError when nothing is cached for the key. */
  async get(canonicalHash: string, digestLanguage: string): Promise<SummaryCacheEntry> {
    let rows: SummaryCacheEntry[];
    try {
      rows = await this.db
        .select({
          canonicalHash: summaryCache.canonicalHash,
          digestLanguage: summaryCache.digestLanguage,
          summary: summaryCache.summary,
          topic: summaryCache.topic,
          language: summaryCache.language,
          relevanceScore: summaryCache.relevanceScore,
          importanceScore: summaryCache.importanceScore,
        })
        .from(summaryCache)
        .where(and(eq(summaryCache.canonicalHash, canonicalHash), eq(summaryCache.digestLanguage, digestLanguage)))
        .limit(1);
    } catch (err) {
      throw new StorageError("summaryCache.get", err);
    }

    if (rows.length === 0) throw new NotFoundError(`summary cache entry ${canonicalHash}/${digestLanguage}`);
    return rows[0];
  }

  /** Returns the cached entry, or null on a miss. */
  async find(canonicalHash: string, digestLanguage: string): Promise<SummaryCacheEntry | null> {
    try {
      return await this.get(canonicalHash, digestLanguage);
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }
  }

  async upsert(entry: SummaryCacheEntry): Promise<void> {
    const { canonicalHash, digestLanguage, ...outputs } = entry;
    const values = { ...outputs, updatedAt: this.clock() };
    try {
      await this.db
        .insert(summaryCache)
        .values({ canonicalHash, digestLanguage, ...values })
        .onConflictDoUpdate({ target: [summaryCache.canonicalHash, summaryCache.digestLanguage], set: values });
    } catch (err) {
      throw new StorageError("summaryCache.upsert", err);
    }
  }
}
