import { DEFAULTS, type DigestWindow } from "@digest/shared";

import { createLogger, type Logger } from "../lib/logger.js";
import { cosineSimilarity } from "../lib/vector.js";
import type { StorageGateway } from "../storage/gateway.js";
import type { ClusterCandidate, ClusterDraft } from "../storage/types.js";

export type ClusteringOptions = {
  similarity: number;
  maxClusterSize: number;
  /** Also require agreeing topics for two items to link. */
  requireTopicMatch: boolean;
};

const TOPIC_JACCARD_MIN = 0.8;

function topicTokens(topic: string): Set<string> {
  return new Set(
    topic
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter(Boolean)
  );
}

/** Equal normalized topics, or token sets with Jaccard >= 0.8. A missing topic never blocks a link. */
export function topicsAgree(a: string | null, b: string | null): boolean {
  if (!a || !b) return true;
  const ta = topicTokens(a);
  const tb = topicTokens(b);
  if (ta.size === 0 || tb.size === 0) return true;

  let shared = 0;
  for (const t of ta) if (tb.has(t)) shared++;
  const union = ta.size + tb.size - shared;
  return shared / union >= TOPIC_JACCARD_MIN;
}

/** Importance desc, then first seen asc, then id. */
export function compareByImportance(
  a: { importanceScore: number; firstSeenAt: Date; itemId: string },
  b: { importanceScore: number; firstSeenAt: Date; itemId: string }
): number {
  if (a.importanceScore !== b.importanceScore) return b.importanceScore - a.importanceScore;
  const dt = a.firstSeenAt.getTime() - b.firstSeenAt.getTime();
  if (dt !== 0) return dt;
  return a.itemId < b.itemId ? -1 : a.itemId > b.itemId ? 1 : 0;
}

class DisjointSet {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) root = this.parent[root];
    while (this.parent[i] !== root) {
      const next = this.parent[i];
      this.parent[i] = root;
      i = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    if (ra < rb) this.parent[rb] = ra;
    else this.parent[ra] = rb;
  }
}

/**
 * Single-link clustering: connected components of the graph whose edges
 * join items with cosine similarity >= the threshold. Membership does not
 * depend on input order. Components above the size cap are split in
 * importance order; every item lands in exactly one cluster.
 */
export function clusterItems(candidates: readonly ClusterCandidate[], opts: ClusteringOptions): ClusterDraft[] {
  const sorted = [...candidates].sort(compareByImportance);
  const sets = new DisjointSet(sorted.length);

  for (let i = 0; i < sorted.length; i++) {
    for (let j = i + 1; j < sorted.length; j++) {
      if (cosineSimilarity(sorted[i].embedding, sorted[j].embedding) < opts.similarity) continue;
      if (opts.requireTopicMatch && !topicsAgree(sorted[i].topic, sorted[j].topic)) continue;
      sets.union(i, j);
    }
  }

  // Roots are the smallest index, so components come out in importance order.
  const components = new Map<number, ClusterCandidate[]>();
  sorted.forEach((item, i) => {
    const root = sets.find(i);
    const members = components.get(root) ?? [];
    members.push(item);
    components.set(root, members);
  });

  const maxSize = Math.max(1, opts.maxClusterSize);
  const drafts: ClusterDraft[] = [];
  for (const members of components.values()) {
    for (let start = 0; start < members.length; start += maxSize) {
      const chunk = members.slice(start, start + maxSize);
      const labelled = chunk.find((m) => m.topic);
      drafts.push({ topic: labelled?.topic ?? null, itemIds: chunk.map((m) => m.itemId) });
    }
  }
  return drafts;
}

export type ClusteringEngineOptions = ClusteringOptions & {
  importanceThreshold: number;
  candidateLimit: number;
  logger?: Logger;
};

export type ClusteringReport = {
  candidates: number;
  clusterIds: string[];
};

/** Rebuilds the clusters of one window from its ready items. */
export class ClusteringEngine {
  private readonly opts: Omit<ClusteringEngineOptions, "logger">;
  private readonly log: Logger;

  constructor(
    private readonly store: StorageGateway,
    opts: Partial<ClusteringEngineOptions> = {}
  ) {
    this.opts = {
      similarity: opts.similarity ?? DEFAULTS.clusterSimilarity,
      maxClusterSize: opts.maxClusterSize ?? DEFAULTS.clusterMaxSize,
      requireTopicMatch: opts.requireTopicMatch ?? false,
      importanceThreshold: opts.importanceThreshold ?? DEFAULTS.importanceThreshold,
      candidateLimit: opts.candidateLimit ?? DEFAULTS.digestTopN * DEFAULTS.digestCandidateMultiplier,
    };
    this.log = opts.logger ?? createLogger("clustering");
  }

  async run(window: DigestWindow): Promise<ClusteringReport> {
    const candidates = await this.store.getClusterCandidates(
      window,
      this.opts.importanceThreshold,
      this.opts.candidateLimit
    );
    const drafts = clusterItems(candidates, this.opts);
    const clusterIds = await this.store.replaceClustersForWindow(window, drafts);

    this.log.info(
      { window: { start: window.start, end: window.end }, candidates: candidates.length, clusters: clusterIds.length },
      "clusters rebuilt"
    );
    return { candidates: candidates.length, clusterIds };
  }
}
