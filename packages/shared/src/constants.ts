export const ITEM_STATUSES = ["ready", "error", "retry", "digested"] as const;
export type ItemStatus = (typeof ITEM_STATUSES)[number];

export const DIGEST_STATUSES = ["posted", "error"] as const;
export type DigestStatus = (typeof DIGEST_STATUSES)[number];

export const ENRICHMENT_ERROR_KINDS = ["transient", "permanent", "rate_limited"] as const;
export type EnrichmentErrorKind = (typeof ENRICHMENT_ERROR_KINDS)[number];

export const TRANSPORT_ERROR_KINDS = ["transient", "permanent"] as const;
export type TransportErrorKind = (typeof TRANSPORT_ERROR_KINDS)[number];

export const DROP_REASONS = [
  "filter_min_length",
  "filter_forward",
  "filter_ads",
  "filter_deny",
  "filter_allow_miss",
] as const;
export type DropReason = (typeof DROP_REASONS)[number];

export const FILTER_MODES = ["mixed", "allowlist", "denylist"] as const;
export type FilterMode = (typeof FILTER_MODES)[number];

export const FILTER_ACTIONS = ["drop", "score_zero"] as const;
export type FilterAction = (typeof FILTER_ACTIONS)[number];

export const DUPLICATE_KINDS = ["strict", "global", "channel"] as const;
export type DuplicateKind = (typeof DUPLICATE_KINDS)[number];

/** Dimension of the `embeddings.embedding` column. Providers must match it. */
export const EMBEDDING_DIMENSIONS = 1536;

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export const DEFAULTS = {
  globalSimilarity: 0.92,
  globalWindowMs: 7 * DAY_MS,
  intraSimilarity: 0.88,
  intraWindowMs: DAY_MS,
  clusterSimilarity: 0.82,
  clusterMaxSize: 10,
  maxRetries: 5,
  baseBackoffMs: MINUTE_MS,
  maxBackoffMs: HOUR_MS,
  staleClaimAfterMs: 10 * MINUTE_MS,
  recoveryIntervalMs: MINUTE_MS,
  digestRetryGraceMs: HOUR_MS,
  lockTtlMs: 10 * MINUTE_MS,
  importanceThreshold: 0.3,
  minRelevanceForEmbedding: 0.1,
  digestTopN: 20,
  digestCandidateMultiplier: 5,
  workerCount: 2,
  workerBatchSize: 10,
  workerConcurrency: 4,
  workerIdleBackoffMs: 10_000,
  filterMinLength: 20,
} as const;

/** Channel importance weights are clamped into this range before scaling. */
export const IMPORTANCE_WEIGHT_MIN = 0.1;
export const IMPORTANCE_WEIGHT_MAX = 2.0;
