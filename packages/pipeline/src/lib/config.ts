import { z } from "zod";
import { DEFAULTS, FILTER_ACTIONS, FILTER_MODES } from "@digest/shared";

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const csv = z
  .string()
  .default("")
  .transform((v) =>
    v
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean)
  );

const ratio = z.coerce.number().min(0).max(1);
const ms = z.coerce.number().int().positive();
const count = z.coerce.number().int().positive();

const envSchema = z.object({
  // Infrastructure
  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
  DATABASE_POOL_SIZE: count.default(10),
  REDIS_URL: z.string().url().optional(),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  OPERATOR_API_TOKEN: z.string().min(1).optional(),

  // Providers
  ANTHROPIC_API_KEY: z.string().optional(),
  ENRICHMENT_MODEL: z.string().default("claude-3-5-haiku-latest"),
  ENRICHMENT_TIMEOUT_MS: ms.default(60_000),
  EMBEDDING_PROVIDER: z.enum(["openai", "deterministic"]).default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_TIMEOUT_MS: ms.default(30_000),
  DIGEST_WEBHOOK_URL: z.string().url().optional(),
  DIGEST_LANGUAGE: z.string().min(2).default("en"),

  // Worker pool
  WORKER_COUNT: count.default(DEFAULTS.workerCount),
  WORKER_BATCH_SIZE: count.default(DEFAULTS.workerBatchSize),
  WORKER_CONCURRENCY: count.default(DEFAULTS.workerConcurrency),
  WORKER_IDLE_BACKOFF_MS: ms.default(DEFAULTS.workerIdleBackoffMs),
  MAX_RETRIES: count.default(DEFAULTS.maxRetries),
  BASE_BACKOFF_MS: ms.default(DEFAULTS.baseBackoffMs),
  MAX_BACKOFF_MS: ms.default(DEFAULTS.maxBackoffMs),
  STALE_CLAIM_AFTER_MS: ms.default(DEFAULTS.staleClaimAfterMs),
  RECOVERY_INTERVAL_MS: ms.default(DEFAULTS.recoveryIntervalMs),

  // Dedup and clustering
  GLOBAL_SIMILARITY: ratio.default(DEFAULTS.globalSimilarity),
  GLOBAL_WINDOW_MS: ms.default(DEFAULTS.globalWindowMs),
  INTRA_SIMILARITY: ratio.default(DEFAULTS.intraSimilarity),
  INTRA_WINDOW_MS: ms.default(DEFAULTS.intraWindowMs),
  CLUSTER_SIMILARITY: ratio.default(DEFAULTS.clusterSimilarity),
  CLUSTER_MAX_SIZE: count.default(DEFAULTS.clusterMaxSize),
  CLUSTER_REQUIRE_TOPIC_MATCH: flag.default("false"),
  MIN_RELEVANCE_FOR_EMBEDDING: ratio.default(DEFAULTS.minRelevanceForEmbedding),

  // Digest
  IMPORTANCE_THRESHOLD: ratio.default(DEFAULTS.importanceThreshold),
  DIGEST_TOP_N: count.default(DEFAULTS.digestTopN),
  DIGEST_CANDIDATE_MULTIPLIER: count.default(DEFAULTS.digestCandidateMultiplier),
  DIGEST_RETRY_GRACE_MS: ms.default(DEFAULTS.digestRetryGraceMs),
  LOCK_TTL_MS: ms.default(DEFAULTS.lockTtlMs),

  // Content filters
  FILTER_MIN_LENGTH: z.coerce.number().int().nonnegative().default(DEFAULTS.filterMinLength),
  FILTER_SKIP_FORWARDS: flag.default("false"),
  FILTER_ADS_KEYWORDS: csv,
  FILTER_DENY_PATTERNS: csv,
  FILTER_ALLOW_PATTERNS: csv,
  FILTER_MODE: z.enum(FILTER_MODES).default("mixed"),
  FILTER_ACTION: z.enum(FILTER_ACTIONS).default("drop"),
}).superRefine((env, ctx) => {
  // Cross-channel matching is the stricter check over the longer window.
  if (env.GLOBAL_SIMILARITY < env.INTRA_SIMILARITY) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["GLOBAL_SIMILARITY"],
      message: "GLOBAL_SIMILARITY must be at least INTRA_SIMILARITY",
    });
  }
  if (env.GLOBAL_WINDOW_MS < env.INTRA_WINDOW_MS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["GLOBAL_WINDOW_MS"],
      message: "GLOBAL_WINDOW_MS must be at least INTRA_WINDOW_MS",
    });
  }
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(env: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(env);
}

export function toPipelineConfig(env: Env) {
  return {
    database: { url: env.DATABASE_URL, poolSize: env.DATABASE_POOL_SIZE },
    redisUrl: env.REDIS_URL,
    port: env.PORT,
    operatorApiToken: env.OPERATOR_API_TOKEN,
    digestLanguage: env.DIGEST_LANGUAGE,
    enrichment: {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ENRICHMENT_MODEL,
      timeoutMs: env.ENRICHMENT_TIMEOUT_MS,
    },
    embedding: {
      provider: env.EMBEDDING_PROVIDER,
      apiKey: env.OPENAI_API_KEY,
      model: env.EMBEDDING_MODEL,
      timeoutMs: env.EMBEDDING_TIMEOUT_MS,
    },
    transport: { webhookUrl: env.DIGEST_WEBHOOK_URL },
    retry: {
      maxRetries: env.MAX_RETRIES,
      baseBackoffMs: env.BASE_BACKOFF_MS,
      maxBackoffMs: env.MAX_BACKOFF_MS,
    },
    worker: {
      workers: env.WORKER_COUNT,
      batchSize: env.WORKER_BATCH_SIZE,
      concurrency: env.WORKER_CONCURRENCY,
      idleBackoffMs: env.WORKER_IDLE_BACKOFF_MS,
      staleClaimAfterMs: env.STALE_CLAIM_AFTER_MS,
      recoveryIntervalMs: env.RECOVERY_INTERVAL_MS,
      minRelevanceForEmbedding: env.MIN_RELEVANCE_FOR_EMBEDDING,
    },
    dedup: {
      globalSimilarity: env.GLOBAL_SIMILARITY,
      globalWindowMs: env.GLOBAL_WINDOW_MS,
      intraSimilarity: env.INTRA_SIMILARITY,
      intraWindowMs: env.INTRA_WINDOW_MS,
    },
    clustering: {
      similarity: env.CLUSTER_SIMILARITY,
      maxClusterSize: env.CLUSTER_MAX_SIZE,
      requireTopicMatch: env.CLUSTER_REQUIRE_TOPIC_MATCH,
    },
    digest: {
      importanceThreshold: env.IMPORTANCE_THRESHOLD,
      topN: env.DIGEST_TOP_N,
      candidateMultiplier: env.DIGEST_CANDIDATE_MULTIPLIER,
      retryGraceMs: env.DIGEST_RETRY_GRACE_MS,
      lockTtlMs: env.LOCK_TTL_MS,
    },
    filters: {
      minLength: env.FILTER_MIN_LENGTH,
      skipForwards: env.FILTER_SKIP_FORWARDS,
      adsKeywords: env.FILTER_ADS_KEYWORDS,
      denyPatterns: env.FILTER_DENY_PATTERNS,
      allowPatterns: env.FILTER_ALLOW_PATTERNS,
      mode: env.FILTER_MODE,
      action: env.FILTER_ACTION,
    },
  };
}

export type PipelineConfig = ReturnType<typeof toPipelineConfig>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  return toPipelineConfig(loadEnv(env));
}
