import type { Db } from "./db/index.js";
import type { PipelineConfig } from "./lib/config.js";
import { createLogger } from "./lib/logger.js";
import { AnthropicEnrichmentProvider, type EnrichmentProvider } from "./ai/enrichment.js";
import { createEmbeddingProvider, type EmbeddingProvider } from "./ai/embeddings.js";
import { StorageGateway } from "./storage/gateway.js";
import { SimilarityIndex } from "./storage/similarity-index.js";
import { SummaryCache } from "./storage/summary-cache.js";
import type { Clock } from "./storage/types.js";
import { DeduplicationEngine } from "./pipeline/dedup.js";
import { createMessageFilter } from "./pipeline/filters.js";
import { MessageProcessor } from "./pipeline/processor.js";
import { EnrichmentWorkerPool } from "./pipeline/worker-pool.js";
import { ClusteringEngine } from "./digest/clustering.js";
import { DigestAssembler } from "./digest/assembler.js";
import { createTransport, type DigestTransport } from "./transport/index.js";

export function createStorageGateway(db: Db, config: PipelineConfig, clock?: Clock): StorageGateway {
  return new StorageGateway(db, {
    clock,
    maxRetries: config.retry.maxRetries,
    baseBackoffMs: config.retry.baseBackoffMs,
    maxBackoffMs: config.retry.maxBackoffMs,
    digestRetryGraceMs: config.digest.retryGraceMs,
    lockTtlMs: config.digest.lockTtlMs,
  });
}

export type DigestServices = {
  clustering: ClusteringEngine;
  assembler: DigestAssembler;
};

export function createDigestServices(
  store: StorageGateway,
  config: PipelineConfig,
  transport: DigestTransport = createTransport(config.transport)
): DigestServices {
  const candidateLimit = config.digest.topN * config.digest.candidateMultiplier;
  return {
    clustering: new ClusteringEngine(store, {
      similarity: config.clustering.similarity,
      maxClusterSize: config.clustering.maxClusterSize,
      requireTopicMatch: config.clustering.requireTopicMatch,
      importanceThreshold: config.digest.importanceThreshold,
      candidateLimit,
    }),
    assembler: new DigestAssembler(store, transport, {
      importanceThreshold: config.digest.importanceThreshold,
      topN: config.digest.topN,
      candidateMultiplier: config.digest.candidateMultiplier,
    }),
  };
}

export type EnrichmentProviders = {
  enrichment: EnrichmentProvider;
  embeddings: EmbeddingProvider;
};

export function createProviders(config: PipelineConfig): EnrichmentProviders {
  return {
    enrichment: new AnthropicEnrichmentProvider(config.enrichment),
    embeddings: createEmbeddingProvider(config.embedding),
  };
}

/** Wires the enrichment worker pool with everything it depends on. */
export function createWorkerPool(
  db: Db,
  store: StorageGateway,
  config: PipelineConfig,
  providers: EnrichmentProviders,
  clock?: Clock
): EnrichmentWorkerPool {
  const dedup = new DeduplicationEngine(store, new SimilarityIndex(store), { ...config.dedup, clock });
  const processor = new MessageProcessor(
    {
      store,
      cache: new SummaryCache(db, { clock }),
      enrichment: providers.enrichment,
      embeddings: providers.embeddings,
      dedup,
      filter: createMessageFilter(config.filters),
    },
    {
      digestLanguage: config.digestLanguage,
      filterAction: config.filters.action,
      minRelevanceForEmbedding: config.worker.minRelevanceForEmbedding,
    }
  );

  return new EnrichmentWorkerPool(store, processor, {
    ...config.worker,
    logger: createLogger("worker-pool"),
  });
}
