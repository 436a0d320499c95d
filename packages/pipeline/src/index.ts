export { createApp, type AppDeps, type AppType } from "./app.js";
export {
  createDigestServices,
  createProviders,
  createStorageGateway,
  createWorkerPool,
} from "./container.js";
export { createDatabase, schema, type Db } from "./db/index.js";
export { loadConfig, type PipelineConfig } from "./lib/config.js";
export {
  EmbeddingError,
  EnrichmentError,
  NotFoundError,
  StorageError,
  TransportError,
} from "./lib/errors.js";
export { logger, createLogger } from "./lib/logger.js";
export { StorageGateway, type StorageGatewayOptions } from "./storage/gateway.js";
export { SimilarityIndex } from "./storage/similarity-index.js";
export { SummaryCache, type SummaryCacheEntry } from "./storage/summary-cache.js";
export type * from "./storage/types.js";
export { EnrichmentWorkerPool, type BatchReport } from "./pipeline/worker-pool.js";
export { MessageProcessor, type ProcessOutcome } from "./pipeline/processor.js";
export { DeduplicationEngine, type DedupOutcome } from "./pipeline/dedup.js";
export { createMessageFilter, type MessageFilter } from "./pipeline/filters.js";
export { ClusteringEngine, clusterItems } from "./digest/clustering.js";
export { DigestAssembler, type DigestRunResult } from "./digest/assembler.js";
export { LogTransport, WebhookTransport, createTransport, type DigestTransport } from "./transport/index.js";
export { AnthropicEnrichmentProvider, type EnrichmentProvider } from "./ai/enrichment.js";
export {
  DeterministicEmbeddingProvider,
  OpenAiEmbeddingProvider,
  type EmbeddingProvider,
} from "./ai/embeddings.js";
