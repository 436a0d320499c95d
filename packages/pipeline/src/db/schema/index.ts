// src/db/schema/index.ts

export * from "./enums.js";
export * from "./channels.js";
export * from "./raw-messages.js";
export * from "./items.js";
export * from "./embeddings.js";
export * from "./clusters.js";
export * from "./digests.js";
export * from "./summary-cache.js";
export * from "./drop-log.js";
export * from "./scheduler-locks.js";
export * from "./relations.js";
