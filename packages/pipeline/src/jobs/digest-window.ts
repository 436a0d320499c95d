import type { Job } from "bullmq";
import type { DigestWindow } from "@digest/shared";

import type { ClusteringEngine } from "../digest/clustering.js";
import type { DigestAssembler, DigestRunResult } from "../digest/assembler.js";
import { createJobLogger } from "../lib/logger.js";
import type { DigestWindowJob } from "./queue.js";

export function parseDigestWindowJob(data: DigestWindowJob): DigestWindow {
  const start = new Date(data.windowStart);
  const end = new Date(data.windowEnd);
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime()) || start >= end) {
    throw new Error(`invalid digest window ${data.windowStart}/${data.windowEnd}`);
  }
  return { start, end };
}

/** Rebuilds a window's clusters, then assembles its digest. */
export function createDigestWindowProcessor(deps: { clustering: ClusteringEngine; assembler: DigestAssembler }) {
  return async function digestWindowProcessor(job: Job<DigestWindowJob>): Promise<DigestRunResult> {
    const log = createJobLogger(job);
    const window = parseDigestWindowJob(job.data);

    const clusters = await deps.clustering.run(window);
    const result = await deps.assembler.assemble(window, job.data.chatId);
    // A failed publish is retried by a later enqueue once the retry grace has passed.
    const level = result.status === "failed" ? "warn" : "info";
    log[level]({ clusters: clusters.clusterIds.length, result: result.status }, "digest window processed");
    return result;
  };
}
