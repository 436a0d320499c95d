import { DEFAULTS } from "@digest/shared";

import { mapSettled, sleep } from "../lib/async.js";
import { isAbortError } from "../lib/errors.js";
import { createLogger, type Logger } from "../lib/logger.js";
import type { StorageGateway } from "../storage/gateway.js";
import type { Claim } from "../storage/types.js";
import { isTerminal, type MessageProcessor, type ProcessOutcome } from "./processor.js";

export type WorkerPoolOptions = {
  workers: number;
  batchSize: number;
  concurrency: number;
  idleBackoffMs: number;
  staleClaimAfterMs: number;
  recoveryIntervalMs: number;
  logger?: Logger;
};

export type BatchReport = {
  claimed: number;
  ready: number;
  filtered: number;
  retried: number;
  failed: number;
  /** Claims handed back without an outcome (cancellation or unexpected errors). */
  released: number;
  errors: number;
};

type HandleResult = ProcessOutcome | { status: "released" };

function emptyReport(claimed: number): BatchReport {
  return { claimed, ready: 0, filtered: 0, retried: 0, failed: 0, released: 0, errors: 0 };
}

/**
 * N cooperating loops that claim raw messages and run them through the
 * processor. Claims are either marked processed or released on every path.
 */
export class EnrichmentWorkerPool {
  private readonly opts: Omit<WorkerPoolOptions, "logger">;
  private readonly log: Logger;
  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];
  private recoveryTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly store: StorageGateway,
    private readonly processor: MessageProcessor,
    opts: Partial<WorkerPoolOptions> = {}
  ) {
    this.opts = {
      workers: opts.workers ?? DEFAULTS.workerCount,
      batchSize: opts.batchSize ?? DEFAULTS.workerBatchSize,
      concurrency: opts.concurrency ?? DEFAULTS.workerConcurrency,
      idleBackoffMs: opts.idleBackoffMs ?? DEFAULTS.workerIdleBackoffMs,
      staleClaimAfterMs: opts.staleClaimAfterMs ?? DEFAULTS.staleClaimAfterMs,
      recoveryIntervalMs: opts.recoveryIntervalMs ?? DEFAULTS.recoveryIntervalMs,
    };
    this.log = opts.logger ?? createLogger("worker-pool");
  }

  get running(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;

    this.loops = Array.from({ length: this.opts.workers }, (_, workerId) => this.loop(workerId, controller.signal));
    this.recoveryTimer = setInterval(() => {
      this.recover().catch((err: unknown) => this.log.error({ err }, "stuck claim recovery failed"));
    }, this.opts.recoveryIntervalMs);

    this.log.info({ workers: this.opts.workers, batchSize: this.opts.batchSize }, "worker pool started");
  }

  /** Cancels in-flight work and waits for every loop to hand back its claims. */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;

    controller.abort();
    if (this.recoveryTimer) clearInterval(this.recoveryTimer);
    this.recoveryTimer = null;

    await Promise.all(this.loops);
    this.loops = [];
    this.controller = null;
    this.log.info("worker pool stopped");
  }

  async recover(): Promise<number> {
    const count = await this.store.recoverStuckClaims(this.opts.staleClaimAfterMs);
    if (count > 0) this.log.warn({ count }, "recovered stuck claims");
    return count;
  }

  /** Claims one batch and processes it with bounded fan-out. */
  async runOnce(signal?: AbortSignal): Promise<BatchReport> {
    const claims = await this.store.claimPendingBatch(this.opts.batchSize);
    const report = emptyReport(claims.length);
    if (claims.length === 0) return report;

    const results = await mapSettled(claims, this.opts.concurrency, (claim) => this.handle(claim, signal));

    results.forEach((res, i) => {
      if (res.status === "rejected") {
        report.errors++;
        if (!isAbortError(res.reason)) {
          this.log.error({ err: res.reason, rawMessageId: claims[i].rawMessageId }, "message processing failed");
        }
        return;
      }
      switch (res.value.status) {
        case "ready":
          report.ready++;
          break;
        case "filtered":
          report.filtered++;
          break;
        case "retry":
          report.retried++;
          break;
        case "failed":
          report.failed++;
          break;
        case "released":
          report.released++;
          break;
      }
    });

    return report;
  }

  private async handle(claim: Claim, signal?: AbortSignal): Promise<HandleResult> {
    if (signal?.aborted) {
      await this.store.releaseClaim(claim.rawMessageId);
      return { status: "released" };
    }

    let outcome: ProcessOutcome;
    try {
      outcome = await this.processor.process(claim, signal);
    } catch (err) {
      await this.releaseAfterError(claim, err);
      throw err;
    }

    if (isTerminal(outcome)) await this.store.markProcessed(claim.rawMessageId);
    else await this.store.releaseClaim(claim.rawMessageId);
    return outcome;
  }

  private async releaseAfterError(claim: Claim, cause: unknown): Promise<void> {
    try {
      await this.store.releaseClaim(claim.rawMessageId);
    } catch (err) {
      // Left to stuck-claim recovery.
      this.log.error({ err, cause, rawMessageId: claim.rawMessageId }, "failed to release claim");
    }
  }

  private async loop(workerId: number, signal: AbortSignal): Promise<void> {
    const log = this.log.child({ workerId });

    while (!signal.aborted) {
      try {
        const report = await this.runOnce(signal);
        if (report.claimed === 0) await sleep(this.opts.idleBackoffMs, signal);
        else log.debug(report, "batch done");
      } catch (err) {
        if (signal.aborted) break;
        log.error({ err }, "worker tick failed");
        await sleep(this.opts.idleBackoffMs, signal);
      }
    }
  }
}
