import { DEFAULTS, type DigestEntryPayload, type DigestSource, type DigestWindow } from "@digest/shared";

import { TransportError, errorMessage } from "../lib/errors.js";
import { createLogger, type Logger } from "../lib/logger.js";
import type { StorageGateway } from "../storage/gateway.js";
import type { DigestCandidate, WindowCluster } from "../storage/types.js";
import { windowKey, windowLockId } from "../storage/window-lock.js";
import type { DigestTransport, PublishReceipt } from "../transport/types.js";
import { compareByImportance } from "./clustering.js";

export type DigestRunResult =
  | { status: "posted"; digestId: string; chatId: string; messageId: string; entries: number; items: number }
  | { status: "exists" }
  | { status: "locked" }
  | { status: "empty" }
  | { status: "failed"; kind: string; message: string };

export type DigestGroup = {
  topic: string | null;
  members: DigestCandidate[];
};

export type BuiltDigest = {
  entries: DigestEntryPayload[];
  /** Members and their duplicates, for every emitted entry. */
  itemIds: string[];
};

function groupKey(group: DigestGroup) {
  const lead = group.members[0];
  return { importanceScore: lead.importanceScore, firstSeenAt: lead.firstSeenAt, itemId: lead.itemId };
}

/**
 * Maps candidates onto the window's clusters. Candidates outside any
 * cluster, including those without an embedding, become single-item groups.
 * Groups are ordered by their strongest member; members by importance.
 */
export function groupCandidates(candidates: readonly DigestCandidate[], clusters: readonly WindowCluster[]): DigestGroup[] {
  const byId = new Map(candidates.map((c) => [c.itemId, c]));
  const assigned = new Set<string>();
  const groups: DigestGroup[] = [];

  for (const cluster of clusters) {
    const members: DigestCandidate[] = [];
    for (const id of cluster.itemIds) {
      const candidate = byId.get(id);
      if (!candidate || assigned.has(id)) continue;
      assigned.add(id);
      members.push(candidate);
    }
    if (members.length > 0) groups.push({ topic: cluster.topic, members });
  }

  for (const candidate of candidates) {
    if (assigned.has(candidate.itemId)) continue;
    groups.push({ topic: candidate.topic, members: [candidate] });
  }

  for (const group of groups) {
    group.members.sort(compareByImportance);
    group.topic ??= group.members.find((m) => m.topic)?.topic ?? null;
  }
  // A group's lead member carries its max importance and, on ties, its earliest first_seen_at.
  return groups.sort((a, b) => compareByImportance(groupKey(a), groupKey(b)));
}

export function buildDigest(groups: readonly DigestGroup[], topN: number): BuiltDigest {
  const entries: DigestEntryPayload[] = [];
  const itemIds: string[] = [];

  for (const group of groups) {
    if (entries.length >= topN) break;

    const lines = group.members.map((m) => m.summary?.trim()).filter((s): s is string => Boolean(s));
    if (lines.length === 0) continue;

    const sources: DigestSource[] = [];
    for (const member of group.members) {
      sources.push(member.source);
      itemIds.push(member.itemId);
      for (const dup of member.duplicates) {
        sources.push(dup.source);
        itemIds.push(dup.itemId);
      }
    }

    entries.push({ title: group.topic, body: lines.map((l) => `• ${l}`).join("\n"), sources });
  }

  return { entries, itemIds };
}

export type DigestAssemblerOptions = {
  importanceThreshold: number;
  topN: number;
  candidateMultiplier: number;
  logger?: Logger;
};

/**
 * Builds and publishes the digest of one window, at most once. Assembly is
 * serialized across instances by a lease on the window's lock id.
 */
export class DigestAssembler {
  private readonly opts: Omit<DigestAssemblerOptions, "logger">;
  private readonly log: Logger;

  constructor(
    private readonly store: StorageGateway,
    private readonly transport: DigestTransport,
    opts: Partial<DigestAssemblerOptions> = {}
  ) {
    this.opts = {
      importanceThreshold: opts.importanceThreshold ?? DEFAULTS.importanceThreshold,
      topN: opts.topN ?? DEFAULTS.digestTopN,
      candidateMultiplier: opts.candidateMultiplier ?? DEFAULTS.digestCandidateMultiplier,
    };
    this.log = opts.logger ?? createLogger("digest");
  }

  async assemble(window: DigestWindow, chatId: string, signal?: AbortSignal): Promise<DigestRunResult> {
    const log = this.log.child({ window: windowKey(window), chatId });
    const lockId = windowLockId(window);

    if (!(await this.store.tryAcquireLock(lockId))) {
      log.info("window locked by another instance");
      return { status: "locked" };
    }

    try {
      return await this.assembleLocked(window, chatId, log, signal);
    } finally {
      await this.store
        .releaseLock(lockId)
        .catch((err: unknown) => log.error({ err, lockId }, "failed to release window lock"));
    }
  }

  private async assembleLocked(
    window: DigestWindow,
    chatId: string,
    log: Logger,
    signal?: AbortSignal
  ): Promise<DigestRunResult> {
    if (await this.store.digestExists(window)) {
      log.info("digest already exists");
      return { status: "exists" };
    }

    const candidates = await this.store.getDigestCandidates(
      window,
      this.opts.importanceThreshold,
      this.opts.topN * this.opts.candidateMultiplier
    );
    if (candidates.length === 0) {
      log.info("no candidates in window");
      return { status: "empty" };
    }

    const clusters = await this.store.getClustersForWindow(window);
    const digest = buildDigest(groupCandidates(candidates, clusters), this.opts.topN);
    if (digest.entries.length === 0) return { status: "empty" };

    let receipt: PublishReceipt;
    try {
      receipt = await this.transport.publish(chatId, digest.entries, { signal });
    } catch (err) {
      if (signal?.aborted) throw err;
      const kind = err instanceof TransportError ? err.kind : "transient";
      const message = errorMessage(err);
      await this.store.saveDigestError(window, chatId, { kind, message });
      log.error({ err, kind }, "digest publish failed");
      return { status: "failed", kind, message };
    }

    const digestId = await this.store.recordPublishedDigest({
      window,
      chatId: receipt.chatId,
      messageId: receipt.messageId,
      entries: digest.entries,
      itemIds: digest.itemIds,
    });

    log.info(
      { digestId, messageId: receipt.messageId, entries: digest.entries.length, items: digest.itemIds.length },
      "digest posted"
    );
    return {
      status: "posted",
      digestId,
      chatId: receipt.chatId,
      messageId: receipt.messageId,
      entries: digest.entries.length,
      items: digest.itemIds.length,
    };
  }
}
