import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";

import { canonicalHash } from "../src/lib/canonical-hash.js";
import { DeduplicationEngine } from "../src/pipeline/dedup.js";
import { StorageGateway } from "../src/storage/gateway.js";
import { SimilarityIndex } from "../src/storage/similarity-index.js";
import { createTestChannel, createTestItem, getItem } from "./factories.js";
import { angled, createTestClock, createTestDb, resetDb, vec, type TestDb } from "./helpers.js";

const T0 = "2026-03-04T09:00:00.000Z";
const MINUTE = 60_000;

describe("deduplication", () => {
  let t: TestDb;
  const time = createTestClock(T0);
  let store: StorageGateway;
  let engine: DeduplicationEngine;

  beforeAll(async () => {
    t = await createTestDb();
  });

  afterAll(async () => {
    await t.client.close();
  });

  beforeEach(async () => {
    await resetDb(t.client);
    time.set(T0);
    store = new StorageGateway(t.db, { clock: time.clock });
    engine = new DeduplicationEngine(store, new SimilarityIndex(store), {
      globalSimilarity: 0.95,
      globalWindowMs: 24 * 60 * MINUTE,
      intraSimilarity: 0.75,
      intraWindowMs: 60 * MINUTE,
      clock: time.clock,
    });
  });

  function at(minutes: number) {
    return new Date(new Date(T0).getTime() + minutes * MINUTE);
  }

  async function subjectFor(opts: {
    channelId: string;
    firstSeenAt: Date;
    text: string;
    vector: number[] | null;
  }) {
    const { itemId, rawMessageId } = await createTestItem(store, {
      channelId: opts.channelId,
      firstSeenAt: opts.firstSeenAt,
      text: opts.text,
      vector: opts.vector ?? undefined,
    });
    return {
      itemId,
      rawMessageId,
      channelId: opts.channelId,
      canonicalHash: canonicalHash(opts.text),
      firstSeenAt: opts.firstSeenAt,
      vector: opts.vector,
    };
  }

  it("links a verbatim repost to the earlier item across channels", async () => {
    const a = await createTestChannel(store);
    const b = await createTestChannel(store);
    const original = await subjectFor({ channelId: a, firstSeenAt: at(0), text: "Storm warning for the coast", vector: null });
    const repost = await subjectFor({ channelId: b, firstSeenAt: at(10), text: "STORM warning for the coast", vector: null });

    const outcome = await engine.check(repost);

    expect(outcome).toEqual({
      duplicate: true,
      kind: "strict",
      canonicalItemId: original.itemId,
      duplicateItemId: repost.itemId,
      similarity: undefined,
    });
    expect((await getItem(t.db, repost.itemId)).duplicateOfItemId).toBe(original.itemId);
  });

  it("makes a backfilled earlier item canonical", async () => {
    const channelId = await createTestChannel(store);
    const later = await subjectFor({ channelId, firstSeenAt: at(30), text: "Bridge reopens", vector: null });
    const earlier = await subjectFor({ channelId, firstSeenAt: at(5), text: "bridge reopens", vector: null });

    const outcome = await engine.check(earlier);

    expect(outcome).toMatchObject({ duplicate: true, canonicalItemId: earlier.itemId, duplicateItemId: later.itemId });
    expect((await getItem(t.db, later.itemId)).duplicateOfItemId).toBe(earlier.itemId);
    expect((await getItem(t.db, earlier.itemId)).duplicateOfItemId).toBeNull();
  });

  it("keeps the existing item canonical on a first-seen tie", async () => {
    const channelId = await createTestChannel(store);
    const existing = await subjectFor({ channelId, firstSeenAt: at(0), text: "Tie", vector: vec(1) });
    const incoming = await subjectFor({ channelId, firstSeenAt: at(0), text: "Tie!", vector: vec(1) });

    const outcome = await engine.check(incoming);

    expect(outcome).toMatchObject({ duplicate: true, canonicalItemId: existing.itemId, duplicateItemId: incoming.itemId });
  });

  it("links near-identical embeddings across channels", async () => {
    const a = await createTestChannel(store);
    const b = await createTestChannel(store);
    const first = await subjectFor({ channelId: a, firstSeenAt: at(0), text: "Quake hits the north", vector: vec(1) });
    const second = await subjectFor({
      channelId: b,
      firstSeenAt: at(3),
      text: "Earthquake strikes northern region",
      vector: angled(10),
    });

    const outcome = await engine.check(second);

    expect(outcome).toMatchObject({
      duplicate: true,
      kind: "global",
      canonicalItemId: first.itemId,
      duplicateItemId: second.itemId,
    });
    if (outcome.duplicate) expect(outcome.similarity).toBeCloseTo(Math.cos((10 * Math.PI) / 180), 5);
  });

  it("uses the looser in-channel threshold only within a channel", async () => {
    const a = await createTestChannel(store);
    const b = await createTestChannel(store);
    const first = await subjectFor({ channelId: a, firstSeenAt: at(0), text: "Vote count begins", vector: vec(1) });

    const elsewhere = await subjectFor({ channelId: b, firstSeenAt: at(2), text: "Counting has started", vector: angled(30) });
    expect(await engine.check(elsewhere)).toEqual({ duplicate: false });

    const sameChannel = await subjectFor({ channelId: a, firstSeenAt: at(4), text: "Counting is underway", vector: angled(-30) });
    expect(await engine.check(sameChannel)).toMatchObject({
      duplicate: true,
      kind: "channel",
      canonicalItemId: first.itemId,
    });
  });

  it("ignores embeddings older than the window", async () => {
    const channelId = await createTestChannel(store);
    await subjectFor({ channelId, firstSeenAt: at(0), text: "Old story", vector: vec(1) });

    time.advance(60 * MINUTE);
    const fresh = await subjectFor({ channelId, firstSeenAt: at(60), text: "Old story retold", vector: angled(30) });

    expect(await engine.check(fresh)).toEqual({ duplicate: false });
  });

  it("stops at a verbatim repost that already points back at the subject", async () => {
    const a = await createTestChannel(store);
    const b = await createTestChannel(store);
    const subject = await subjectFor({ channelId: a, firstSeenAt: at(0), text: "Ferry service suspended", vector: vec(1) });
    const repost = await subjectFor({ channelId: b, firstSeenAt: at(5), text: "Ferry service suspended", vector: null });
    const similar = await subjectFor({ channelId: b, firstSeenAt: at(3), text: "Ferries halted today", vector: angled(10) });
    await engine.check(repost);

    expect(await engine.check(subject)).toEqual({ duplicate: false });
    expect((await getItem(t.db, similar.itemId)).duplicateOfItemId).toBeNull();
    expect((await getItem(t.db, subject.itemId)).duplicateOfItemId).toBeNull();
  });

  it("skips the semantic checks without a usable vector", async () => {
    const channelId = await createTestChannel(store);
    await subjectFor({ channelId, firstSeenAt: at(0), text: "Anything", vector: vec(1) });

    const noVector = await subjectFor({ channelId, firstSeenAt: at(1), text: "Something else", vector: null });
    expect(await engine.check(noVector)).toEqual({ duplicate: false });
    expect(await engine.check({ ...noVector, vector: vec() })).toEqual({ duplicate: false });
    expect(await engine.check({ ...noVector, vector: [] })).toEqual({ duplicate: false });
  });
});
