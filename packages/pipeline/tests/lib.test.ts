import { describe, expect, it } from "vitest";

import { mapSettled } from "../src/lib/async.js";
import { canonicalHash, normalizeText } from "../src/lib/canonical-hash.js";
import { cosineSimilarity, isEmptyVector } from "../src/lib/vector.js";
import { computeBackoffMs } from "../src/storage/backoff.js";
import { lockIdFor, windowKey, windowLockId } from "../src/storage/window-lock.js";

describe("canonical hash", () => {
  it("normalizes case, whitespace and links", () => {
    expect(normalizeText("  Hello \n\t WORLD https://example.com/a?b=1 ")).toBe("hello world");
  });

  it("is stable across formatting and differs across content", () => {
    expect(canonicalHash("Rates cut by 25bp")).toBe(canonicalHash("rates   CUT by 25bp "));
    expect(canonicalHash("Rates cut by 25bp")).not.toBe(canonicalHash("Rates cut by 50bp"));
    expect(canonicalHash("x")).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe("backoff", () => {
  it("doubles from the base and caps at the max", () => {
    expect([1, 2, 3, 4, 5].map((n) => computeBackoffMs(n, 1000, 8000))).toEqual([1000, 2000, 4000, 8000, 8000]);
    expect(computeBackoffMs(0, 1000, 8000)).toBe(1000);
  });
});

describe("window lock ids", () => {
  it("hashes keys like a Java string hash", () => {
    expect(lockIdFor("")).toBe(0);
    expect(lockIdFor("a")).toBe(97);
    expect(lockIdFor("ab")).toBe(97 * 31 + 98);
  });

  it("derives a stable id from the window bounds", () => {
    const window = { start: new Date("2026-03-01T00:00:00Z"), end: new Date("2026-03-01T01:00:00Z") };

    expect(windowKey(window)).toBe("2026-03-01T00:00:00.000Z/2026-03-01T01:00:00.000Z");
    expect(windowLockId(window)).toBe(lockIdFor(`digest:${windowKey(window)}`));
    expect(Number.isInteger(windowLockId(window))).toBe(true);
  });
});

describe("vectors", () => {
  it("computes cosine similarity", () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [0.8, 0.6])).toBeCloseTo(0.8, 10);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });

  it("treats empty and all-zero vectors as empty", () => {
    expect(isEmptyVector([])).toBe(true);
    expect(isEmptyVector([0, 0])).toBe(true);
    expect(isEmptyVector([0, 0.1])).toBe(false);
  });
});

describe("mapSettled", () => {
  it("keeps input order, bounds concurrency and settles every input", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapSettled([1, 2, 3, 4, 5], 2, async (n) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5 * (6 - n)));
      inFlight--;
      if (n === 3) throw new Error("three");
      return n * 10;
    });

    expect(peak).toBe(2);
    expect(results.map((r) => (r.status === "fulfilled" ? r.value : "rejected"))).toEqual([
      10,
      20,
      "rejected",
      40,
      50,
    ]);
  });
});
