import { setTimeout as delay } from "node:timers/promises";

import { isAbortError } from "./errors.js";

/** Sleeps for `ms`, returning early (without throwing) when the signal aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!isAbortError(err)) throw err;
  }
}

/**
 * Runs `fn` over `inputs` with at most `limit` calls in flight. Every input is
 * attempted; results come back in input order as settled outcomes.
 */
export async function mapSettled<T, R>(
  inputs: readonly T[],
  limit: number,
  fn: (input: T) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(inputs.length);
  let next = 0;

  async function lane() {
    while (next < inputs.length) {
      const index = next++;
      const input = inputs[index];
      try {
        results[index] = { status: "fulfilled", value: await fn(input) };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  }

  const lanes = Array.from({ length: Math.max(1, Math.min(limit, inputs.length)) }, () => lane());
  await Promise.all(lanes);
  return results;
}
