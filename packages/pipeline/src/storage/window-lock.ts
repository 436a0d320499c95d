import type { DigestWindow } from "@digest/shared";

const HASH_MULTIPLIER = 31;

/** Stable 32-bit lock id for a string key (Java-style string hash). */
export function lockIdFor(key: string): number {
  let h = 0;
  for (let i = 0; i < key.length; i++) {
    h = (Math.imul(h, HASH_MULTIPLIER) + key.charCodeAt(i)) | 0;
  }
  return h;
}

export function windowKey(window: DigestWindow): string {
  return `${window.start.toISOString()}/${window.end.toISOString()}`;
}

export function windowLockId(window: DigestWindow): number {
  return lockIdFor(`digest:${windowKey(window)}`);
}
