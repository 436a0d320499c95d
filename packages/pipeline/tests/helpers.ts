import { readFile } from "node:fs/promises";
import { PGlite } from "@electric-sql/pglite";
import { vector } from "@electric-sql/pglite/vector";
import { drizzle } from "drizzle-orm/pglite";
import { expect } from "vitest";

import { EMBEDDING_DIMENSIONS } from "@digest/shared";
import type { Db } from "../src/db/index.js";
import * as schema from "../src/db/schema/index.js";

export type TestDb = {
  client: PGlite;
  db: Db;
};

/** An in-memory Postgres with pgvector and the pipeline schema applied. */
export async function createTestDb(): Promise<TestDb> {
  const client = new PGlite({ extensions: { vector } });
  await client.exec(await readFile(new URL("./schema.sql", import.meta.url), "utf8"));
  const db: Db = drizzle(client, { schema });
  return { client, db };
}

export async function resetDb(client: PGlite) {
  await client.exec(`
    truncate table
      cluster_items,
      clusters,
      digest_entries,
      embeddings,
      items,
      digests,
      raw_message_drop_log,
      raw_messages,
      channels,
      summary_cache,
      scheduler_locks
    cascade
  `);
}

/** A mutable clock for code that takes `() => Date`. */
export function createTestClock(start: string) {
  let now = new Date(start).getTime();
  return {
    clock: () => new Date(now),
    set(iso: string) {
      now = new Date(iso).getTime();
    },
    advance(ms: number) {
      now += ms;
    },
  };
}

/** Zero-padded to the embedding column's dimension. */
export function vec(...head: number[]): number[] {
  const v = new Array<number>(EMBEDDING_DIMENSIONS).fill(0);
  head.forEach((x, i) => {
    v[i] = x;
  });
  return v;
}

/** Unit vector in the first plane at `degrees` from the first axis. */
export function angled(degrees: number): number[] {
  const rad = (degrees * Math.PI) / 180;
  return vec(Math.cos(rad), Math.sin(rad));
}

type RequestTarget = { request: (path: string, init?: RequestInit) => Response | Promise<Response> };

export async function authedRequest(
  app: RequestTarget,
  opts: { method: "GET" | "POST" | "PATCH" | "PUT" | "DELETE"; path: string; token: string; json?: unknown }
) {
  const headers: Record<string, string> = {
    authorization: `Bearer ${opts.token}`,
  };
  let body: string | undefined;
  if (opts.json !== undefined) {
    headers["content-type"] = "application/json";
    body = JSON.stringify(opts.json);
  }

  return app.request(opts.path, { method: opts.method, headers, body });
}

export async function expectError(res: Response, opts: { status: number; code?: string }) {
  expect(res.ok).toBe(false);
  expect(res.status).toBe(opts.status);
  const json: unknown = await res.json();
  expect(json).toHaveProperty("error");
  if (opts.code) expect(json).toMatchObject({ error: { code: opts.code } });
  return json;
}
