import { createHash } from "node:crypto";
import { z } from "zod";

import { EMBEDDING_DIMENSIONS } from "@digest/shared";
import { EmbeddingError } from "../lib/errors.js";
import { normalizeText } from "../lib/canonical-hash.js";

export interface EmbeddingProvider {
  readonly dimensions: number;
  embed(text: string, opts?: { signal?: AbortSignal }): Promise<number[]>;
}

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().int() })).min(1),
});

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions = EMBEDDING_DIMENSIONS;
  private readonly fetchFn: FetchLike;

  constructor(
    private readonly opts: {
      apiKey?: string;
      model: string;
      timeoutMs: number;
      baseUrl?: string;
      fetch?: FetchLike;
    }
  ) {
    if (!opts.apiKey) throw new Error("OPENAI_API_KEY is required for the openai embedding provider");
    this.fetchFn = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  async embed(text: string, opts: { signal?: AbortSignal } = {}): Promise<number[]> {
    const timeout = AbortSignal.timeout(this.opts.timeoutMs);
    const signal = opts.signal ? AbortSignal.any([opts.signal, timeout]) : timeout;
    const url = `${this.opts.baseUrl ?? "https://api.openai.com/v1"}/embeddings`;

    let res: Response;
    try {
      res = await this.fetchFn(url, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.opts.apiKey ?? ""}`,
        },
        body: JSON.stringify({ model: this.opts.model, input: text, dimensions: this.dimensions }),
        signal,
      });
    } catch (err) {
      if (opts.signal?.aborted) throw opts.signal.reason;
      throw new EmbeddingError(`embedding request failed: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }

    if (!res.ok) {
      const body = await res.text();
      throw new EmbeddingError(`embedding request returned ${res.status}: ${body.slice(0, 200)}`);
    }

    const parsed = embeddingResponseSchema.safeParse(await res.json());
    if (!parsed.success) throw new EmbeddingError("embedding response failed validation", { cause: parsed.error });

    const vector = parsed.data.data[0].embedding;
    if (vector.length !== this.dimensions) {
      throw new EmbeddingError(`expected ${this.dimensions} dimensions, got ${vector.length}`);
    }
    return vector;
  }
}

/**
 * Local embedder for development: hashes tokens into buckets and
 * L2-normalizes. Identical normalized text yields identical vectors; blank
 * text yields the zero vector.
 */
export class DeterministicEmbeddingProvider implements EmbeddingProvider {
  constructor(readonly dimensions: number = EMBEDDING_DIMENSIONS) {}

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = normalizeText(text).split(" ").filter(Boolean);

    for (const token of tokens) {
      const digest = createHash("sha256").update(token).digest();
      const bucket = digest.readUInt32BE(0) % this.dimensions;
      const sign = (digest[4] & 1) === 0 ? 1 : -1;
      vector[bucket] += sign;
    }

    const norm = Math.sqrt(vector.reduce((acc, x) => acc + x * x, 0));
    return norm === 0 ? vector : vector.map((x) => x / norm);
  }
}

export function createEmbeddingProvider(config: {
  provider: "openai" | "deterministic";
  apiKey?: string;
  model: string;
  timeoutMs: number;
}): EmbeddingProvider {
  if (config.provider === "deterministic") return new DeterministicEmbeddingProvider();
  return new OpenAiEmbeddingProvider(config);
}
