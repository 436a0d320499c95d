import Anthropic from "@anthropic-ai/sdk";
import { describe, expect, it, vi } from "vitest";

import {
  createEmbeddingProvider,
  DeterministicEmbeddingProvider,
  OpenAiEmbeddingProvider,
  type FetchLike,
} from "../src/ai/embeddings.js";
import {
  AnthropicEnrichmentProvider,
  buildUserMessage,
  classifyAnthropicError,
  type EnrichmentInput,
  type MessagesClient,
} from "../src/ai/enrichment.js";
import { EmbeddingError, EnrichmentError } from "../src/lib/errors.js";
import { cosineSimilarity } from "../src/lib/vector.js";

const INPUT: EnrichmentInput = {
  text: "Central bank cuts the key rate by 50 basis points.",
  channel: { title: "Markets Daily", username: "markets_daily", description: null },
  languageHint: "en",
};

function toolReply(input: unknown, name = "record_enrichment"): Awaited<ReturnType<MessagesClient["create"]>> {
  return { content: [{ type: "tool_use", id: "toolu_test", name, input }] };
}

function providerWith(create: MessagesClient["create"]) {
  return new AnthropicEnrichmentProvider({ model: "test-model", timeoutMs: 5000, client: { create } });
}

async function enrichError(provider: AnthropicEnrichmentProvider): Promise<EnrichmentError> {
  const err = await provider.enrich(INPUT).then(
    () => null,
    (e: unknown) => e
  );
  if (!(err instanceof EnrichmentError)) throw new Error("expected an EnrichmentError");
  return err;
}

describe("buildUserMessage", () => {
  it("lists only the channel fields that are set", () => {
    expect(buildUserMessage(INPUT)).toBe(
      [
        "## Channel",
        "- Title: Markets Daily",
        "- Username: @markets_daily",
        "- Digest language: en",
        "",
        "## Post",
        "",
        "Central bank cuts the key rate by 50 basis points.",
      ].join("\n")
    );
  });
});

describe("AnthropicEnrichmentProvider", () => {
  it("returns the validated tool input", async () => {
    const create = vi.fn<MessagesClient["create"]>().mockResolvedValue(
      toolReply({ topic: "rates", summary: "Key rate cut by 50bp.", language: "en", relevance: 0.9, importance: 0.7 })
    );

    const result = await providerWith(create).enrich(INPUT);

    expect(result).toEqual({
      topic: "rates",
      summary: "Key rate cut by 50bp.",
      language: "en",
      relevance: 0.9,
      importance: 0.7,
    });
    const [body, options] = create.mock.calls[0];
    expect(body).toMatchObject({
      model: "test-model",
      tool_choice: { type: "tool", name: "record_enrichment" },
      messages: [{ role: "user", content: buildUserMessage(INPUT) }],
    });
    expect(body.tools?.[0]).toMatchObject({ name: "record_enrichment", input_schema: { type: "object" } });
    expect(options).toEqual({ signal: undefined, timeout: 5000 });
  });

  it("treats a reply without the tool call as permanent", async () => {
    const err = await enrichError(providerWith(async () => toolReply({}, "something_else")));
    expect(err.kind).toBe("permanent");
    expect(err.message).toBe("No tool_use block in enrichment response");
  });

  it("treats invalid tool input as permanent", async () => {
    const err = await enrichError(
      providerWith(async () => toolReply({ topic: "rates", summary: "x", language: "en", relevance: 2, importance: 0 }))
    );
    expect(err.kind).toBe("permanent");
    expect(err.message).toBe("Enrichment output failed validation");
  });

  it("classifies client failures", async () => {
    const err = await enrichError(
      providerWith(async () => {
        throw new Anthropic.RateLimitError(429, undefined, "slow down", {});
      })
    );
    expect(err.kind).toBe("rate_limited");
    expect(err.retryable).toBe(true);
  });

  it("rethrows the abort reason once cancelled", async () => {
    const controller = new AbortController();
    const reason = new Error("shutting down");
    const provider = providerWith(async () => {
      controller.abort(reason);
      throw new Anthropic.APIUserAbortError();
    });

    await expect(provider.enrich(INPUT, { signal: controller.signal })).rejects.toBe(reason);
  });

  it("requires an API key without an injected client", () => {
    expect(() => new AnthropicEnrichmentProvider({ model: "m", timeoutMs: 1000 })).toThrow("ANTHROPIC_API_KEY is required");
  });
});

describe("classifyAnthropicError", () => {
  it.each<[Error, string]>([
    [new Anthropic.RateLimitError(429, undefined, "slow down", {}), "rate_limited"],
    [new Anthropic.APIConnectionError({ message: "socket hang up" }), "transient"],
    [new Anthropic.InternalServerError(500, undefined, "boom", {}), "transient"],
    [new Anthropic.ConflictError(409, undefined, "busy", {}), "transient"],
    [new Anthropic.BadRequestError(400, undefined, "bad input", {}), "permanent"],
    [new Anthropic.AuthenticationError(401, undefined, "bad key", {}), "permanent"],
    [new Error("unknown"), "transient"],
  ])("maps %s to %s", (err, kind) => {
    expect(classifyAnthropicError(err).kind).toBe(kind);
  });

  it("passes enrichment errors through", () => {
    const err = new EnrichmentError("permanent", "already classified");
    expect(classifyAnthropicError(err)).toBe(err);
  });
});

describe("OpenAiEmbeddingProvider", () => {
  const vector = Array.from({ length: 1536 }, (_, i) => (i === 0 ? 1 : 0));

  function embedderWith(fetchFn: FetchLike) {
    return new OpenAiEmbeddingProvider({
      apiKey: "test-key",
      model: "test-embedding",
      timeoutMs: 5000,
      baseUrl: "http://embeddings.test/v1",
      fetch: fetchFn,
    });
  }

  it("posts the text and returns the vector", async () => {
    const fetchFn = vi.fn<FetchLike>().mockResolvedValue(Response.json({ data: [{ embedding: vector, index: 0 }] }));

    await expect(embedderWith(fetchFn).embed("rate cut")).resolves.toEqual(vector);

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("http://embeddings.test/v1/embeddings");
    expect(init.headers).toEqual({ "content-type": "application/json", authorization: "Bearer test-key" });
    expect(JSON.parse(String(init.body))).toEqual({ model: "test-embedding", input: "rate cut", dimensions: 1536 });
  });

  it("rejects vectors of the wrong size", async () => {
    const provider = embedderWith(async () => Response.json({ data: [{ embedding: [0.1, 0.2], index: 0 }] }));
    await expect(provider.embed("x")).rejects.toThrow(new EmbeddingError("expected 1536 dimensions, got 2"));
  });

  it("reports error statuses with the response body", async () => {
    const provider = embedderWith(async () => new Response("upstream down", { status: 500 }));
    await expect(provider.embed("x")).rejects.toThrow("embedding request returned 500: upstream down");
  });

  it("wraps network failures", async () => {
    const provider = embedderWith(async () => {
      throw new TypeError("fetch failed");
    });
    await expect(provider.embed("x")).rejects.toThrow("embedding request failed: fetch failed");
  });

  it("requires an API key", () => {
    expect(() => new OpenAiEmbeddingProvider({ model: "m", timeoutMs: 1000 })).toThrow(
      "OPENAI_API_KEY is required for the openai embedding provider"
    );
  });
});

describe("DeterministicEmbeddingProvider", () => {
  const provider = new DeterministicEmbeddingProvider();

  it("embeds equal normalized text identically", async () => {
    const a = await provider.embed("Port strike  enters day three");
    const b = await provider.embed("port strike enters day three");
    expect(b).toEqual(a);
    expect(a).toHaveLength(1536);
    expect(cosineSimilarity(a, a)).toBeCloseTo(1, 10);
  });

  it("returns the zero vector for blank text", async () => {
    const v = await provider.embed("   ");
    expect(v.every((x) => x === 0)).toBe(true);
  });

  it("is picked by configuration", () => {
    expect(createEmbeddingProvider({ provider: "deterministic", model: "m", timeoutMs: 1 })).toBeInstanceOf(
      DeterministicEmbeddingProvider
    );
    expect(
      createEmbeddingProvider({ provider: "openai", apiKey: "test-key", model: "m", timeoutMs: 1 })
    ).toBeInstanceOf(OpenAiEmbeddingProvider);
  });
});
