import Anthropic from "@anthropic-ai/sdk";
import { zodToJsonSchema } from "zod-to-json-schema";

import { enrichmentResultSchema, type EnrichmentResult } from "@digest/shared";
import { EnrichmentError } from "../lib/errors.js";

export const ENRICHMENT_PROMPT_VERSION = "v1";
const TOOL_NAME = "record_enrichment";

const ENRICHMENT_SYSTEM_PROMPT = `
You read single posts from public news and commentary channels and prepare them for a periodic digest.

For each post produce:
- topic: a short label (1-4 words) naming what the post is about. Posts on the same story should get the same label.
- summary: one sentence in the requested digest language. Keep names, numbers and dates from the post. Do not add facts.
- language: the ISO 639-1 code of the language the post is written in.
- relevance: 0.0-1.0. How well the post fits a news digest. Advertising, greetings, polls and off-topic chatter score near 0.
- importance: 0.0-1.0. How much a reader of the digest would miss by skipping it. Breaking or widely consequential news scores high; routine updates score low.

Use the channel context only to interpret the post, not as evidence of importance.

Call the ${TOOL_NAME} tool exactly once. Do not produce any other text.
`.trim();

export type ChannelContext = {
  title: string | null;
  username: string | null;
  description: string | null;
};

export type EnrichmentInput = {
  text: string;
  channel: ChannelContext;
  languageHint: string;
};

export interface EnrichmentProvider {
  enrich(input: EnrichmentInput, opts?: { signal?: AbortSignal }): Promise<EnrichmentResult>;
}

/** The slice of the Anthropic client the provider calls. */
export type MessagesClient = {
  create(
    body: Anthropic.MessageCreateParamsNonStreaming,
    options?: { signal?: AbortSignal; timeout?: number }
  ): Promise<Pick<Anthropic.Message, "content">>;
};

function buildToolSchema(): Anthropic.Tool["input_schema"] {
  const schema = zodToJsonSchema(enrichmentResultSchema, { $refStrategy: "none" });
  return { ...schema, type: "object" };
}

export function buildUserMessage(input: EnrichmentInput): string {
  const channel = input.channel;
  return [
    `## Channel`,
    channel.title ? `- Title: ${channel.title}` : null,
    channel.username ? `- Username: @${channel.username}` : null,
    channel.description ? `- Description: ${channel.description}` : null,
    `- Digest language: ${input.languageHint}`,
    ``,
    `## Post`,
    ``,
    input.text,
  ]
    .filter((line): line is string => line !== null)
    .join("\n");
}

/**
 * Maps SDK failures onto retry policy: rate limits and connectivity are
 * retried, other client errors are terminal.
 */
export function classifyAnthropicError(err: unknown): EnrichmentError {
  if (err instanceof EnrichmentError) return err;
  if (err instanceof Anthropic.RateLimitError) {
    return new EnrichmentError("rate_limited", err.message, { cause: err });
  }
  if (err instanceof Anthropic.APIConnectionError) {
    return new EnrichmentError("transient", err.message, { cause: err });
  }
  if (err instanceof Anthropic.APIError) {
    const status = err.status ?? 0;
    if (status === 408 || status === 409 || status >= 500) {
      return new EnrichmentError("transient", err.message, { cause: err });
    }
    if (status >= 400) return new EnrichmentError("permanent", err.message, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new EnrichmentError("transient", message, { cause: err });
}

export class AnthropicEnrichmentProvider implements EnrichmentProvider {
  private readonly messages: MessagesClient;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly tool: Anthropic.Tool;

  constructor(opts: { apiKey?: string; model: string; timeoutMs: number; client?: MessagesClient }) {
    if (opts.client) {
      this.messages = opts.client;
    } else {
      if (!opts.apiKey) throw new Error("ANTHROPIC_API_KEY is required");
      // Retries are scheduled by the worker pool with backoff.
      this.messages = new Anthropic({ apiKey: opts.apiKey, maxRetries: 0 }).messages;
    }
    this.model = opts.model;
    this.timeoutMs = opts.timeoutMs;
    this.tool = {
      name: TOOL_NAME,
      description: "Record the enrichment of one channel post. Call this tool exactly once.",
      input_schema: buildToolSchema(),
    };
  }

  async enrich(input: EnrichmentInput, opts: { signal?: AbortSignal } = {}): Promise<EnrichmentResult> {
    let response: Pick<Anthropic.Message, "content">;
    try {
      response = await this.messages.create(
        {
          model: this.model,
          max_tokens: 1024,
          system: ENRICHMENT_SYSTEM_PROMPT,
          messages: [{ role: "user", content: buildUserMessage(input) }],
          tools: [this.tool],
          tool_choice: { type: "tool", name: TOOL_NAME },
        },
        { signal: opts.signal, timeout: this.timeoutMs }
      );
    } catch (err) {
      if (opts.signal?.aborted) throw opts.signal.reason;
      throw classifyAnthropicError(err);
    }

    const toolUse = response.content.find(
      (block): block is Anthropic.ToolUseBlock => block.type === "tool_use" && block.name === TOOL_NAME
    );
    if (!toolUse) throw new EnrichmentError("permanent", "No tool_use block in enrichment response");

    const parsed = enrichmentResultSchema.safeParse(toolUse.input);
    if (!parsed.success) {
      throw new EnrichmentError("permanent", "Enrichment output failed validation", { cause: parsed.error });
    }
    return parsed.data;
  }
}
