import { z } from "zod";

// ============================================================
// Enrichment output
// ============================================================

const score = z.number().min(0).max(1);

export const enrichmentResultSchema = z.object({
  topic: z.string().min(1).describe("Short topic label, 1-4 words"),
  summary: z.string().min(1).describe("One-sentence summary in the target language"),
  language: z.string().min(2).describe("ISO 639-1 code of the source message"),
  relevance: score.describe("How relevant the message is to a news digest, 0..1"),
  importance: score.describe("How important the message is, 0..1"),
});

export type EnrichmentResult = z.infer<typeof enrichmentResultSchema>;

// ============================================================
// Ingestion
// ============================================================

export const ingestChannelSchema = z.object({
  peerId: z.number().int(),
  username: z.string().min(1).optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  importanceWeight: z.number().positive().optional(),
  importanceThreshold: score.optional(),
});

export const messageEntitySchema = z
  .object({
    type: z.string(),
    offset: z.number().int().nonnegative(),
    length: z.number().int().nonnegative(),
    url: z.string().optional(),
  })
  .passthrough();

export const messageMediaSchema = z
  .object({
    kind: z.string(),
    caption: z.string().optional(),
  })
  .passthrough();

export const ingestMessageSchema = z.object({
  channel: ingestChannelSchema,
  messageId: z.number().int().nonnegative(),
  date: z.string().datetime({ offset: true }),
  text: z.string(),
  entities: z.array(messageEntitySchema).optional(),
  media: messageMediaSchema.optional(),
  isForward: z.boolean().optional(),
});

export type IngestChannelInput = z.infer<typeof ingestChannelSchema>;
export type IngestMessageInput = z.infer<typeof ingestMessageSchema>;

// ============================================================
// Digests
// ============================================================

export const digestSourceSchema = z.object({
  channel: z.string(),
  msg_id: z.number().int(),
});

export const digestWindowRequestSchema = z
  .object({
    windowStart: z.string().datetime({ offset: true }),
    windowEnd: z.string().datetime({ offset: true }),
    chatId: z.string().min(1),
  })
  .refine((v) => Date.parse(v.windowStart) < Date.parse(v.windowEnd), {
    message: "windowStart must be before windowEnd",
    path: ["windowEnd"],
  });

export type DigestWindowRequest = z.infer<typeof digestWindowRequestSchema>;
