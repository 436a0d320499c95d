import type { EnrichmentErrorKind } from "./constants.js";

// ============================================================
// Raw message blobs (the `*_json` JSONB columns on raw_messages)
// ============================================================

export interface MessageEntity {
  type: string;
  offset: number;
  length: number;
  url?: string;
  [key: string]: unknown;
}

export interface MessageMedia {
  kind: string;
  caption?: string;
  [key: string]: unknown;
}

// ============================================================
// Digest payloads
// ============================================================

/** A pointer back to the upstream message an entry was built from. */
export interface DigestSource {
  channel: string;
  msg_id: number;
}

export interface DigestEntryPayload {
  title: string | null;
  body: string;
  sources: DigestSource[];
}

export interface DigestWindow {
  start: Date;
  end: Date;
}

// ============================================================
// Error payloads (the `error_json` JSONB columns)
// ============================================================

export interface ItemErrorPayload {
  kind: EnrichmentErrorKind;
  message: string;
  at: string;
}

export interface DigestErrorPayload {
  kind: string;
  message: string;
  at: string;
}
