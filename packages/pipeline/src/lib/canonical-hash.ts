import { createHash } from "node:crypto";

const URL_RE = /https?:\/\/\S+/gi;
const WHITESPACE_RE = /\s+/g;

/** Lowercased text with links stripped and whitespace collapsed. */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(URL_RE, " ").replace(WHITESPACE_RE, " ").trim();
}

export function canonicalHash(text: string): string {
  return createHash("sha256").update(normalizeText(text)).digest("hex");
}
