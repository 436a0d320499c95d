import type { DropReason, FilterMode } from "@digest/shared";
import type { Claim } from "../storage/types.js";

export type FilterDecision =
  | { filtered: false }
  | { filtered: true; reason: DropReason; detail?: string };

/** Decides whether a claimed message is excluded before enrichment. */
export type MessageFilter = (claim: Claim) => FilterDecision;

export type MessageFilterOptions = {
  minLength: number;
  skipForwards: boolean;
  adsKeywords: string[];
  denyPatterns: string[];
  allowPatterns: string[];
  mode: FilterMode;
};

const LINK_RE = /https?:\/\//i;

function hasLink(claim: Claim): boolean {
  if (LINK_RE.test(claim.text)) return true;
  return (claim.entities ?? []).some((e) => e.type === "url" || e.type === "text_link" || typeof e.url === "string");
}

function firstMatch(haystack: string, needles: string[]): string | undefined {
  return needles.find((n) => haystack.includes(n));
}

export function createMessageFilter(opts: MessageFilterOptions): MessageFilter {
  const lower = (values: string[]) => values.map((v) => v.toLowerCase()).filter(Boolean);
  const ads = lower(opts.adsKeywords);
  const deny = lower(opts.denyPatterns);
  const allow = lower(opts.allowPatterns);
  const checkDeny = opts.mode !== "allowlist";
  const checkAllow = opts.mode !== "denylist";

  return (claim) => {
    if (opts.skipForwards && claim.isForward) return { filtered: true, reason: "filter_forward" };

    const text = claim.text.trim();
    // Short posts that carry a link are kept; the link is the content.
    if (opts.minLength > 0 && [...text].length < opts.minLength && !hasLink(claim)) {
      return { filtered: true, reason: "filter_min_length" };
    }

    const lowered = text.toLowerCase();

    const ad = firstMatch(lowered, ads);
    if (ad) return { filtered: true, reason: "filter_ads", detail: ad };

    if (checkDeny) {
      const hit = firstMatch(lowered, deny);
      if (hit) return { filtered: true, reason: "filter_deny", detail: hit };
    }

    if (checkAllow && allow.length > 0 && !firstMatch(lowered, allow)) {
      return { filtered: true, reason: "filter_allow_miss" };
    }

    return { filtered: false };
  };
}

/** A filter that admits everything. */
export const allowAll: MessageFilter = () => ({ filtered: false });
