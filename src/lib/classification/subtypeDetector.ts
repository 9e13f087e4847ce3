/**
 * Sub-Type Detector — keyword frequency
 *
 * Maps page (or segment) text to (main type, sub-type, confidence).
 *
 * Pure function — no IO, no randomness.
 *
 * INVARIANT: ties resolve to the first-declared catalog entry. The scan walks
 * SUBTYPE_CATALOG in order and only replaces the leader on a strictly
 * higher count.
 */

import { SUBTYPE_CATALOG } from "./documentTypes";
import {
  UNKNOWN_SUBTYPE,
  type SubtypeAssignment,
  type SubtypeCatalogEntry,
} from "./types";
import { lookupPage } from "@/lib/pages/lookupPage";
import type { PagePayload, PageRecord } from "@/lib/pages/types";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Share of an entry's keywords that must match for full confidence */
const FULL_CONFIDENCE_KEYWORD_SHARE = 0.3;

/** Any positive match scores at least this */
const MIN_MATCH_CONFIDENCE = 0.3;

export const UNKNOWN_ASSIGNMENT: SubtypeAssignment = Object.freeze({
  mainType: "UNKNOWN",
  subType: UNKNOWN_SUBTYPE,
  confidence: 0,
  method: "none",
});

// ---------------------------------------------------------------------------
// Text helpers
// ---------------------------------------------------------------------------

/** Snippets joined with single spaces and lowercased. */
export function combineSnippets(snippets: readonly string[]): string {
  return snippets.join(" ").toLowerCase();
}

/** Number of distinct keyword phrases present as substrings of `text`. */
export function countKeywordMatches(
  text: string,
  keywords: readonly string[],
): number {
  let matches = 0;
  for (const keyword of keywords) {
    if (text.includes(keyword)) matches++;
  }
  return matches;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Detect the sub-type of a page from its text snippets.
 *
 * confidence = min(matches / (keywords * 0.3), 1), floored at 0.3.
 */
export function detectSubtype(snippets: readonly string[]): SubtypeAssignment {
  const text = combineSnippets(snippets);
  if (!text.trim()) return UNKNOWN_ASSIGNMENT;

  let best: SubtypeCatalogEntry | null = null;
  let bestMatches = 0;

  for (const entry of SUBTYPE_CATALOG) {
    const matches = countKeywordMatches(text, entry.keywords);
    if (matches > bestMatches) {
      best = entry;
      bestMatches = matches;
    }
  }

  if (!best) return UNKNOWN_ASSIGNMENT;

  const ratio =
    bestMatches / (best.keywords.length * FULL_CONFIDENCE_KEYWORD_SHARE);

  return {
    mainType: best.mainType,
    subType: best.subType,
    confidence: Math.max(Math.min(ratio, 1), MIN_MATCH_CONFIDENCE),
    method: "keyword",
  };
}

/** Re-run detection over every resolved page of a segment. */
export function detectSegmentSubtype(
  payloads: readonly PagePayload[],
): SubtypeAssignment {
  return detectSubtype(payloads.flatMap((p) => p.textSnippets));
}

export type AnnotatedPage = {
  pageNumber: number;
  assignment: SubtypeAssignment;
};

/**
 * Annotate pages 1..totalPages. Pages without data are UNKNOWN so they still
 * take part in the partition.
 */
export function annotatePages(
  records: readonly PageRecord[],
  totalPages: number = records.length,
): AnnotatedPage[] {
  const pages: AnnotatedPage[] = [];
  for (let pageNumber = 1; pageNumber <= totalPages; pageNumber++) {
    const payload = lookupPage(records, pageNumber);
    pages.push({
      pageNumber,
      assignment: payload ? detectSubtype(payload.textSnippets) : UNKNOWN_ASSIGNMENT,
    });
  }
  return pages;
}
