/**
 * Multi-Factor Classifier — main type scoring
 *
 * Scores a page range as WORK_ORDER vs TURNOVER from four additive factors:
 *
 *   F1 type hints        40 × share of valid pages hinting the type
 *   F2 keyword matching  30 × share of all main-type keyword matches
 *   F3 structural bonus  20 (certificate page → WO; financial wording → TURNOVER)
 *   F4 layout flags      10 (tables → +5 both; forms → +5 WO)
 *
 * Only pages that resolve to a successful analysis count. A range with none
 * is UNKNOWN at 0.0 — a normal outcome, not a fault.
 *
 * Pure function — no IO, no randomness.
 */

import { MAIN_TYPE_KEYWORDS } from "./documentTypes";
import { combineSnippets, countKeywordMatches } from "./subtypeDetector";
import type {
  ClassificationResult,
  ClassificationScores,
  HintType,
} from "./types";
import { collectSegmentPayloads } from "@/lib/pages/lookupPage";
import type { PagePayload, PageRecord } from "@/lib/pages/types";
import type { PageRange } from "@/lib/segmentation/types";

// ---------------------------------------------------------------------------
// Weights
// ---------------------------------------------------------------------------

const HINT_WEIGHT = 40;
const KEYWORD_WEIGHT = 30;
const STRUCTURAL_BONUS = 20;
const TABLE_BONUS = 5;
const FORM_BONUS = 5;

const MAX_SCORE = 100;

/** Confidence reported for any equal-score outcome */
const TIE_CONFIDENCE = 0.5;

/** Any of these in the combined text earns TURNOVER the structural bonus */
const FINANCIAL_MARKERS = ["financial", "balance", "profit and loss"];

export const NO_VALID_DATA_REASON = "no valid page data";

// ---------------------------------------------------------------------------
// Factor evaluation
// ---------------------------------------------------------------------------

type FactorBreakdown = {
  hints: Record<HintType, number>;
  keywordMatches: Record<HintType, number>;
  hasCertificatePage: boolean;
  scores: ClassificationScores;
};

function clampScore(score: number): number {
  return Math.min(MAX_SCORE, Math.max(0, score));
}

function evaluateFactors(payloads: readonly PagePayload[]): FactorBreakdown {
  const validPages = payloads.length;

  // F1 — type hints
  const hints: Record<HintType, number> = { WORK_ORDER: 0, TURNOVER: 0 };
  for (const p of payloads) {
    if (p.typeHints.includes("WORK_ORDER")) hints.WORK_ORDER++;
    if (p.typeHints.includes("TURNOVER")) hints.TURNOVER++;
  }

  let wo = HINT_WEIGHT * (hints.WORK_ORDER / validPages);
  let to = HINT_WEIGHT * (hints.TURNOVER / validPages);

  // F2 — keyword matching over all snippets of the range
  const text = combineSnippets(payloads.flatMap((p) => p.textSnippets));
  const keywordMatches: Record<HintType, number> = {
    WORK_ORDER: countKeywordMatches(text, MAIN_TYPE_KEYWORDS.WORK_ORDER),
    TURNOVER: countKeywordMatches(text, MAIN_TYPE_KEYWORDS.TURNOVER),
  };
  const totalMatches = Math.max(
    keywordMatches.WORK_ORDER + keywordMatches.TURNOVER,
    1,
  );
  wo += KEYWORD_WEIGHT * (keywordMatches.WORK_ORDER / totalMatches);
  to += KEYWORD_WEIGHT * (keywordMatches.TURNOVER / totalMatches);

  // F3 — structural bonus
  const hasCertificatePage = payloads.some((p) => p.pageKind === "certificate");
  if (hasCertificatePage) wo += STRUCTURAL_BONUS;
  if (FINANCIAL_MARKERS.some((m) => text.includes(m))) to += STRUCTURAL_BONUS;

  // F4 — layout flags (tables are ambiguous, forms lean work order)
  if (payloads.some((p) => p.structureFlags.hasTables)) {
    wo += TABLE_BONUS;
    to += TABLE_BONUS;
  }
  if (payloads.some((p) => p.structureFlags.hasForms)) wo += FORM_BONUS;

  return {
    hints,
    keywordMatches,
    hasCertificatePage,
    scores: { WORK_ORDER: clampScore(wo), TURNOVER: clampScore(to) },
  };
}

function buildReasoning(type: HintType, f: FactorBreakdown): string {
  const reasons: string[] = [];

  if (f.hints[type] > 0) reasons.push(`found ${f.hints[type]} hint(s) for ${type}`);
  if (f.keywordMatches[type] > 0) {
    reasons.push(`${f.keywordMatches[type]} keyword matches`);
  }
  if (type === "WORK_ORDER" && f.hasCertificatePage) {
    reasons.push("contains certificate page");
  }
  if (reasons.length === 0) {
    reasons.push(`pattern match for ${type} document structure`);
  }

  return reasons.join("; ");
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Classify one segment's pages into a main type.
 *
 * Tie-break on equal totals: more hinted pages wins; equal hints default to
 * WORK_ORDER with isTie set. Either way confidence is 0.5.
 */
export function classifySegment(
  pages: readonly number[],
  records: readonly PageRecord[],
): ClassificationResult {
  const payloads = collectSegmentPayloads(records, pages).map((r) => r.payload);

  if (payloads.length === 0) {
    return {
      documentType: "UNKNOWN",
      confidence: 0,
      reasoning: NO_VALID_DATA_REASON,
      scores: { WORK_ORDER: 0, TURNOVER: 0 },
      isTie: false,
      validPages: 0,
    };
  }

  const f = evaluateFactors(payloads);
  const { WORK_ORDER: wo, TURNOVER: to } = f.scores;

  const base = { scores: f.scores, validPages: payloads.length };

  if (wo !== to) {
    const winner: HintType = wo > to ? "WORK_ORDER" : "TURNOVER";
    return {
      ...base,
      documentType: winner,
      confidence: f.scores[winner] / MAX_SCORE,
      reasoning: buildReasoning(winner, f),
      isTie: false,
    };
  }

  if (f.hints.WORK_ORDER !== f.hints.TURNOVER) {
    const winner: HintType =
      f.hints.WORK_ORDER > f.hints.TURNOVER ? "WORK_ORDER" : "TURNOVER";
    return {
      ...base,
      documentType: winner,
      confidence: TIE_CONFIDENCE,
      reasoning: `score tie broken by hint count; ${buildReasoning(winner, f)}`,
      isTie: false,
    };
  }

  return {
    ...base,
    documentType: "WORK_ORDER",
    confidence: TIE_CONFIDENCE,
    reasoning: "tie: equal scores and hint counts, defaulting to WORK_ORDER",
    isTie: true,
  };
}

export type SegmentClassification = ClassificationResult & {
  segmentId: number;
  pages: number[];
};

/** Expand an inclusive range into its page numbers. */
export function pagesInRange(range: PageRange): number[] {
  const pages: number[] = [];
  for (let p = range.startPage; p <= range.endPage; p++) pages.push(p);
  return pages;
}

/** Classify every range in order; segment ids are 1-based. */
export function classifyAllSegments(
  ranges: readonly PageRange[],
  records: readonly PageRecord[],
): SegmentClassification[] {
  return ranges.map((range, i) => {
    const pages = pagesInRange(range);
    return { ...classifySegment(pages, records), segmentId: i + 1, pages };
  });
}
