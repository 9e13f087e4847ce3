/**
 * Homogeneous Segment Builder
 *
 * Groups consecutive pages sharing one (main type, sub-type) pair, then
 * folds weak single-page segments into the segment before them.
 *
 * Pure functions — inputs are never mutated.
 *
 * Known quirk: the running confidence is an incremental average,
 * (old + page) / 2, so later pages weigh more than a true mean would give.
 * Kept as-is pending a decision on the intended semantics.
 */

import type { AnnotatedPage } from "@/lib/classification/subtypeDetector";
import type { SubTypeOrUnknown } from "@/lib/classification/types";
import { MERGED_LABEL_SEPARATOR } from "@/lib/classification/eligibility";
import type { PageRange, Segment } from "./types";

/** Single-page segments below this confidence are merge candidates */
export const DEFAULT_MERGE_MIN_CONFIDENCE = 0.6;

function appendUnique(
  list: readonly SubTypeOrUnknown[],
  more: readonly SubTypeOrUnknown[],
): SubTypeOrUnknown[] {
  const out = [...list];
  for (const s of more) if (!out.includes(s)) out.push(s);
  return out;
}

function renumber(segments: readonly Segment[]): Segment[] {
  return segments.map((s, i) => ({ ...s, segmentId: i + 1 }));
}

// ---------------------------------------------------------------------------
// Build
// ---------------------------------------------------------------------------

/** One segment per run of identical (main type, sub-type). Expects page order. */
export function buildHomogeneousSegments(
  pages: readonly AnnotatedPage[],
): Segment[] {
  const segments: Segment[] = [];
  let open: Segment | null = null;

  for (const { pageNumber, assignment } of pages) {
    if (
      open &&
      open.mainType === assignment.mainType &&
      open.subType === assignment.subType
    ) {
      open.endPage = pageNumber;
      open.pages.push(pageNumber);
      open.confidence = (open.confidence + assignment.confidence) / 2;
      continue;
    }

    if (open) segments.push(open);
    open = {
      segmentId: segments.length + 1,
      startPage: pageNumber,
      endPage: pageNumber,
      pages: [pageNumber],
      mainType: assignment.mainType,
      subType: assignment.subType,
      subTypes: [assignment.subType],
      confidence: assignment.confidence,
    };
  }

  if (open) segments.push(open);
  return segments;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Single forward pass. A one-page segment below `minConfidence` (never the
 * first) is absorbed by the previous OUTPUT segment when their main types
 * match. The absorbing segment keeps its confidence; its label becomes
 * "<prev> + <merged>". Merges only go backward.
 */
export function mergeSingletonSegments(
  segments: readonly Segment[],
  minConfidence: number = DEFAULT_MERGE_MIN_CONFIDENCE,
): Segment[] {
  if (segments.length <= 1) return renumber(segments);

  const merged: Segment[] = [];

  segments.forEach((current, i) => {
    const isSinglePage = current.startPage === current.endPage;
    const isLowConfidence = current.confidence < minConfidence;
    const prev: Segment | undefined = merged[merged.length - 1];

    if (i > 0 && isSinglePage && isLowConfidence && prev?.mainType === current.mainType) {
      merged[merged.length - 1] = {
        ...prev,
        endPage: current.endPage,
        pages: [...prev.pages, ...current.pages],
        subType: `${prev.subType}${MERGED_LABEL_SEPARATOR}${current.subType}`,
        subTypes: appendUnique(prev.subTypes, current.subTypes),
      };
      return;
    }

    merged.push({ ...current, pages: [...current.pages] });
  });

  return renumber(merged);
}

// ---------------------------------------------------------------------------
// Convenience
// ---------------------------------------------------------------------------

export type HomogeneousOptions = {
  mergeSingletons?: boolean;
  mergeMinConfidence?: number;
};

export function getDetailedSegments(
  pages: readonly AnnotatedPage[],
  options: HomogeneousOptions = {},
): Segment[] {
  const built = buildHomogeneousSegments(pages);
  if (options.mergeSingletons === false) return built;
  return mergeSingletonSegments(built, options.mergeMinConfidence);
}

/** Ranges only, for callers that classify ranges themselves. */
export function getSegmentBoundaries(
  pages: readonly AnnotatedPage[],
  options: HomogeneousOptions = {},
): PageRange[] {
  return getDetailedSegments(pages, options).map(({ startPage, endPage }) => ({
    startPage,
    endPage,
  }));
}
