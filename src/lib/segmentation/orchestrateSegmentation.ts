/**
 * Segmentation Orchestrator
 *
 * Runs the full page → segment → classification → routing flow for one
 * scanned document:
 *
 *   homogeneous (default):
 *     annotate sub-types → resolve cross-type pages inside hint boundaries
 *     → build homogeneous segments → merge weak singletons → classify → route
 *
 *   boundary:
 *     hint boundaries → classify each range → segment-level sub-type → route
 *
 * Synchronous. Nothing here is fatal on data: pages without analysis are
 * absent data, never a fault. The only throw is an invalid option set or
 * page count.
 *
 * Every ledger event carries segmentation_version for replay.
 */

import { z } from "zod";
import { annotatePages, detectSegmentSubtype } from "@/lib/classification/subtypeDetector";
import { resolveAmbiguousPages } from "@/lib/classification/contextResolver";
import { classifySegment, pagesInRange } from "@/lib/classification/multiFactorClassifier";
import { routeSegment } from "@/lib/classification/eligibility";
import { familiesOf } from "@/lib/classification/documentTypes";
import {
  CLASSIFICATION_SCHEMA_VERSION,
  UNKNOWN_SUBTYPE,
  type MainType,
  type SubtypeAssignment,
  type SubTypeOrUnknown,
} from "@/lib/classification/types";
import {
  loadSegmentationConfig,
  SegmentationOptionsSchema,
  type SegmentationConfig,
} from "@/lib/env/segmentationConfig";
import { writeEvent, type LedgerEventSink } from "@/lib/ledger/writeEvent";
import { collectSegmentPayloads, lookupPage } from "@/lib/pages/lookupPage";
import type { PageRecord } from "@/lib/pages/types";
import { detectBoundaries } from "./detectBoundaries";
import { getDetailedSegments } from "./homogeneousSegments";
import {
  SEGMENTATION_VERSION,
  type RoutedSegment,
  type Segment,
  type SegmentationRunResult,
} from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type OrchestrateSegmentationArgs = {
  records: readonly PageRecord[];
  /** Used in ledger events only */
  documentId?: string | null;
  /** Non-negative integer; defaults to records.length */
  totalPages?: number;
  /** Per-run overrides, applied over `config` */
  options?: Partial<SegmentationConfig>;
  /** Defaults to loadSegmentationConfig() */
  config?: SegmentationConfig;
  sink?: LedgerEventSink;
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const TotalPagesSchema = z.number().int().nonnegative();

function resolveTotalPages(args: OrchestrateSegmentationArgs): number {
  const parsed = TotalPagesSchema.safeParse(args.totalPages ?? args.records.length);
  if (!parsed.success) {
    console.error("[orchestrateSegmentation] invalid totalPages", {
      totalPages: args.totalPages,
      issues: parsed.error.flatten().formErrors,
    });
    throw new Error("SEGMENTATION_OPTIONS_INVALID: totalPages must be a non-negative integer.");
  }
  return parsed.data;
}

function resolveOptions(args: OrchestrateSegmentationArgs): SegmentationConfig {
  const base = args.config ?? loadSegmentationConfig();
  const o = args.options ?? {};
  const parsed = SegmentationOptionsSchema.safeParse({
    strategy: o.strategy ?? base.strategy,
    mergeSingletons: o.mergeSingletons ?? base.mergeSingletons,
    mergeMinConfidence: o.mergeMinConfidence ?? base.mergeMinConfidence,
    reviewMinConfidence: o.reviewMinConfidence ?? base.reviewMinConfidence,
  });
  if (!parsed.success) {
    console.error("[orchestrateSegmentation] invalid options", parsed.error.flatten().fieldErrors);
    throw new Error("SEGMENTATION_OPTIONS_INVALID: see logs for the offending options.");
  }
  return parsed.data;
}

/**
 * Keep the detected sub-type only when it belongs to the main type's family;
 * otherwise the family catch-all "Other".
 */
function subtypeWithinFamily(
  mainType: MainType,
  detected: SubtypeAssignment,
): SubTypeOrUnknown {
  if (mainType === "UNKNOWN") return UNKNOWN_SUBTYPE;
  if (detected.subType === UNKNOWN_SUBTYPE) return "Other";
  return familiesOf(detected.subType).includes(mainType) ? detected.subType : "Other";
}

function buildBoundarySegments(
  records: readonly PageRecord[],
  totalPages: number,
): Segment[] {
  return detectBoundaries(records, totalPages).map((range, i) => {
    const pages = pagesInRange(range);
    const classification = classifySegment(pages, records);
    const detected = detectSegmentSubtype(
      collectSegmentPayloads(records, pages).map((r) => r.payload),
    );
    const subType = subtypeWithinFamily(classification.documentType, detected);
    return {
      segmentId: i + 1,
      startPage: range.startPage,
      endPage: range.endPage,
      pages,
      mainType: classification.documentType,
      subType,
      subTypes: [subType],
      confidence: classification.confidence,
    };
  });
}

function buildHomogeneousRunSegments(
  records: readonly PageRecord[],
  totalPages: number,
  options: SegmentationConfig,
): Segment[] {
  const annotated = annotatePages(records, totalPages);
  const resolved = resolveAmbiguousPages(annotated, detectBoundaries(records, totalPages));
  return getDetailedSegments(resolved, {
    mergeSingletons: options.mergeSingletons,
    mergeMinConfidence: options.mergeMinConfidence,
  });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function orchestrateSegmentation(
  args: OrchestrateSegmentationArgs,
): SegmentationRunResult {
  const options = resolveOptions(args);
  const { records, sink } = args;
  const documentId = args.documentId ?? null;
  const totalPages = resolveTotalPages(args);

  // Step 1: Account for pages without analysis data
  const missingPages: number[] = [];
  for (let page = 1; page <= totalPages; page++) {
    if (!lookupPage(records, page)) missingPages.push(page);
  }
  const validPages = totalPages - missingPages.length;

  if (missingPages.length > 0) {
    console.warn("[orchestrateSegmentation] pages without analysis data", {
      documentId,
      missingPages,
    });
    writeEvent(
      {
        kind: "segmentation.pages_missing",
        documentId,
        meta: {
          segmentation_version: SEGMENTATION_VERSION,
          total_pages: totalPages,
          missing_pages: missingPages,
        },
      },
      sink,
    );
  }

  // Step 2: Segment
  const segments =
    options.strategy === "boundary"
      ? buildBoundarySegments(records, totalPages)
      : buildHomogeneousRunSegments(records, totalPages, options);

  // Step 3: Classify + route each segment independently
  const routed: RoutedSegment[] = segments.map((segment) => {
    const classification = classifySegment(segment.pages, records);
    const result = routeSegment(segment, classification, options.reviewMinConfidence);

    writeEvent(
      {
        kind: "segmentation.segment_classified",
        documentId,
        confidence: result.confidence,
        requiresHumanReview: result.needsReview,
        meta: {
          segmentation_version: SEGMENTATION_VERSION,
          classification_version: CLASSIFICATION_SCHEMA_VERSION,
          strategy: options.strategy,
          segment_id: result.segmentId,
          start_page: result.startPage,
          end_page: result.endPage,
          main_type: result.mainType,
          sub_type: result.subType,
          document_type: classification.documentType,
          classification_confidence: classification.confidence,
          requires_extraction: result.requiresExtraction,
          priority: result.priority,
        },
      },
      sink,
    );

    return result;
  });

  // Step 4: Run summary
  writeEvent(
    {
      kind: "segmentation.completed",
      documentId,
      meta: {
        segmentation_version: SEGMENTATION_VERSION,
        strategy: options.strategy,
        total_pages: totalPages,
        valid_pages: validPages,
        segment_count: routed.length,
        needs_review_count: routed.filter((s) => s.needsReview).length,
      },
    },
    sink,
  );

  return {
    version: SEGMENTATION_VERSION,
    strategy: options.strategy,
    totalPages,
    validPages,
    segments: routed,
  };
}
