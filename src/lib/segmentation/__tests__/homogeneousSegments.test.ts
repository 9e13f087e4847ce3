/**
 * Homogeneous Segment Builder — Unit Tests
 *
 * Uses node:test + node:assert/strict.
 */

import test from "node:test";
import assert from "node:assert/strict";
import {
  buildHomogeneousSegments,
  getDetailedSegments,
  getSegmentBoundaries,
  mergeSingletonSegments,
} from "../homogeneousSegments";
import type { AnnotatedPage } from "../../classification/subtypeDetector";
import type { MainType, SubTypeOrUnknown } from "../../classification/types";

function page(
  pageNumber: number,
  mainType: MainType,
  subType: SubTypeOrUnknown,
  confidence: number,
): AnnotatedPage {
  return {
    pageNumber,
    assignment: {
      mainType,
      subType,
      confidence,
      method: mainType === "UNKNOWN" ? "none" : "keyword",
    },
  };
}

// ---------------------------------------------------------------------------
// Build
// ---------------------------------------------------------------------------

test("1. Consecutive identical pairs form one segment", () => {
  const segments = buildHomogeneousSegments([
    page(1, "TURNOVER", "P&L Statement", 0.5),
    page(2, "TURNOVER", "P&L Statement", 1),
    page(3, "TURNOVER", "P&L Statement", 0.25),
    page(4, "WORK_ORDER", "Purchase Order", 0.9),
  ]);

  assert.equal(segments.length, 2);
  assert.deepEqual(segments[0], {
    segmentId: 1,
    startPage: 1,
    endPage: 3,
    pages: [1, 2, 3],
    mainType: "TURNOVER",
    subType: "P&L Statement",
    subTypes: ["P&L Statement"],
    // Incremental average: ((0.5 + 1) / 2 + 0.25) / 2
    confidence: 0.5,
  });
  assert.deepEqual(segments[1].pages, [4]);
  assert.equal(segments[1].segmentId, 2);
});

test("2. Same sub-type under a different main type starts a new segment", () => {
  const segments = buildHomogeneousSegments([
    page(1, "TURNOVER", "CA Certificate", 0.8),
    page(2, "WORK_ORDER", "CA Certificate", 0.8),
  ]);
  assert.equal(segments.length, 2);
});

test("3. Empty input → no segments", () => {
  assert.deepEqual(buildHomogeneousSegments([]), []);
  assert.deepEqual(mergeSingletonSegments([]), []);
});

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

test("4. Weak singleton folds into the previous same-type segment", () => {
  const built = buildHomogeneousSegments([
    page(1, "TURNOVER", "Balance Sheet", 0.9),
    page(2, "TURNOVER", "Balance Sheet", 0.9),
    page(3, "TURNOVER", "P&L Statement", 0.4),
    page(4, "WORK_ORDER", "Purchase Order", 0.4),
    page(5, "WORK_ORDER", "Completion Certificate", 0.3),
  ]);
  const merged = mergeSingletonSegments(built, 0.6);

  assert.equal(merged.length, 2);
  assert.deepEqual(merged[0], {
    segmentId: 1,
    startPage: 1,
    endPage: 3,
    pages: [1, 2, 3],
    mainType: "TURNOVER",
    subType: "Balance Sheet + P&L Statement",
    subTypes: ["Balance Sheet", "P&L Statement"],
    confidence: 0.9,
  });
  // Page 4 is weak too, but the segment before it is TURNOVER
  assert.equal(merged[1].segmentId, 2);
  assert.equal(merged[1].subType, "Purchase Order + Completion Certificate");
  assert.deepEqual(merged[1].pages, [4, 5]);
});

test("5. Repeated weak singletons keep folding into the same segment", () => {
  const merged = mergeSingletonSegments(
    buildHomogeneousSegments([
      page(1, "TURNOVER", "Balance Sheet", 0.9),
      page(2, "TURNOVER", "P&L Statement", 0.3),
      page(3, "TURNOVER", "Auditor's Report", 0.3),
      page(4, "TURNOVER", "P&L Statement", 0.3),
    ]),
  );
  assert.equal(merged.length, 1);
  assert.equal(merged[0].subType, "Balance Sheet + P&L Statement + Auditor's Report + P&L Statement");
  assert.deepEqual(merged[0].subTypes, ["Balance Sheet", "P&L Statement", "Auditor's Report"]);
  assert.deepEqual(merged[0].pages, [1, 2, 3, 4]);
});

test("6. First segment, multi-page and confident segments are never merged", () => {
  const built = buildHomogeneousSegments([
    page(1, "TURNOVER", "P&L Statement", 0.2),
    page(2, "TURNOVER", "Balance Sheet", 0.3),
    page(3, "TURNOVER", "Balance Sheet", 0.3),
    page(4, "TURNOVER", "Income Tax Related", 0.6),
  ]);
  const merged = mergeSingletonSegments(built, 0.6);
  assert.deepEqual(
    merged.map((s) => s.pages),
    [[1], [2, 3], [4]],
  );
});

test("7. Unknown singletons do not merge into typed segments", () => {
  const merged = mergeSingletonSegments(
    buildHomogeneousSegments([
      page(1, "WORK_ORDER", "Purchase Order", 1),
      page(2, "UNKNOWN", "Unknown", 0),
    ]),
  );
  assert.equal(merged.length, 2);
  assert.equal(merged[1].mainType, "UNKNOWN");
});

test("8. Merge does not mutate its input", () => {
  const built = buildHomogeneousSegments([
    page(1, "TURNOVER", "Balance Sheet", 0.9),
    page(2, "TURNOVER", "P&L Statement", 0.3),
  ]);
  mergeSingletonSegments(built);
  assert.deepEqual(built[0].pages, [1]);
  assert.equal(built[0].subType, "Balance Sheet");
  assert.equal(built.length, 2);
});

// ---------------------------------------------------------------------------
// Convenience
// ---------------------------------------------------------------------------

const MIXED = [
  page(1, "TURNOVER", "Balance Sheet", 0.9),
  page(2, "TURNOVER", "Balance Sheet", 0.9),
  page(3, "TURNOVER", "P&L Statement", 0.4),
  page(4, "WORK_ORDER", "Purchase Order", 0.9),
];

test("9. getDetailedSegments merges by default and can skip merging", () => {
  assert.equal(getDetailedSegments(MIXED).length, 2);
  assert.equal(getDetailedSegments(MIXED, { mergeSingletons: false }).length, 3);
  // Threshold below the weak page's confidence → nothing merges
  assert.equal(getDetailedSegments(MIXED, { mergeMinConfidence: 0.3 }).length, 3);
});

test("10. getSegmentBoundaries partitions every page exactly once", () => {
  assert.deepEqual(getSegmentBoundaries(MIXED), [
    { startPage: 1, endPage: 3 },
    { startPage: 4, endPage: 4 },
  ]);
});
