/**
 * Extraction Eligibility — Unit Tests
 *
 * Pure routing table + field config. No IO.
 */

import test from "node:test";
import assert from "node:assert/strict";
import {
  getExtractionEligibility,
  getFieldConfig,
  getRequiredFields,
  routeSegment,
} from "../eligibility";
import type { ClassificationResult } from "../types";
import type { Segment } from "../../segmentation/types";

function segment(overrides: Partial<Segment> = {}): Segment {
  return {
    segmentId: 1,
    startPage: 1,
    endPage: 2,
    pages: [1, 2],
    mainType: "WORK_ORDER",
    subType: "Purchase Order",
    subTypes: ["Purchase Order"],
    confidence: 0.9,
    ...overrides,
  };
}

const CLASSIFICATION: ClassificationResult = {
  documentType: "WORK_ORDER",
  confidence: 0.7,
  reasoning: "found 2 hint(s) for WORK_ORDER",
  scores: { WORK_ORDER: 70, TURNOVER: 0 },
  isTie: false,
  validPages: 2,
};

// ─── Eligibility table ──────────────────────────────────────────────────────

test("eligibility: extracted sub-types carry their priority", () => {
  assert.deepEqual(getExtractionEligibility("TURNOVER", "P&L Statement"), {
    requiresExtraction: true,
    priority: 1,
  });
  assert.deepEqual(getExtractionEligibility("WORK_ORDER", "Statement of Work"), {
    requiresExtraction: true,
    priority: 2,
  });
  assert.deepEqual(getExtractionEligibility("WORK_ORDER", "CA Certificate"), {
    requiresExtraction: true,
    priority: 2,
  });
});

test("eligibility: supporting documents are not extracted", () => {
  assert.deepEqual(getExtractionEligibility("TURNOVER", "Balance Sheet"), {
    requiresExtraction: false,
    priority: 3,
  });
  assert.deepEqual(getExtractionEligibility("TURNOVER", "Income Tax Related"), {
    requiresExtraction: false,
    priority: 5,
  });
  assert.deepEqual(getExtractionEligibility("WORK_ORDER", "Other"), {
    requiresExtraction: false,
    priority: 10,
  });
});

test("eligibility: unlisted pairs → not extracted, priority 99", () => {
  assert.deepEqual(getExtractionEligibility("UNKNOWN", "Unknown"), {
    requiresExtraction: false,
    priority: 99,
  });
  assert.deepEqual(getExtractionEligibility("TURNOVER", "Purchase Order"), {
    requiresExtraction: false,
    priority: 99,
  });
});

test("eligibility: merged labels resolve per component", () => {
  assert.deepEqual(
    getExtractionEligibility("TURNOVER", "Balance Sheet + P&L Statement"),
    { requiresExtraction: true, priority: 1 },
  );
  assert.deepEqual(
    getExtractionEligibility("TURNOVER", "Balance Sheet + Auditor's Report"),
    { requiresExtraction: false, priority: 3 },
  );
});

// ─── Field configuration ────────────────────────────────────────────────────

test("fields: required keys per main type", () => {
  assert.deepEqual(getRequiredFields("WORK_ORDER"), ["wo_id", "wo_amount", "client_name"]);
  assert.deepEqual(getRequiredFields("TURNOVER"), ["total_turnover", "period", "company_name"]);
  assert.deepEqual(getRequiredFields("UNKNOWN"), []);
});

test("fields: config includes optional fields", () => {
  const keys = getFieldConfig("TURNOVER").map((f) => f.key);
  assert.deepEqual(keys, [
    "total_turnover",
    "period",
    "company_name",
    "company_type",
    "currency",
    "other_income",
  ]);
  assert.equal(getFieldConfig("UNKNOWN").length, 0);
});

// ─── routeSegment ───────────────────────────────────────────────────────────

test("route: extractable segment above threshold", () => {
  const routed = routeSegment(segment(), CLASSIFICATION);
  assert.equal(routed.requiresExtraction, true);
  assert.equal(routed.priority, 1);
  assert.deepEqual(routed.requiredFields, ["wo_id", "wo_amount", "client_name"]);
  assert.equal(routed.needsReview, false);
  assert.equal(routed.classification, CLASSIFICATION);
  assert.deepEqual(routed.pages, [1, 2]);
});

test("route: non-extracted segment gets no required fields", () => {
  const routed = routeSegment(
    segment({ mainType: "TURNOVER", subType: "Balance Sheet", subTypes: ["Balance Sheet"] }),
    CLASSIFICATION,
  );
  assert.equal(routed.requiresExtraction, false);
  assert.deepEqual(routed.requiredFields, []);
});

test("route: low confidence or UNKNOWN → needsReview", () => {
  assert.equal(routeSegment(segment({ confidence: 0.69 }), CLASSIFICATION).needsReview, true);
  assert.equal(routeSegment(segment({ confidence: 0.7 }), CLASSIFICATION).needsReview, false);
  assert.equal(
    routeSegment(segment({ confidence: 0.5 }), CLASSIFICATION, 0.4).needsReview,
    false,
  );
  assert.equal(
    routeSegment(
      segment({ mainType: "UNKNOWN", subType: "Unknown", subTypes: ["Unknown"], confidence: 1 }),
      CLASSIFICATION,
    ).needsReview,
    true,
  );
});
