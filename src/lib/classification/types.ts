/**
 * Two-Level Document Classification — Types
 *
 * Main type (document family) → sub-type (specific document kind).
 * Pure module — no IO.
 */

// ---------------------------------------------------------------------------
// Schema Version
// ---------------------------------------------------------------------------

/** Bump on any keyword, weight or tie-break change. No silent behavior shifts. */
export const CLASSIFICATION_SCHEMA_VERSION = "v1.1";

// ---------------------------------------------------------------------------
// Main types
// ---------------------------------------------------------------------------

/** Main types a page hint may carry. UNKNOWN is never hinted. */
export const HINT_TYPES = ["TURNOVER", "WORK_ORDER"] as const;

export type HintType = (typeof HINT_TYPES)[number];

export type MainType = HintType | "UNKNOWN";

// ---------------------------------------------------------------------------
// Sub-types
// ---------------------------------------------------------------------------

export const TURNOVER_SUBTYPES = [
  "P&L Statement",
  "CA Certificate",
  "Balance Sheet",
  "Auditor's Report",
  "Income Tax Related",
  "Other",
] as const;

export const WORK_ORDER_SUBTYPES = [
  "Purchase Order",
  "Completion Certificate",
  "Work Contract",
  "Statement of Work",
  "CA Certificate",
  "Other",
] as const;

export type TurnoverSubType = (typeof TURNOVER_SUBTYPES)[number];
export type WorkOrderSubType = (typeof WORK_ORDER_SUBTYPES)[number];

export type SubType = TurnoverSubType | WorkOrderSubType;

/** Sentinel for pages with no keyword evidence */
export const UNKNOWN_SUBTYPE = "Unknown";

export type SubTypeOrUnknown = SubType | typeof UNKNOWN_SUBTYPE;

// ---------------------------------------------------------------------------
// Keyword catalog
// ---------------------------------------------------------------------------

/**
 * One detectable sub-type. Catalog order is the tie-break order:
 * the first-declared entry wins on equal match counts.
 */
export type SubtypeCatalogEntry = {
  mainType: HintType;
  subType: SubType;
  keywords: readonly string[];
};

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type DetectionMethod = "keyword" | "context" | "none";

export type SubtypeAssignment = {
  mainType: MainType;
  subType: SubTypeOrUnknown;
  confidence: number; // 0.0 – 1.0
  method: DetectionMethod;
};

export type ClassificationScores = Record<HintType, number>; // 0 – 100 each

export type ClassificationResult = {
  documentType: MainType;
  confidence: number; // 0.0 – 1.0
  reasoning: string;
  scores: ClassificationScores;
  /** True only for the equal-score, equal-hint default */
  isTie: boolean;
  /** Pages in the range that resolved to a successful analysis */
  validPages: number;
};

export type ExtractionEligibility = {
  requiresExtraction: boolean;
  /** Lower = more important */
  priority: number;
};
