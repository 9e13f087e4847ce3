/**
 * Extraction Eligibility — Deterministic Routing Rules (PURE)
 *
 * No IO, no side effects. Fully testable.
 *
 *  - getExtractionEligibility() — (main type, sub-type) → extract? + priority
 *  - getFieldConfig() / getRequiredFields() — fields the extraction
 *    collaborator must produce per main type
 *  - routeSegment() — enrich a segment for downstream field extraction
 */

import { z } from "zod";
import extractionFieldsJson from "./extractionFields.json";
import type {
  ClassificationResult,
  ExtractionEligibility,
  HintType,
  MainType,
} from "./types";
import type { RoutedSegment, Segment } from "@/lib/segmentation/types";

// ─── Eligibility table ──────────────────────────────────────────────────────

/** Priority for anything the table does not know */
const UNLISTED_PRIORITY = 99;

/** Separator used by the singleton merge for combined sub-type labels */
export const MERGED_LABEL_SEPARATOR = " + ";

/** Below this a segment is flagged for human review */
export const DEFAULT_REVIEW_MIN_CONFIDENCE = 0.7;

const ELIGIBILITY: ReadonlyMap<string, ExtractionEligibility> = new Map([
  // Turnover
  ["TURNOVER/P&L Statement", { requiresExtraction: true, priority: 1 }],
  ["TURNOVER/CA Certificate", { requiresExtraction: true, priority: 2 }],
  ["TURNOVER/Balance Sheet", { requiresExtraction: false, priority: 3 }],
  ["TURNOVER/Auditor's Report", { requiresExtraction: false, priority: 4 }],
  ["TURNOVER/Income Tax Related", { requiresExtraction: false, priority: 5 }],
  ["TURNOVER/Other", { requiresExtraction: false, priority: 10 }],
  // Work order
  ["WORK_ORDER/Purchase Order", { requiresExtraction: true, priority: 1 }],
  ["WORK_ORDER/Completion Certificate", { requiresExtraction: true, priority: 2 }],
  ["WORK_ORDER/Work Contract", { requiresExtraction: true, priority: 2 }],
  ["WORK_ORDER/Statement of Work", { requiresExtraction: true, priority: 2 }],
  ["WORK_ORDER/CA Certificate", { requiresExtraction: true, priority: 2 }],
  ["WORK_ORDER/Other", { requiresExtraction: false, priority: 10 }],
]);

const NOT_ELIGIBLE: ExtractionEligibility = Object.freeze({
  requiresExtraction: false,
  priority: UNLISTED_PRIORITY,
});

/**
 * TOTAL function — every (main type, label) pair yields a result.
 * A merged label ("P&L Statement + Balance Sheet") resolves per component:
 * extract if any component does, at the best component priority.
 */
export function getExtractionEligibility(
  mainType: MainType,
  subType: string,
): ExtractionEligibility {
  const components = subType.split(MERGED_LABEL_SEPARATOR);

  let requiresExtraction = false;
  let priority = UNLISTED_PRIORITY;
  for (const component of components) {
    const entry = ELIGIBILITY.get(`${mainType}/${component.trim()}`) ?? NOT_ELIGIBLE;
    requiresExtraction = requiresExtraction || entry.requiresExtraction;
    priority = Math.min(priority, entry.priority);
  }

  return { requiresExtraction, priority };
}

// ─── Field configuration ────────────────────────────────────────────────────

const FieldSchema = z.object({
  key: z.string().min(1),
  label: z.string().min(1),
  required: z.boolean(),
  valueType: z.enum(["string", "number", "date"]),
  minConfidence: z.number().min(0).max(1),
});

export type ExtractionField = z.infer<typeof FieldSchema>;

const FieldConfigSchema = z.object({
  WORK_ORDER: z.array(FieldSchema),
  TURNOVER: z.array(FieldSchema),
});

const FIELD_CONFIG: Readonly<Record<HintType, readonly ExtractionField[]>> =
  FieldConfigSchema.parse(extractionFieldsJson);

/** Field definitions for a main type; UNKNOWN has none. */
export function getFieldConfig(mainType: MainType): readonly ExtractionField[] {
  return mainType === "UNKNOWN" ? [] : FIELD_CONFIG[mainType];
}

export function getRequiredFields(mainType: MainType): string[] {
  return getFieldConfig(mainType)
    .filter((f) => f.required)
    .map((f) => f.key);
}

// ─── Segment routing ────────────────────────────────────────────────────────

/**
 * Enrich a segment with classification and routing metadata.
 *
 * needsReview when the main type is UNKNOWN or the segment confidence is
 * below `reviewMinConfidence`.
 */
export function routeSegment(
  segment: Segment,
  classification: ClassificationResult,
  reviewMinConfidence: number = DEFAULT_REVIEW_MIN_CONFIDENCE,
): RoutedSegment {
  const { requiresExtraction, priority } = getExtractionEligibility(
    segment.mainType,
    segment.subType,
  );

  return {
    ...segment,
    classification,
    requiresExtraction,
    priority,
    requiredFields: requiresExtraction ? getRequiredFields(segment.mainType) : [],
    needsReview:
      segment.mainType === "UNKNOWN" || segment.confidence < reviewMinConfidence,
  };
}
