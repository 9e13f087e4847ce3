/**
 * Document Classification — Barrel Export
 *
 * Types and pure functions only.
 */

// Types
export type {
  HintType,
  MainType,
  SubType,
  TurnoverSubType,
  WorkOrderSubType,
  SubTypeOrUnknown,
  SubtypeCatalogEntry,
  SubtypeAssignment,
  DetectionMethod,
  ClassificationResult,
  ClassificationScores,
  ExtractionEligibility,
} from "./types";

// Constants
export {
  CLASSIFICATION_SCHEMA_VERSION,
  HINT_TYPES,
  TURNOVER_SUBTYPES,
  WORK_ORDER_SUBTYPES,
  UNKNOWN_SUBTYPE,
} from "./types";
export {
  SUBTYPE_CATALOG,
  MAIN_TYPE_KEYWORDS,
  CROSS_TYPE_SUBTYPES,
  familiesOf,
  isCrossTypeSubtype,
} from "./documentTypes";

// Pure functions
export {
  detectSubtype,
  detectSegmentSubtype,
  annotatePages,
  combineSnippets,
  countKeywordMatches,
  UNKNOWN_ASSIGNMENT,
  type AnnotatedPage,
} from "./subtypeDetector";
export {
  classifySegment,
  classifyAllSegments,
  pagesInRange,
  NO_VALID_DATA_REASON,
  type SegmentClassification,
} from "./multiFactorClassifier";
export { resolveCrossTypeContext, resolveAmbiguousPages } from "./contextResolver";
export {
  getExtractionEligibility,
  getFieldConfig,
  getRequiredFields,
  routeSegment,
  DEFAULT_REVIEW_MIN_CONFIDENCE,
  MERGED_LABEL_SEPARATOR,
  type ExtractionField,
} from "./eligibility";
