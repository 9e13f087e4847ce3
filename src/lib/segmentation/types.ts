/**
 * Page Segmentation — Types
 *
 * Pure type definitions. No runtime deps.
 */

import type {
  ClassificationResult,
  MainType,
  SubTypeOrUnknown,
} from "@/lib/classification/types";

export const SEGMENTATION_VERSION = "v1.0";

/** Inclusive, 1-based page range */
export type PageRange = {
  startPage: number;
  endPage: number;
};

export type Segment = PageRange & {
  segmentId: number;
  /** Exactly [startPage..endPage] */
  pages: number[];
  mainType: MainType;
  /** Catalog sub-type, or "<prev> + <merged>" after a singleton merge */
  subType: string;
  /** Component sub-types in page order, de-duplicated */
  subTypes: SubTypeOrUnknown[];
  confidence: number;
};

export type SegmentationStrategy = "homogeneous" | "boundary";

export type RoutedSegment = Segment & {
  classification: ClassificationResult;
  requiresExtraction: boolean;
  priority: number;
  requiredFields: string[];
  needsReview: boolean;
};

export type SegmentationRunResult = {
  version: string;
  strategy: SegmentationStrategy;
  totalPages: number;
  /** Pages that resolved to a successful analysis */
  validPages: number;
  segments: RoutedSegment[];
};
