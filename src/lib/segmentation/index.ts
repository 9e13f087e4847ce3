/**
 * Page Segmentation — Barrel Export
 */

export type {
  PageRange,
  Segment,
  SegmentationStrategy,
  RoutedSegment,
  SegmentationRunResult,
} from "./types";
export { SEGMENTATION_VERSION } from "./types";

export { detectBoundaries } from "./detectBoundaries";
export {
  buildHomogeneousSegments,
  mergeSingletonSegments,
  getDetailedSegments,
  getSegmentBoundaries,
  DEFAULT_MERGE_MIN_CONFIDENCE,
  type HomogeneousOptions,
} from "./homogeneousSegments";
export {
  orchestrateSegmentation,
  type OrchestrateSegmentationArgs,
} from "./orchestrateSegmentation";
