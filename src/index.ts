export * from "@/lib/classification";
export * from "@/lib/segmentation";

export type {
  PageKind,
  DataDensity,
  StructureFlags,
  PagePayload,
  PageRecord,
  SucceededPageRecord,
} from "@/lib/pages/types";
export { PAGE_KINDS, DATA_DENSITIES } from "@/lib/pages/types";
export { parsePageRecords, parsePageRecord } from "@/lib/pages/parsePageRecords";
export {
  lookupPage,
  collectSegmentPayloads,
  isSucceeded,
  type ResolvedPage,
} from "@/lib/pages/lookupPage";

export {
  loadSegmentationConfig,
  type SegmentationConfig,
} from "@/lib/env/segmentationConfig";
export {
  writeEvent,
  consoleSink,
  createMemorySink,
  type LedgerEvent,
  type LedgerEventKind,
  type LedgerEventSink,
} from "@/lib/ledger/writeEvent";
