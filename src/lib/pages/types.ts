/**
 * Page Records — Types
 *
 * One record per scanned page, as produced by the vision page analyzer.
 * Pure type definitions. No runtime deps beyond the enum tuples.
 */

import type { HintType } from "@/lib/classification/types";

// ---------------------------------------------------------------------------
// Page kinds
// ---------------------------------------------------------------------------

export const PAGE_KINDS = [
  "title",
  "data",
  "separator",
  "toc",
  "continuation",
  "end",
  "magazine",
  "certificate",
] as const;

export type PageKind = (typeof PAGE_KINDS)[number];

export const DATA_DENSITIES = ["LOW", "MEDIUM", "HIGH"] as const;

export type DataDensity = (typeof DATA_DENSITIES)[number];

// ---------------------------------------------------------------------------
// Payload
// ---------------------------------------------------------------------------

export type StructureFlags = {
  hasTables: boolean;
  hasForms: boolean;
  hasKeyValues: boolean;
  dataDensity: DataDensity;
};

export type PagePayload = {
  /** null when the analyzer reported a kind outside PAGE_KINDS */
  pageKind: PageKind | null;
  typeHints: HintType[];
  textSnippets: string[];
  structureFlags: StructureFlags;
  vlmConfidence: number;
  isSegmentStart: boolean;
  isSegmentEnd: boolean;
  continuesPrevious: boolean;
  /** Page number echoed inside the analysis itself, when present */
  pageNumber?: number;
  /** Analyzer fields not consumed by the engine, passed through untouched */
  extras: Record<string, unknown>;
};

// ---------------------------------------------------------------------------
// Record
// ---------------------------------------------------------------------------

export type PageRecord =
  | {
      pageNumber: number;
      succeeded: true;
      payload: PagePayload;
    }
  | {
      pageNumber: number;
      succeeded: false;
      error: string | null;
    };

export type SucceededPageRecord = Extract<PageRecord, { succeeded: true }>;
