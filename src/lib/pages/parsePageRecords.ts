/**
 * Page Analysis Parser
 *
 * Turns the vision page analyzer's raw JSON into typed PageRecords.
 * Every payload field is parsed on its own: a malformed field falls back to
 * its empty/false/LOW default and the rest of the page still counts.
 *
 * Pure function — no IO. Never throws.
 */

import { z } from "zod";
import { HINT_TYPES, type HintType } from "@/lib/classification/types";
import {
  DATA_DENSITIES,
  type PageKind,
  type PagePayload,
  type PageRecord,
  type StructureFlags,
} from "./types";

// ---------------------------------------------------------------------------
// Analyzer vocabulary
// ---------------------------------------------------------------------------

/** Analyzer page_type labels → PageKind */
const PAGE_TYPE_MAP: Record<string, PageKind> = {
  TITLE_PAGE: "title",
  TITLE: "title",
  DATA_PAGE: "data",
  DATA: "data",
  SEPARATOR: "separator",
  TOC: "toc",
  CONTINUATION: "continuation",
  END_PAGE: "end",
  END: "end",
  MAGAZINE_LAYOUT: "magazine",
  MAGAZINE: "magazine",
  CERTIFICATE: "certificate",
};

/** Analyzer keys the engine reads. Everything else lands in `extras`. */
const CONSUMED_KEYS: ReadonlySet<string> = new Set([
  "page_type",
  "document_type_hints",
  "key_text_snippets",
  "data_assessment",
  "confidence",
  "is_document_start",
  "is_document_end",
  "continues_previous",
  "page_number",
]);

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const FlagSchema = z.boolean().catch(false);

const DEFAULT_FLAGS: StructureFlags = {
  hasTables: false,
  hasForms: false,
  hasKeyValues: false,
  dataDensity: "LOW",
};

const DataAssessmentSchema = z
  .object({
    has_tables: FlagSchema,
    has_forms: FlagSchema,
    has_key_values: FlagSchema,
    data_density: z
      .string()
      .transform((d) => d.trim().toUpperCase())
      .pipe(z.enum(DATA_DENSITIES))
      .catch("LOW"),
  })
  .transform(
    (a): StructureFlags => ({
      hasTables: a.has_tables,
      hasForms: a.has_forms,
      hasKeyValues: a.has_key_values,
      dataDensity: a.data_density,
    }),
  )
  .catch(DEFAULT_FLAGS);

const PayloadSchema = z.object({
  page_type: z
    .string()
    .transform((t): PageKind | null => PAGE_TYPE_MAP[t.trim().toUpperCase()] ?? null)
    .catch(null),
  document_type_hints: z.array(z.unknown()).catch([]),
  key_text_snippets: z.array(z.unknown()).catch([]),
  data_assessment: DataAssessmentSchema,
  confidence: z.number().finite().catch(0),
  is_document_start: FlagSchema,
  is_document_end: FlagSchema,
  continues_previous: FlagSchema,
  page_number: z.number().int().positive().optional().catch(undefined),
});

const RawRecordSchema = z.object({
  success: z.boolean().catch(false),
  page_number: z.number().int().positive().optional().catch(undefined),
  data: z.record(z.unknown()).optional().catch(undefined),
  error: z.string().optional().catch(undefined),
});

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

function isHintType(value: string): value is HintType {
  return HINT_TYPES.some((h) => h === value);
}

/** Known hints only (OTHER and friends are dropped), first occurrence order. */
function normalizeHints(raw: unknown[]): HintType[] {
  const hints: HintType[] = [];
  for (const value of raw) {
    if (typeof value !== "string") continue;
    const upper = value.trim().toUpperCase();
    if (isHintType(upper) && !hints.includes(upper)) hints.push(upper);
  }
  return hints;
}

function normalizeSnippets(raw: unknown[]): string[] {
  return raw.filter((s): s is string => typeof s === "string");
}

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

function parsePayload(data: Record<string, unknown>): PagePayload {
  // Every field carries its own .catch(), so this parse cannot fail.
  const p = PayloadSchema.parse(data);

  const extras: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (!CONSUMED_KEYS.has(key)) extras[key] = value;
  }

  const payload: PagePayload = {
    pageKind: p.page_type,
    typeHints: normalizeHints(p.document_type_hints),
    textSnippets: normalizeSnippets(p.key_text_snippets),
    structureFlags: p.data_assessment,
    vlmConfidence: clamp01(p.confidence),
    isSegmentStart: p.is_document_start,
    isSegmentEnd: p.is_document_end,
    continuesPrevious: p.continues_previous,
    extras,
  };
  if (p.page_number !== undefined) payload.pageNumber = p.page_number;
  return payload;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse one analyzer entry. `position` is the 1-based array position, used
 * when the entry does not declare a usable page number.
 */
export function parsePageRecord(raw: unknown, position: number): PageRecord {
  const parsed = RawRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      pageNumber: position,
      succeeded: false,
      error: "malformed page record",
    };
  }

  const { success, page_number, data, error } = parsed.data;
  const pageNumber = page_number ?? position;

  if (!success) {
    return { pageNumber, succeeded: false, error: error ?? null };
  }

  return {
    pageNumber,
    succeeded: true,
    payload: parsePayload(data ?? {}),
  };
}

/** Parse the analyzer's page list. Anything that is not an array yields []. */
export function parsePageRecords(raw: unknown): PageRecord[] {
  if (!Array.isArray(raw)) return [];
  return raw.map((entry: unknown, i) => parsePageRecord(entry, i + 1));
}
