/**
 * Page Record Normalizer
 *
 * Tolerant lookup of one page's analysis by page number. Records may arrive
 * out of order or with inconsistent numbering.
 *
 * Resolution order (first match wins):
 *   1. declared pageNumber matches AND the record succeeded
 *   2. positional: records[pageNumber - 1] succeeded
 *   3. a succeeded record whose payload echoes the requested page number
 *
 * Never throws. null means "no data for this page".
 */

import type { PagePayload, PageRecord, SucceededPageRecord } from "./types";

export function isSucceeded(record: PageRecord | undefined): record is SucceededPageRecord {
  return record?.succeeded === true;
}

export function lookupPage(
  records: readonly PageRecord[],
  pageNumber: number,
): PagePayload | null {
  for (const record of records) {
    if (record.pageNumber === pageNumber && isSucceeded(record)) {
      return record.payload;
    }
  }

  const positional = records[pageNumber - 1];
  if (Number.isInteger(pageNumber) && isSucceeded(positional)) {
    return positional.payload;
  }

  for (const record of records) {
    if (isSucceeded(record) && record.payload.pageNumber === pageNumber) {
      return record.payload;
    }
  }

  return null;
}

export type ResolvedPage = {
  pageNumber: number;
  payload: PagePayload;
};

/** Resolve a page list, keeping only pages with data, in page order. */
export function collectSegmentPayloads(
  records: readonly PageRecord[],
  pages: readonly number[],
): ResolvedPage[] {
  const resolved: ResolvedPage[] = [];
  for (const pageNumber of pages) {
    const payload = lookupPage(records, pageNumber);
    if (payload) resolved.push({ pageNumber, payload });
  }
  return resolved;
}
