/**
 * Boundary Detector
 *
 * Splits pages 1..N into document ranges from the analyzer's
 * "is this a new document" hints.
 *
 * Single forward cursor; must run in page order. Pages without data never
 * open a boundary and stay with whichever range is open.
 *
 * Pure function — no IO.
 */

import { lookupPage } from "@/lib/pages/lookupPage";
import type { PageRecord } from "@/lib/pages/types";
import type { PageRange } from "./types";

export function detectBoundaries(
  records: readonly PageRecord[],
  totalPages: number = records.length,
): PageRange[] {
  if (totalPages < 1) return [];

  const ranges: PageRange[] = [];
  let currentStart = 1;

  for (let page = 2; page <= totalPages; page++) {
    const payload = lookupPage(records, page);
    if (payload?.isSegmentStart) {
      ranges.push({ startPage: currentStart, endPage: page - 1 });
      currentStart = page;
    }
  }

  ranges.push({ startPage: currentStart, endPage: totalPages });
  return ranges;
}
