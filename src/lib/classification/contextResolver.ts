/**
 * Cross-Type Context Resolver
 *
 * Some sub-types (a CA certificate) legitimately belong to either family.
 * Their main type follows the majority of already-classified neighbours in
 * the same boundary; an exact tie goes to TURNOVER.
 *
 * Pure functions — no shared state.
 */

import { isCrossTypeSubtype } from "./documentTypes";
import type { AnnotatedPage } from "./subtypeDetector";
import type { HintType, MainType } from "./types";
import type { PageRange } from "@/lib/segmentation/types";

/** Majority vote over neighbour main types. UNKNOWN neighbours do not vote. */
export function resolveCrossTypeContext(neighbours: readonly MainType[]): HintType {
  let turnover = 0;
  let workOrder = 0;
  for (const mainType of neighbours) {
    if (mainType === "TURNOVER") turnover++;
    else if (mainType === "WORK_ORDER") workOrder++;
  }

  if (workOrder > turnover) return "WORK_ORDER";
  return "TURNOVER";
}

/**
 * Re-assign the main type of every cross-type page from the other pages of
 * its boundary range. Only unambiguous pages vote. Returns new page objects;
 * the input is not mutated.
 */
export function resolveAmbiguousPages(
  pages: readonly AnnotatedPage[],
  ranges: readonly PageRange[],
): AnnotatedPage[] {
  const isAmbiguous = (p: AnnotatedPage) =>
    p.assignment.mainType !== "UNKNOWN" && isCrossTypeSubtype(p.assignment.subType);

  return pages.map((page) => {
    if (!isAmbiguous(page)) return page;

    const range = ranges.find(
      (r) => page.pageNumber >= r.startPage && page.pageNumber <= r.endPage,
    );
    const neighbours = pages
      .filter(
        (p) =>
          p !== page &&
          !isAmbiguous(p) &&
          (!range || (p.pageNumber >= range.startPage && p.pageNumber <= range.endPage)),
      )
      .map((p) => p.assignment.mainType);

    return {
      pageNumber: page.pageNumber,
      assignment: {
        ...page.assignment,
        mainType: resolveCrossTypeContext(neighbours),
        method: "context",
      },
    };
  });
}
