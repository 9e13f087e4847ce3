/**
 * Document Type Catalog
 *
 * Keyword tables are data (subtypeKeywords.json, mainTypeKeywords.json),
 * validated once at module load and frozen. Process-wide constants.
 */

import { z } from "zod";
import subtypeKeywordsJson from "./subtypeKeywords.json";
import mainTypeKeywordsJson from "./mainTypeKeywords.json";
import {
  HINT_TYPES,
  TURNOVER_SUBTYPES,
  WORK_ORDER_SUBTYPES,
  type HintType,
  type SubType,
  type SubtypeCatalogEntry,
} from "./types";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const KeywordListSchema = z
  .array(z.string().trim().min(1).transform((k) => k.toLowerCase()))
  .min(1);

const CatalogEntrySchema = z.discriminatedUnion("mainType", [
  z.object({
    mainType: z.literal("TURNOVER"),
    subType: z.enum(TURNOVER_SUBTYPES),
    keywords: KeywordListSchema,
  }),
  z.object({
    mainType: z.literal("WORK_ORDER"),
    subType: z.enum(WORK_ORDER_SUBTYPES),
    keywords: KeywordListSchema,
  }),
]);

const SubtypeCatalogSchema = z
  .array(CatalogEntrySchema)
  .min(1)
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    entries.forEach((entry, i) => {
      const key = `${entry.mainType}/${entry.subType}`;
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i],
          message: `duplicate catalog entry ${key}`,
        });
      }
      if (entry.subType === "Other") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i],
          message: "'Other' is a catch-all and takes no keywords",
        });
      }
      seen.add(key);
    });
  });

const MainTypeKeywordsSchema = z.object({
  WORK_ORDER: KeywordListSchema,
  TURNOVER: KeywordListSchema,
});

function parseCatalog<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(`❌ Invalid keyword catalog ${name}:`, parsed.error.flatten());
    throw new Error(`CATALOG_INVALID: ${name} (see logs).`);
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Catalog constants
// ---------------------------------------------------------------------------

/** Sub-type detection catalog, in tie-break order. */
export const SUBTYPE_CATALOG: readonly SubtypeCatalogEntry[] = Object.freeze(
  parseCatalog("subtypeKeywords.json", SubtypeCatalogSchema, subtypeKeywordsJson).map(
    (entry): SubtypeCatalogEntry =>
      Object.freeze({
        mainType: entry.mainType,
        subType: entry.subType,
        keywords: Object.freeze([...entry.keywords]),
      }),
  ),
);

/** Main-type keywords used by the multi-factor classifier (factor 2). */
export const MAIN_TYPE_KEYWORDS: Readonly<Record<HintType, readonly string[]>> =
  (() => {
    const parsed = parseCatalog(
      "mainTypeKeywords.json",
      MainTypeKeywordsSchema,
      mainTypeKeywordsJson,
    );
    return Object.freeze({
      WORK_ORDER: Object.freeze([...parsed.WORK_ORDER]),
      TURNOVER: Object.freeze([...parsed.TURNOVER]),
    });
  })();

// ---------------------------------------------------------------------------
// Family lookups
// ---------------------------------------------------------------------------

/** Main types whose family declares the given sub-type, in HINT_TYPES order. */
export function familiesOf(subType: SubType): HintType[] {
  return HINT_TYPES.filter((mainType) =>
    SUBTYPE_CATALOG.some((e) => e.mainType === mainType && e.subType === subType),
  );
}

/**
 * Sub-types detectable in both families (e.g. a CA certificate can certify
 * either turnover or a work order). Their main type needs context.
 */
export const CROSS_TYPE_SUBTYPES: ReadonlySet<SubType> = new Set(
  SUBTYPE_CATALOG.map((e) => e.subType).filter((s) => familiesOf(s).length > 1),
);

export function isCrossTypeSubtype(subType: string): boolean {
  return [...CROSS_TYPE_SUBTYPES].some((s) => s === subType);
}
