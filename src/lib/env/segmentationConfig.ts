import { z } from "zod";

/**
 * Segmentation engine settings.
 *
 * This is the SINGLE SOURCE OF TRUTH for SEGMENTATION_* variables — no other
 * file should read them from process.env directly.
 */

const BooleanFlag = z
  .enum(["true", "false", "TRUE", "FALSE", "1", "0"])
  .transform((v) => v === "true" || v === "TRUE" || v === "1");

const Confidence = z.coerce.number().min(0).max(1);

export const SegmentationOptionsSchema = z.object({
  strategy: z.enum(["homogeneous", "boundary"]),
  mergeSingletons: z.boolean(),
  mergeMinConfidence: z.number().min(0).max(1),
  reviewMinConfidence: z.number().min(0).max(1),
});

export type SegmentationConfig = z.infer<typeof SegmentationOptionsSchema>;

const SegmentationEnvSchema = z.object({
  SEGMENTATION_STRATEGY: z.enum(["homogeneous", "boundary"]).default("homogeneous"),
  SEGMENTATION_MERGE_SINGLETONS: BooleanFlag.default("true"),
  SEGMENTATION_MERGE_MIN_CONFIDENCE: Confidence.default(0.6),
  SEGMENTATION_REVIEW_MIN_CONFIDENCE: Confidence.default(0.7),
});

export function loadSegmentationConfig(
  env: Record<string, string | undefined> = process.env,
): SegmentationConfig {
  const parsed = SegmentationEnvSchema.safeParse(env);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("❌ Invalid segmentation env:", parsed.error.flatten().fieldErrors);
    throw new Error("SEGMENTATION_CONFIG_INVALID: see logs for the offending variables.");
  }
  return {
    strategy: parsed.data.SEGMENTATION_STRATEGY,
    mergeSingletons: parsed.data.SEGMENTATION_MERGE_SINGLETONS,
    mergeMinConfidence: parsed.data.SEGMENTATION_MERGE_MIN_CONFIDENCE,
    reviewMinConfidence: parsed.data.SEGMENTATION_REVIEW_MIN_CONFIDENCE,
  };
}
