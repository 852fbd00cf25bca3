import { z } from "zod";
import {
  DEFAULT_GAP_BIN_MINUTES,
  DEFAULT_SWEEP_FROM_MINUTES,
  DEFAULT_SWEEP_STEP_MINUTES,
  DEFAULT_SWEEP_TO_MINUTES,
  DEFAULT_THRESHOLD_MINUTES,
  GAP_DISTRIBUTION_MAX_MINUTES,
  MAX_SWEEP_POINTS,
  RENTAL_SCOPE_VALUES,
} from "../delay-analysis.const";

const minutesSchema = z.coerce.number().int().min(0);

const thresholdListSchema = z
  .string()
  .trim()
  .regex(/^\d+(\s*,\s*\d+)*$/, "thresholds must be a comma-separated list of whole minutes")
  .transform((value) => value.split(",").map((part) => Number(part.trim())))
  .pipe(z.array(z.number().int().min(0)).max(MAX_SWEEP_POINTS));

const sweepRangeShape = {
  from: minutesSchema.default(DEFAULT_SWEEP_FROM_MINUTES),
  to: minutesSchema.default(DEFAULT_SWEEP_TO_MINUTES),
  step: z.coerce.number().int().min(1).default(DEFAULT_SWEEP_STEP_MINUTES),
  thresholds: thresholdListSchema.optional(),
};

const scopeSchema = z.enum(RENTAL_SCOPE_VALUES).default("all");

export const thresholdImpactQuerySchema = z.object({
  threshold: minutesSchema.default(DEFAULT_THRESHOLD_MINUTES),
  scope: scopeSchema,
});

export type ThresholdImpactQueryDto = z.infer<typeof thresholdImpactQuerySchema>;

export const thresholdSweepQuerySchema = z.object({
  ...sweepRangeShape,
  scope: scopeSchema,
});

export type ThresholdSweepQueryDto = z.infer<typeof thresholdSweepQuerySchema>;

export const scopeComparisonQuerySchema = z.object({
  ...sweepRangeShape,
  threshold: minutesSchema.default(DEFAULT_THRESHOLD_MINUTES),
});

export type ScopeComparisonQueryDto = z.infer<typeof scopeComparisonQuerySchema>;

/** Explicit thresholds, or an inclusive range. */
export type ThresholdSelection = Pick<ThresholdSweepQueryDto, "from" | "to" | "step" | "thresholds">;

export const gapDistributionQuerySchema = z.object({
  binSize: z.coerce
    .number()
    .int()
    .min(1)
    .max(GAP_DISTRIBUTION_MAX_MINUTES)
    .default(DEFAULT_GAP_BIN_MINUTES),
});

export type GapDistributionQueryDto = z.infer<typeof gapDistributionQuerySchema>;
