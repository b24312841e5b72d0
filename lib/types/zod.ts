/**
 * Zod schemas for the savings match simulator.
 * Policy knobs, scenario table rows, and single-earner projection inputs.
 */

import { z } from "zod";

/** A rate expressed as a decimal fraction (0.03 = 3%). */
const FractionSchema = z.number().finite().min(0).max(1);

export const PhaseoutScenarioSchema = z.enum(["slow", "fast"]);
export type PhaseoutScenario = z.infer<typeof PhaseoutScenarioSchema>;

/** The six knobs that identify one precomputed scenario. */
export const PolicyParametersSchema = z.object({
  matchRate: FractionSchema,
  /** Income threshold (fraction of median earnings) where the match starts to phase out. */
  phaseoutStart: FractionSchema,
  /** Match reduction per thousand dollars of income above phaseoutStart. */
  phaseoutRate: FractionSchema,
  takeupRate: FractionSchema,
  leakageRate: FractionSchema,
  roi: FractionSchema,
});
export type PolicyParameters = z.infer<typeof PolicyParametersSchema>;

export const POLICY_PARAMETER_KEYS = [
  "matchRate",
  "phaseoutStart",
  "phaseoutRate",
  "takeupRate",
  "leakageRate",
  "roi",
] as const satisfies readonly (keyof PolicyParameters)[];

/** What the policy controls capture; phaseout is a named preset rather than two numbers. */
const PolicySelectionSchema = z.object({
  matchRate: FractionSchema,
  phaseout: PhaseoutScenarioSchema,
  takeupRate: FractionSchema,
  leakageRate: FractionSchema,
  roi: FractionSchema,
});
export type PolicySelection = z.infer<typeof PolicySelectionSchema>;

export const ScenarioMetricSchema = z.enum([
  "BudgetEstimate",
  "WealthGenerated<25p",
  "WealthGenerated25-50p",
  "TotalWealthGenerated",
]);
export type ScenarioMetric = z.infer<typeof ScenarioMetricSchema>;

/** Year-indexed values; index 0 is the program start year. */
export type WealthSeries = readonly number[];

export interface ScenarioRow {
  metric: ScenarioMetric;
  params: PolicyParameters;
  /** Per-year values, one per year column in the source table. */
  years: WealthSeries;
  /** Full-horizon value from the source's Total column. Summary display only. */
  total: number;
}

/** Single-earner projection inputs. Income in dollars, everything else a fraction. */
export const ProjectionInputsSchema = z.object({
  income: z.number().finite().min(0),
  roi: FractionSchema,
  contributionRate: FractionSchema,
  matchRate: FractionSchema,
  leakageRate: FractionSchema,
});
export type ProjectionInputs = z.infer<typeof ProjectionInputsSchema>;

/**
 * How matched and own contributions combine before compounding.
 * SEPARATE: match added in full, leakage applies to own contribution only.
 * COMBINED: match and own contribution pooled, leakage applies to the pool.
 */
const ProjectionVariantSchema = z.enum(["SEPARATE", "COMBINED"]);
export type ProjectionVariant = z.infer<typeof ProjectionVariantSchema>;
