/**
 * Default constants and the enumerated scenario grid.
 */

import type {
  PhaseoutScenario,
  PolicySelection,
  ProjectionInputs,
  ScenarioMetric,
} from "@/lib/types/zod";

/** Years simulated after program start. Series carry HORIZON_YEARS + 1 points. */
export const HORIZON_YEARS = 40;

/** Upper bound for assumed early-withdrawal leakage. */
export const MAX_LEAKAGE_RATE = 0.5;

export const PHASEOUT_PRESETS: Record<
  PhaseoutScenario,
  { start: number; rate: number }
> = {
  slow: { start: 0.5, rate: 0.03 },
  fast: { start: 0.67, rate: 0.05 },
};

/** Parameter values for which precomputed scenario rows exist. */
export const SCENARIO_GRID = {
  matchRate: [0.03, 0.04, 0.05],
  phaseout: ["slow", "fast"],
  takeupRate: [0.7, 0.85, 1],
  leakageRate: [0, 0.1, 0.2, 0.3, 0.4],
  roi: [0.03, 0.05, 0.07],
} as const;

export const DEFAULT_POLICY_SELECTION: PolicySelection = {
  matchRate: 0.03,
  phaseout: "slow",
  takeupRate: 0.85,
  leakageRate: 0.3,
  roi: 0.03,
};

export const DEFAULT_PROJECTION_INPUTS: ProjectionInputs = {
  income: 30_000,
  roi: 0.03,
  contributionRate: 0.03,
  matchRate: 0.03,
  leakageRate: 0.4,
};

/** Display order of metrics in tables and aggregation output. */
export const SCENARIO_METRICS = [
  "BudgetEstimate",
  "WealthGenerated<25p",
  "WealthGenerated25-50p",
  "TotalWealthGenerated",
] as const satisfies readonly ScenarioMetric[];

export const METRIC_LABELS: Record<ScenarioMetric, string> = {
  BudgetEstimate: "Budget Estimate",
  "WealthGenerated<25p": "Wealth Generated for <25p",
  "WealthGenerated25-50p": "Wealth Generated for 25-50p",
  TotalWealthGenerated: "Total Wealth Generated",
};

/** CSV file stem (under the data directory) holding each metric's rows. */
export const METRIC_SOURCE_FILES: Record<ScenarioMetric, string> = {
  BudgetEstimate: "cost",
  "WealthGenerated<25p": "wealth_25",
  "WealthGenerated25-50p": "wealth_25_50",
  TotalWealthGenerated: "total_wealth",
};

/** Returns above this are flagged as optimistic. */
export const AGGRESSIVE_ROI_THRESHOLD = 0.07;

/** Leakage at or above this is flagged as a heavy early-withdrawal assumption. */
export const HIGH_LEAKAGE_THRESHOLD = 0.4;
