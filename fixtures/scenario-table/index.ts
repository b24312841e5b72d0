/**
 * Small in-memory scenario tables for model and API tests.
 * Two years per row; the default combination carries the values
 * Year 0: [-100, 10, 5, 15], Year 1: [-20, 2, 1, 3] in metric order.
 */

import type {
  PolicyParameters,
  ScenarioMetric,
  ScenarioRow,
} from "@/lib/types/zod";
import { buildScenarioTable, type ScenarioTable } from "@/lib/model/scenario-table";

export const DEFAULT_PARAMS: PolicyParameters = {
  matchRate: 0.03,
  phaseoutStart: 0.5,
  phaseoutRate: 0.03,
  takeupRate: 0.85,
  leakageRate: 0.3,
  roi: 0.03,
};

/** On the grid, with warnings: leakage 40%, roi 7%. */
export const HIGH_PARAMS: PolicyParameters = {
  matchRate: 0.05,
  phaseoutStart: 0.67,
  phaseoutRate: 0.05,
  takeupRate: 1,
  leakageRate: 0.4,
  roi: 0.07,
};

export function makeRow(
  metric: ScenarioMetric,
  params: PolicyParameters,
  years: number[],
  total: number
): ScenarioRow {
  return { metric, params, years, total };
}

export function getFixtureRows(): Record<ScenarioMetric, ScenarioRow[]> {
  return {
    BudgetEstimate: [
      makeRow("BudgetEstimate", DEFAULT_PARAMS, [-100, -20], -123.456),
      makeRow("BudgetEstimate", HIGH_PARAMS, [-200, -40], -240),
    ],
    "WealthGenerated<25p": [
      makeRow("WealthGenerated<25p", DEFAULT_PARAMS, [10, 2], 12),
      makeRow("WealthGenerated<25p", HIGH_PARAMS, [20, 4], 24),
    ],
    "WealthGenerated25-50p": [
      makeRow("WealthGenerated25-50p", DEFAULT_PARAMS, [5, 1], 6),
      makeRow("WealthGenerated25-50p", HIGH_PARAMS, [10, 2], 12),
    ],
    TotalWealthGenerated: [
      makeRow("TotalWealthGenerated", DEFAULT_PARAMS, [15, 3], 999),
      makeRow("TotalWealthGenerated", HIGH_PARAMS, [30, 6], 36),
    ],
  };
}

export function getFixtureTable(): ScenarioTable {
  return buildScenarioTable(getFixtureRows());
}
