/**
 * Scenario aggregation: turns the selected per-year rows into cumulative,
 * sign-normalized series for the chart, plus the rounded annual table.
 */

import type {
  PolicyParameters,
  ScenarioMetric,
  ScenarioRow,
  WealthSeries,
} from "@/lib/types/zod";
import { METRIC_LABELS, SCENARIO_METRICS } from "@/lib/model/constants";
import { lookupAll, type ScenarioTable } from "@/lib/model/scenario-table";
import {
  assertValid,
  validatePolicyParameters,
  type ValidationIssue,
} from "@/lib/model/validation";

export type MetricRows = Record<ScenarioMetric, ScenarioRow>;
export type MetricSeries = Record<ScenarioMetric, WealthSeries>;

/**
 * Round to one decimal place, ties to even on the scaled value
 * (2.25 -> 2.2, 0.75 -> 0.8).
 */
export function roundToTenth(value: number): number {
  const scaled = value * 10;
  const floor = Math.floor(scaled);
  const frac = scaled - floor;
  let whole: number;
  if (frac > 0.5) whole = floor + 1;
  else if (frac < 0.5) whole = floor;
  else whole = floor % 2 === 0 ? floor : floor + 1;
  const rounded = whole / 10;
  return rounded === 0 ? 0 : rounded;
}

/** Running total along the year axis: cum[0] = v[0], cum[t] = cum[t-1] + v[t]. */
export function cumulativeSum(values: WealthSeries): number[] {
  const out: number[] = [];
  let running = 0;
  for (const v of values) {
    running += v;
    out.push(running);
  }
  return out;
}

/**
 * Cumulative magnitude per metric through each year.
 * Costs are stored negative in the source, so absolute values put cost and wealth
 * on the same sign. The Total column never enters these series.
 */
export function aggregate(rows: MetricRows): MetricSeries {
  const magnitude = (row: ScenarioRow): WealthSeries =>
    Object.freeze(cumulativeSum(row.years).map((v) => Math.abs(v)));
  return {
    BudgetEstimate: magnitude(rows.BudgetEstimate),
    "WealthGenerated<25p": magnitude(rows["WealthGenerated<25p"]),
    "WealthGenerated25-50p": magnitude(rows["WealthGenerated25-50p"]),
    TotalWealthGenerated: magnitude(rows.TotalWealthGenerated),
  };
}

export interface AnnualTableRow {
  metric: ScenarioMetric;
  label: string;
  /** Per-year values, rounded to one decimal. */
  years: number[];
  /** Source Total column, rounded to one decimal. */
  total: number;
}

/** Un-aggregated per-year values for tabular display. */
export function toAnnualTable(rows: MetricRows): AnnualTableRow[] {
  return SCENARIO_METRICS.map((metric) => {
    const row = rows[metric];
    return {
      metric,
      label: METRIC_LABELS[metric],
      years: row.years.map(roundToTenth),
      total: roundToTenth(row.total),
    };
  });
}

export interface ChartPoint {
  year: number;
  /** Cumulative total wealth generated. */
  wealth: number;
  /** Cumulative budget cost, as a positive number. */
  cost: number;
}

/** Two-line chart payload: Wealth vs Cost by year. */
export function toChartSeries(aggregated: MetricSeries): ChartPoint[] {
  const wealth = aggregated.TotalWealthGenerated;
  const cost = aggregated.BudgetEstimate;
  return wealth.map((w, year) => ({
    year,
    wealth: roundToTenth(w),
    cost: roundToTenth(cost[year] ?? 0),
  }));
}

export interface ScenarioResult {
  params: PolicyParameters;
  annualTable: AnnualTableRow[];
  cumulative: MetricSeries;
  chart: ChartPoint[];
  /** Full-horizon Total per metric, for the summary display. */
  totals: Record<ScenarioMetric, number>;
  warnings: ValidationIssue[];
}

/**
 * Full recomputation for one parameter change: validate, look up every metric, aggregate.
 * Throws PolicyValidationError for off-grid parameters and ScenarioNotFoundError when
 * the table lacks the combination.
 */
export function runScenario(
  table: ScenarioTable,
  params: PolicyParameters
): ScenarioResult {
  const validation = validatePolicyParameters(params);
  assertValid(validation);

  const rows = lookupAll(table, params);
  const cumulative = aggregate(rows);
  return {
    params,
    annualTable: toAnnualTable(rows),
    cumulative,
    chart: toChartSeries(cumulative),
    totals: {
      BudgetEstimate: rows.BudgetEstimate.total,
      "WealthGenerated<25p": rows["WealthGenerated<25p"].total,
      "WealthGenerated25-50p": rows["WealthGenerated25-50p"].total,
      TotalWealthGenerated: rows.TotalWealthGenerated.total,
    },
    warnings: validation.warnings,
  };
}
