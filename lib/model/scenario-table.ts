/**
 * In-memory scenario table and exact-match lookup.
 * Built once from the source rows, then only read. Rows and their year arrays are
 * frozen; the maps are exposed as ReadonlyMap and are not mutated after the build.
 */

import type {
  PolicyParameters,
  ScenarioMetric,
  ScenarioRow,
} from "@/lib/types/zod";
import { POLICY_PARAMETER_KEYS } from "@/lib/types/zod";
import { SCENARIO_METRICS } from "@/lib/model/constants";
import { ScenarioNotFoundError, ScenarioTableError } from "@/lib/model/errors";

export interface ScenarioTable {
  readonly rows: ReadonlyMap<ScenarioMetric, ReadonlyMap<string, ScenarioRow>>;
  /** Number of year columns every row carries. */
  readonly yearCount: number;
}

/**
 * Canonical key for a parameter combination.
 * String(number) round-trips doubles, so key equality is exact numeric equality.
 */
export function scenarioKey(params: PolicyParameters): string {
  return POLICY_PARAMETER_KEYS.map((k) => String(params[k])).join("|");
}

/**
 * Build the lookup structure. Every metric must be present, combinations must be
 * unique within a metric, and all rows must share one year count.
 */
export function buildScenarioTable(
  rowsByMetric: Record<ScenarioMetric, readonly ScenarioRow[]>
): ScenarioTable {
  const rows = new Map<ScenarioMetric, ReadonlyMap<string, ScenarioRow>>();
  let yearCount: number | null = null;

  for (const metric of SCENARIO_METRICS) {
    const source = rowsByMetric[metric];
    if (!source.length) {
      throw new ScenarioTableError(`No rows for metric ${metric}`);
    }
    const byKey = new Map<string, ScenarioRow>();
    for (const row of source) {
      if (row.metric !== metric) {
        throw new ScenarioTableError(
          `Row for ${row.metric} listed under ${metric}`
        );
      }
      if (yearCount === null) yearCount = row.years.length;
      if (row.years.length !== yearCount) {
        throw new ScenarioTableError(
          `${metric} row ${scenarioKey(row.params)} has ${row.years.length} years, expected ${yearCount}`
        );
      }
      const key = scenarioKey(row.params);
      if (byKey.has(key)) {
        throw new ScenarioTableError(`Duplicate ${metric} row for ${key}`);
      }
      byKey.set(key, Object.freeze({ ...row, years: Object.freeze([...row.years]) }));
    }
    rows.set(metric, byKey);
  }

  return Object.freeze({ rows, yearCount: yearCount ?? 0 });
}

/** Row for one metric matching all six parameters exactly. */
export function lookup(
  table: ScenarioTable,
  metric: ScenarioMetric,
  params: PolicyParameters
): ScenarioRow {
  const row = table.rows.get(metric)?.get(scenarioKey(params));
  if (!row) throw new ScenarioNotFoundError(metric, params);
  return row;
}

/** One row per metric for the same parameter combination. */
export function lookupAll(
  table: ScenarioTable,
  params: PolicyParameters
): Record<ScenarioMetric, ScenarioRow> {
  return {
    BudgetEstimate: lookup(table, "BudgetEstimate", params),
    "WealthGenerated<25p": lookup(table, "WealthGenerated<25p", params),
    "WealthGenerated25-50p": lookup(table, "WealthGenerated25-50p", params),
    TotalWealthGenerated: lookup(table, "TotalWealthGenerated", params),
  };
}

/** Number of distinct combinations available for a metric. */
export function scenarioCount(table: ScenarioTable, metric: ScenarioMetric): number {
  return table.rows.get(metric)?.size ?? 0;
}
