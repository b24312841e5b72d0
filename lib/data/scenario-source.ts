/**
 * Scenario data source: one CSV per metric, read once per process.
 * Columns: match_rt, phaseout_start, phaseout_rt, takeup_rt, leakage, roi, 0..N, Total.
 */

import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { ScenarioMetric, ScenarioRow } from "@/lib/types/zod";
import { PolicyParametersSchema } from "@/lib/types/zod";
import { METRIC_SOURCE_FILES, SCENARIO_METRICS } from "@/lib/model/constants";
import { ScenarioTableError } from "@/lib/model/errors";
import {
  buildScenarioTable,
  scenarioCount,
  type ScenarioTable,
} from "@/lib/model/scenario-table";
import { loadConfig } from "@/lib/config";

const PARAMETER_COLUMNS = [
  "match_rt",
  "phaseout_start",
  "phaseout_rt",
  "takeup_rt",
  "leakage",
  "roi",
] as const;

const TOTAL_COLUMN = "Total";

const NumericCellSchema = z
  .string()
  .trim()
  .min(1, "empty cell")
  .pipe(z.coerce.number().finite());

/** Check the header and return the number of year columns. */
function readHeader(header: string[], source: string): number {
  PARAMETER_COLUMNS.forEach((name, i) => {
    if (header[i] !== name) {
      throw new ScenarioTableError(
        `${source}: expected column ${i + 1} to be "${name}", found "${header[i] ?? ""}"`
      );
    }
  });
  if (header[header.length - 1] !== TOTAL_COLUMN) {
    throw new ScenarioTableError(`${source}: last column must be "${TOTAL_COLUMN}"`);
  }
  const yearColumns = header.slice(PARAMETER_COLUMNS.length, -1);
  yearColumns.forEach((name, year) => {
    if (name !== String(year)) {
      throw new ScenarioTableError(
        `${source}: expected year column "${year}", found "${name}"`
      );
    }
  });
  if (yearColumns.length === 0) {
    throw new ScenarioTableError(`${source}: no year columns`);
  }
  return yearColumns.length;
}

/** Parse one metric's CSV text into rows. Any malformed line is fatal. */
export function parseScenarioCsv(
  text: string,
  metric: ScenarioMetric,
  source = METRIC_SOURCE_FILES[metric]
): ScenarioRow[] {
  const lines = text.split(/\r?\n/).filter((l) => l.trim() !== "");
  const [headerLine, ...dataLines] = lines;
  if (headerLine == null) {
    throw new ScenarioTableError(`${source}: file is empty`);
  }
  const header = headerLine.split(",").map((c) => c.trim());
  const yearCount = readHeader(header, source);

  return dataLines.map((line, i) => {
    const lineNo = i + 2;
    const cells = line.split(",");
    if (cells.length !== header.length) {
      throw new ScenarioTableError(
        `${source}:${lineNo}: expected ${header.length} cells, found ${cells.length}`
      );
    }
    const values = cells.map((cell, col) => {
      const parsed = NumericCellSchema.safeParse(cell);
      if (!parsed.success) {
        throw new ScenarioTableError(
          `${source}:${lineNo}: column "${header[col] ?? col}" is not a number ("${cell}")`
        );
      }
      return parsed.data;
    });

    const [matchRate, phaseoutStart, phaseoutRate, takeupRate, leakageRate, roi] = values;
    const params = PolicyParametersSchema.safeParse({
      matchRate,
      phaseoutStart,
      phaseoutRate,
      takeupRate,
      leakageRate,
      roi,
    });
    if (!params.success) {
      throw new ScenarioTableError(
        `${source}:${lineNo}: invalid parameters (${params.error.issues.map((iss) => `${iss.path.join(".")}: ${iss.message}`).join("; ")})`
      );
    }

    const start = PARAMETER_COLUMNS.length;
    return {
      metric,
      params: params.data,
      years: values.slice(start, start + yearCount),
      total: values[start + yearCount] ?? 0,
    };
  });
}

function readMetricFile(dir: string, metric: ScenarioMetric): string {
  const file = path.join(dir, `${METRIC_SOURCE_FILES[metric]}.csv`);
  try {
    return readFileSync(file, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ScenarioTableError(`Cannot read ${file}: ${reason}`);
  }
}

/** Read and validate all four metric files from dir. */
export function loadScenarioTable(dir: string): ScenarioTable {
  const rowsByMetric: Record<ScenarioMetric, ScenarioRow[]> = {
    BudgetEstimate: [],
    "WealthGenerated<25p": [],
    "WealthGenerated25-50p": [],
    TotalWealthGenerated: [],
  };
  for (const metric of SCENARIO_METRICS) {
    rowsByMetric[metric] = parseScenarioCsv(readMetricFile(dir, metric), metric);
  }
  return buildScenarioTable(rowsByMetric);
}

let _table: ScenarioTable | null = null;

/**
 * Process-wide table, loaded on first use from the configured data directory.
 * A load failure is logged and rethrown; the next call retries.
 */
export function getScenarioTable(): ScenarioTable {
  if (_table) return _table;
  const { scenarioDataDir } = loadConfig();
  try {
    _table = loadScenarioTable(scenarioDataDir);
  } catch (err) {
    console.error("[ScenarioTable] Load error:", err instanceof Error ? err.message : err);
    throw err;
  }
  const count = scenarioCount(_table, "BudgetEstimate");
  console.info(
    `[ScenarioTable] Loaded ${count} scenarios x ${_table.yearCount} years from ${scenarioDataDir}`
  );
  return _table;
}
