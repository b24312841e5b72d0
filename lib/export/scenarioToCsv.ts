/**
 * Export a scenario result to CSV: parameters, annual effects, cumulative effects.
 * Annual values keep the table's one-decimal rounding; the Total column follows the years.
 */

import type { ScenarioResult } from "@/lib/model/aggregation";
import { roundToTenth } from "@/lib/model/aggregation";
import { METRIC_LABELS, SCENARIO_METRICS } from "@/lib/model/constants";
import { phaseoutForParameters } from "@/lib/model/policy";
import { toCsvLine } from "./csv";
import { downloadCsv, exportDateStamp } from "./download";

function parameterLines(result: ScenarioResult): string[] {
  const { params } = result;
  return [
    toCsvLine(["Parameter", "Value"]),
    toCsvLine(["Matching rate", params.matchRate]),
    toCsvLine(["Phaseout", phaseoutForParameters(params) ?? "custom"]),
    toCsvLine(["Phaseout start", params.phaseoutStart]),
    toCsvLine(["Phaseout rate", params.phaseoutRate]),
    toCsvLine(["Takeup rate", params.takeupRate]),
    toCsvLine(["Early withdrawal", params.leakageRate]),
    toCsvLine(["Annual return", params.roi]),
  ];
}

export function scenarioToCsv(result: ScenarioResult): string {
  const yearCount = result.annualTable[0]?.years.length ?? 0;
  const yearHeaders = Array.from({ length: yearCount }, (_, i) => String(i));

  const lines: string[] = [...parameterLines(result), ""];

  lines.push("--- Annual effects ---");
  lines.push(toCsvLine(["", ...yearHeaders, "Total"]));
  for (const row of result.annualTable) {
    lines.push(toCsvLine([row.label, ...row.years, row.total]));
  }

  lines.push("", "--- Cumulative effects ---");
  lines.push(toCsvLine(["", ...yearHeaders]));
  for (const metric of SCENARIO_METRICS) {
    lines.push(
      toCsvLine([
        METRIC_LABELS[metric],
        ...result.cumulative[metric].map(roundToTenth),
      ])
    );
  }

  return lines.join("\n");
}

export function downloadScenarioCsv(result: ScenarioResult, filename?: string): void {
  downloadCsv(
    scenarioToCsv(result),
    filename ?? `savings-match-scenario-${exportDateStamp()}.csv`
  );
}
