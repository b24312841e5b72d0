/**
 * Export a single-earner projection to CSV.
 * Columns: year, wealth with match, wealth without match, difference.
 */

import type { ProjectionComparison } from "@/lib/model/projection";
import { toCsvLine } from "./csv";
import { downloadCsv, exportDateStamp } from "./download";

/** Whole dollars; spreadsheets do not need cents for a 40-year view. */
function formatCsvNumber(n: number): number {
  return Math.round(n);
}

export function projectionToCsv(comparison: ProjectionComparison): string {
  const rows: string[] = [
    toCsvLine(["Year", "With match", "Without match", "From match"]),
  ];
  comparison.withMatch.forEach((wealth, year) => {
    const baseline = comparison.withoutMatch[year] ?? 0;
    rows.push(
      toCsvLine([
        year,
        formatCsvNumber(wealth),
        formatCsvNumber(baseline),
        formatCsvNumber(wealth - baseline),
      ])
    );
  });
  return rows.join("\n");
}

export function downloadProjectionCsv(
  comparison: ProjectionComparison,
  filename?: string
): void {
  downloadCsv(
    projectionToCsv(comparison),
    filename ?? `earner-projection-${exportDateStamp()}.csv`
  );
}
