/** Escape a CSV field (wrap in quotes if it contains comma, newline, or quote). */
export function escapeCsvField(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsvLine(cells: (number | string)[]): string {
  return cells
    .map((c) => (typeof c === "number" ? String(c) : escapeCsvField(c)))
    .join(",");
}
