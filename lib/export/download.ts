/**
 * Trigger a browser download of CSV text.
 */
export function downloadCsv(csv: string, filename: string): void {
  const blob = new Blob([csv], { type: "text/csv;charset=utf-8;" });
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = filename;
  link.click();
  URL.revokeObjectURL(url);
}

/** Date stamp used in export filenames (YYYY-MM-DD). */
export function exportDateStamp(date: Date = new Date()): string {
  return date.toISOString().slice(0, 10);
}
