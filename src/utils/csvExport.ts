import type { HistoryRow } from "@/types";
import { HISTORY_COLUMNS, toHistoryTable } from "@/lib/aggregation/tables";

const BOM = "\uFEFF";

export function escapeCell(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** History table as CSV: UTF-8 BOM, comma-separated, one line per month. */
export function historyToCsv(rows: HistoryRow[]): string {
  const lines = [HISTORY_COLUMNS.join(",")];
  for (const row of toHistoryTable(rows)) {
    lines.push(HISTORY_COLUMNS.map((c) => escapeCell(row[c])).join(","));
  }
  return BOM + lines.join("\n") + "\n";
}

/** historial_Juan_Pérez.csv */
export function historyFileName(client: string): string {
  return `historial_${client.replace(/ /g, "_")}.csv`;
}

export function downloadCsv(fileName: string, text: string): void {
  if (typeof document === "undefined") return;
  const url = URL.createObjectURL(new Blob([text], { type: "text/csv;charset=utf-8" }));
  const a = document.createElement("a");
  a.href = url;
  a.download = fileName;
  a.click();
  URL.revokeObjectURL(url);
}
