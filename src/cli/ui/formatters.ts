/**
 * Table and summary formatters
 */

import color from "picocolors";

export const TABLE_WIDTHS = {
  name: 20,
  path: 36,
  hostname: 16,
  lastBackup: 19,
  archive: 19,
  size: 12,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const maxLabelLen = Math.max(...items.map((i) => i.label.length));
  return items
    .filter((i) => i.value !== null && i.value !== undefined)
    .map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`)
    .join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns
    .map((col, i) => truncate(col, widths[i] ?? 0).padEnd(widths[i] ?? 0))
    .join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

/**
 * Shorten to at most `width` characters, marking the cut with "…"
 */
export function truncate(value: string, width: number): string {
  if (width <= 0 || value.length <= width) return value;
  return `${value.slice(0, width - 1)}…`;
}

/** ISO timestamp as `YYYY-MM-DD HH:MM:SS`, or a dash when absent */
export function formatTimestamp(iso: string | null): string {
  if (!iso) return "-";
  return iso.substring(0, 19).replace("T", " ");
}
