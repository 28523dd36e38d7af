/**
 * Tabular export: one row per flagged page.
 */

import { LABEL_DESCRIPTIONS, type Report } from "../api/schemas.js";

export const CSV_HEADER = ["Title", "URL", "Risk Level", "Public Indicators", "Last Edited Time"] as const;

export const INDICATOR_DELIMITER = ", ";

const FORMULA_PREFIX = /^[=+\-@\t\r]/;

/**
 * RFC 4180 quoting, only when the field needs it. Fields a spreadsheet would
 * evaluate as a formula get a leading `'`.
 */
export function escapeCsvField(value: string): string {
  const text = FORMULA_PREFIX.test(value) ? `'${value}` : value;
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function formatCsvReport(report: Report): string {
  const rows: string[][] = [[...CSV_HEADER]];

  for (const entry of report.entries) {
    rows.push([
      entry.title,
      entry.url,
      entry.riskTier,
      entry.publicIndicators.map((l) => LABEL_DESCRIPTIONS[l]).join(INDICATOR_DELIMITER),
      entry.lastEditedTime,
    ]);
  }

  return rows.map((row) => row.map(escapeCsvField).join(",")).join("\n") + "\n";
}
