import type { Report } from "../api/schemas.js";

/** Full-fidelity dump of every report field. */
export function formatJsonReport(report: Report): string {
  return JSON.stringify(report, null, 2) + "\n";
}
