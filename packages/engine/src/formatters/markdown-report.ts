/**
 * Markdown exposure report generator.
 *
 * Produces a standalone markdown document suitable for sharing with a
 * workspace owner or attaching to a compliance ticket.
 */

import { LABEL_DESCRIPTIONS, type Report, type RiskEntry, type RiskTier } from "../api/schemas.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReportOptions {
  workspaceName?: string;
}

// ---------------------------------------------------------------------------
// Tier helpers
// ---------------------------------------------------------------------------

const TIER_ORDER: RiskTier[] = ["high", "medium", "low"];

const TIER_LABELS: Record<RiskTier, string> = {
  high: "High",
  medium: "Medium",
  low: "Low",
};

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function indicatorList(entry: RiskEntry): string {
  return entry.publicIndicators.map((l) => LABEL_DESCRIPTIONS[l]).join(", ");
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Generate a complete markdown exposure report.
 */
export function generateMarkdownReport(report: Report, options?: ReportOptions): string {
  const workspace = options?.workspaceName ?? "Workspace";
  const sections: string[] = [];

  sections.push(`# Page Exposure Report: ${workspace}`);
  sections.push("");
  sections.push(`*Scanned: ${report.scanTimestamp}*`);
  sections.push("");

  // ── Summary ───────────────────────────────────────────────────────────
  sections.push("## Summary");
  sections.push("");
  sections.push(`**${report.entries.length} of ${report.totalScanned} scanned page(s) flagged**`);
  sections.push("");

  sections.push("| Risk Level | Pages |");
  sections.push("|------------|-------|");
  for (const tier of TIER_ORDER) {
    sections.push(`| ${TIER_LABELS[tier]} | ${report.riskSummary[tier]} |`);
  }
  sections.push("");

  if (report.entries.length === 0) {
    sections.push("No page shows signs of public exposure.");
    sections.push("");
  }

  // ── Pages by risk level ───────────────────────────────────────────────
  for (const tier of TIER_ORDER) {
    const group = report.entries.filter((e) => e.riskTier === tier);
    if (group.length === 0) continue;

    sections.push(`## ${TIER_LABELS[tier]} Risk (${group.length})`);
    sections.push("");
    sections.push("| Title | URL | Indicators | Last Edited |");
    sections.push("|-------|-----|------------|-------------|");
    for (const e of group) {
      sections.push(
        `| ${escapeCell(e.title)} | ${escapeCell(e.url)} | ${escapeCell(indicatorList(e))} | ${e.lastEditedTime} |`,
      );
    }
    sections.push("");
  }

  // ── Recommendations ───────────────────────────────────────────────────
  sections.push("## Recommendations");
  sections.push("");
  report.recommendations.forEach((r, i) => sections.push(`${i + 1}. ${r}`));
  sections.push("");

  sections.push("---");
  sections.push("*Indicators are heuristic. Confirm each page's sharing settings in the workspace before acting.*");
  sections.push("");

  return sections.join("\n");
}
