import type { ConfigurationError, Label, Report, RiskTier, ScanError } from "@pagescope/engine";
import { LABEL_DESCRIPTIONS, sortEntries } from "@pagescope/engine";

// ANSI escape codes — no dependencies needed
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const BLUE = "\x1b[34m";
const CYAN = "\x1b[36m";
const BG_RED = "\x1b[41m";
const WHITE = "\x1b[37m";

function c(color: string, text: string): string {
  return `${color}${text}${RESET}`;
}

/** Strip ANSI colour codes (for files and assertions). */
export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*[A-Za-z]/g, "");
}

function tierColor(tier: RiskTier): string {
  switch (tier) {
    case "high": return RED;
    case "medium": return YELLOW;
    case "low": return BLUE;
  }
}

function tierBadge(tier: RiskTier): string {
  const label = tier.toUpperCase().padEnd(6);
  return c(tierColor(tier), ` ${label} `);
}

export const SUMMARY_TOP_N = 5;

export function formatSummary(report: Report): string {
  const lines: string[] = [];

  lines.push("");
  lines.push(c(CYAN, "  ╔══════════════════════════════════════════╗"));
  lines.push(c(CYAN, "  ║") + c(BOLD, "        PAGE EXPOSURE SCAN SUMMARY        ") + c(CYAN, "║"));
  lines.push(c(CYAN, "  ╚══════════════════════════════════════════╝"));
  lines.push("");

  lines.push(`  Scanned at:    ${report.scanTimestamp}`);
  lines.push(`  Pages scanned: ${c(BOLD, String(report.totalScanned))}`);
  lines.push(`  Pages flagged: ${c(BOLD, String(report.entries.length))}`);
  lines.push("");

  const { high, medium, low } = report.riskSummary;
  lines.push(`  ${c(RED, `HIGH ${high}`)}  ${c(YELLOW, `MEDIUM ${medium}`)}  ${c(DIM, `LOW ${low}`)}`);
  lines.push("");

  if (report.entries.length === 0) {
    lines.push(c(GREEN, "  No page shows signs of public exposure."));
    lines.push("");
  } else {
    const top = sortEntries(report.entries).slice(0, SUMMARY_TOP_N);
    lines.push(c(BOLD, `  FLAGGED PAGES (top ${top.length} of ${report.entries.length})`));
    lines.push("");
    for (const e of top) {
      lines.push(`  ${tierBadge(e.riskTier)} ${c(BOLD, e.title)}`);
      lines.push(`           ${c(DIM, e.url)}`);
      lines.push(`           ${describeIndicators(e.publicIndicators)}`);
      lines.push("");
    }
  }

  lines.push(c(BOLD, "  RECOMMENDATIONS"));
  lines.push("");
  report.recommendations.forEach((r, i) => lines.push(`  ${i + 1}. ${r}`));
  lines.push("");

  return lines.join("\n");
}

export function describeIndicators(labels: readonly Label[]): string {
  return labels.map((l) => LABEL_DESCRIPTIONS[l]).join(", ");
}

export function formatHighRiskWarning(report: Report): string {
  if (report.riskSummary.high === 0) return "";
  return [
    "",
    c(BG_RED + WHITE, " URGENT ") + c(RED, ` ${report.riskSummary.high} high-risk page(s) found.`),
    "  These pages may contain sensitive information. Next steps:",
    "  1. Check the sharing settings of each flagged page",
    "  2. Check whether it contains confidential information",
    "  3. Make it private where it should not be public",
    "  4. Tell the page owners what was changed and why",
    "",
  ].join("\n");
}

export function formatSetupGuidance(error: ConfigurationError): string {
  const lines = [`${c(RED, "Error:")} ${error.message}`, "", "Setup:"];
  error.steps.forEach((step, i) => lines.push(`  ${i + 1}. ${step}`));
  lines.push("");
  return lines.join("\n");
}

export function formatFailureChecklist(error: ScanError): string {
  return [
    `${c(RED, "Error:")} the scan failed: ${error.message}`,
    "Check that:",
    "  - the integration token is correct",
    "  - the network connection is stable",
    "  - the integration has access to the workspace",
    "",
  ].join("\n");
}

export function progressBar(completed: number, total: number, width = 30): string {
  const pct = total > 0 ? Math.min(1, completed / total) : 0;
  const filled = Math.round(pct * width);
  const empty = width - filled;
  return `[${GREEN}${"█".repeat(filled)}${DIM}${"░".repeat(empty)}${RESET}]`;
}

export function formatIndicatorsTable(
  rows: Array<{ label: Label; description: string; optIn: boolean }>,
): string {
  const lines: string[] = [];
  const labelW = 30;
  const descW = 40;

  lines.push("");
  lines.push(`  ${c(BOLD, "LABEL".padEnd(labelW))}${c(BOLD, "DESCRIPTION".padEnd(descW))}${c(BOLD, "WHEN")}`);
  lines.push(`  ${"─".repeat(labelW + descW + 10)}`);
  for (const row of rows) {
    const when = row.optIn ? c(YELLOW, "--probe") : "always";
    lines.push(`  ${c(DIM, row.label.padEnd(labelW))}${row.description.padEnd(descW)}${when}`);
  }
  lines.push("");
  lines.push(`  ${rows.length} indicators. One indicator rates a page medium, two or more rate it high.`);
  lines.push("");

  return lines.join("\n");
}
