/**
 * Report aggregation: folds analyzed pages into the risk report.
 */

import type { Label, PageRecord, Report, RiskEntry, RiskSummary } from "../api/schemas.js";
import { classifyRisk } from "./risk-classifier.js";

export interface AnalyzedPage {
  record: PageRecord;
  indicators: readonly Label[];
}

export interface AggregateOptions {
  /** Source of `scanTimestamp`. */
  now?: () => Date;
}

export const HIGH_RISK_RECOMMENDATION =
  "[Top priority] Review the sharing settings of high-risk pages immediately.";

export const MEDIUM_RISK_RECOMMENDATION =
  "[Medium priority] Check the access permissions of the suspected pages.";

export const BASELINE_RECOMMENDATIONS: readonly string[] = [
  "Audit page sharing settings on a regular schedule.",
  "Handle pages that contain sensitive information with particular care.",
  "Educate team members about page sharing settings.",
  "Review the list of public pages regularly and stop sharing pages that no longer need it.",
  "Apply appropriate access controls to important pages.",
];

export function buildRecommendations(summary: RiskSummary): string[] {
  const recommendations: string[] = [];
  if (summary.high > 0) recommendations.push(HIGH_RISK_RECOMMENDATION);
  if (summary.medium > 0) recommendations.push(MEDIUM_RISK_RECOMMENDATION);
  recommendations.push(...BASELINE_RECOMMENDATIONS);
  return recommendations;
}

export function aggregateReport(
  pages: readonly AnalyzedPage[],
  options: AggregateOptions = {},
): Report {
  const now = options.now ?? (() => new Date());
  const riskSummary: RiskSummary = { high: 0, medium: 0, low: 0 };
  const entries: RiskEntry[] = [];

  for (const { record, indicators } of pages) {
    const publicIndicators = [...new Set(indicators)];
    const tier = classifyRisk(publicIndicators);
    if (tier === null) continue;

    entries.push(
      Object.freeze({
        ...record,
        publicIndicators: Object.freeze(publicIndicators),
        riskTier: tier,
      }),
    );
    riskSummary[tier]++;
  }

  return {
    scanTimestamp: now().toISOString(),
    totalScanned: pages.length,
    entries,
    riskSummary,
    recommendations: buildRecommendations(riskSummary),
  };
}

const TIER_RANK: Record<RiskEntry["riskTier"], number> = { high: 0, medium: 1 };

/** High before medium, then most recently edited first. Does not mutate. */
export function sortEntries(entries: readonly RiskEntry[]): RiskEntry[] {
  return entries.slice().sort((a, b) => {
    const tierDiff = TIER_RANK[a.riskTier] - TIER_RANK[b.riskTier];
    if (tierDiff !== 0) return tierDiff;
    return b.lastEditedTime.localeCompare(a.lastEditedTime);
  });
}
