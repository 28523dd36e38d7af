import type { Report, RiskEntry } from "../../api/schemas.js";

export function makeEntry(overrides: Partial<RiskEntry> = {}): RiskEntry {
  return {
    id: "p1",
    title: "Roadmap",
    url: "https://www.notion.so/Roadmap-p1",
    createdTime: "2024-01-10T09:00:00.000Z",
    lastEditedTime: "2024-03-01T12:00:00.000Z",
    createdById: "user-1",
    parentType: "workspace",
    archived: false,
    publicUrl: "https://acme.notion.site/Roadmap-p1",
    publicIndicators: ["public-url-present", "url-pattern-suggests-public"],
    riskTier: "high",
    ...overrides,
  };
}

export function makeReport(entries: RiskEntry[], overrides: Partial<Report> = {}): Report {
  return {
    scanTimestamp: "2024-05-01T08:30:00.000Z",
    totalScanned: 10,
    entries,
    riskSummary: {
      high: entries.filter((e) => e.riskTier === "high").length,
      medium: entries.filter((e) => e.riskTier === "medium").length,
      low: 0,
    },
    recommendations: ["Audit page sharing settings on a regular schedule."],
    ...overrides,
  };
}
