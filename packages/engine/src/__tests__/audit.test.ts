import { describe, it, expect } from "vitest";
import { runAudit } from "../audit.js";
import { defaultConfig, PLACEHOLDER_TOKEN } from "../config.js";
import { DetailFetchFailure, DiscoveryFailure } from "../errors.js";
import { BASELINE_RECOMMENDATIONS, HIGH_RISK_RECOMMENDATION, MEDIUM_RISK_RECOMMENDATION } from "../scanner/report.js";
import { immediatePacer } from "../pacing.js";
import { createFakeApi, makePage } from "./helpers/fake-api.js";

const NOW = () => new Date("2024-05-01T08:30:00.000Z");

function audit(api: ReturnType<typeof createFakeApi>, extra: Partial<Parameters<typeof runAudit>[0]> = {}) {
  return runAudit({ token: "test-secret", fetch: api.fetch, pacer: immediatePacer, now: NOW, ...extra });
}

describe("runAudit", () => {
  it("reports nothing flagged for an empty workspace", async () => {
    const api = createFakeApi({ search: [{ ids: [] }] });

    const outcome = await audit(api);

    expect(outcome.status).toBe("complete");
    if (outcome.status !== "complete") return;
    expect(outcome.result.report).toEqual({
      scanTimestamp: "2024-05-01T08:30:00.000Z",
      totalScanned: 0,
      entries: [],
      riskSummary: { high: 0, medium: 0, low: 0 },
      recommendations: [...BASELINE_RECOMMENDATIONS],
    });
  });

  it("rates a page with only an explicit public URL as medium", async () => {
    const api = createFakeApi({
      search: [{ ids: ["p1"] }],
      pages: { p1: makePage("p1", { public_url: "https://acme.notion.site/Page-p1" }) },
    });

    const outcome = await audit(api);

    expect(outcome.status).toBe("complete");
    if (outcome.status !== "complete") return;
    const { report } = outcome.result;
    expect(report.riskSummary).toEqual({ high: 0, medium: 1, low: 0 });
    expect(report.entries[0].publicIndicators).toEqual(["public-url-present"]);
    expect(report.recommendations[0]).toBe(MEDIUM_RISK_RECOMMENDATION);
    expect(report.recommendations).toHaveLength(6);
  });

  it("rates a page with two signals as high and leads with the top-priority advice", async () => {
    const api = createFakeApi({
      search: [{ ids: ["p1"] }],
      pages: {
        p1: makePage("p1", {
          url: "https://www.notion.so/Roadmap-p1",
          public_url: "https://acme.notion.site/Roadmap-p1",
        }),
      },
    });

    const outcome = await audit(api);

    expect(outcome.status).toBe("complete");
    if (outcome.status !== "complete") return;
    const { report } = outcome.result;
    expect(report.riskSummary).toEqual({ high: 1, medium: 0, low: 0 });
    expect(report.entries[0].riskTier).toBe("high");
    expect(report.entries[0].publicIndicators).toEqual(["public-url-present", "url-pattern-suggests-public"]);
    expect(report.recommendations).toEqual([HIGH_RISK_RECOMMENDATION, ...BASELINE_RECOMMENDATIONS]);
  });

  it("skips a page that cannot be fetched and reports a partial run", async () => {
    const api = createFakeApi({
      search: [{ ids: ["p1", "p2"] }],
      pages: { p1: makePage("p1"), p2: { status: 403, body: "forbidden" } },
    });

    const outcome = await audit(api);

    expect(outcome.status).toBe("partial");
    if (outcome.status !== "partial") return;
    expect(outcome.result.report.totalScanned).toBe(1);
    expect(outcome.result.discovered).toBe(2);
    expect(outcome.failures).toHaveLength(1);
    const [failure] = outcome.failures;
    expect(failure).toBeInstanceOf(DetailFetchFailure);
    expect(failure.message).toBe("page p2 could not be fetched: API error 403: forbidden");
  });

  it("analyzes the first batch when discovery fails on the second", async () => {
    const api = createFakeApi({
      search: [{ ids: ["p1", "p2"], nextCursor: "c1" }, { status: 502, body: "bad gateway" }],
      pages: { p1: makePage("p1"), p2: makePage("p2") },
    });

    const outcome = await audit(api);

    expect(outcome.status).toBe("partial");
    if (outcome.status !== "partial") return;
    expect(outcome.result.report.totalScanned).toBe(2);
    const [failure] = outcome.failures;
    expect(failure).toBeInstanceOf(DiscoveryFailure);
    expect(failure.message).toBe("page search failed on batch 2: API error 502: bad gateway");
  });

  it("returns an empty partial report when the first search request fails", async () => {
    const api = createFakeApi({ search: [{ status: 401, body: "unauthorized" }] });

    const outcome = await audit(api);

    expect(outcome.status).toBe("partial");
    if (outcome.status !== "partial") return;
    expect(outcome.result.report.totalScanned).toBe(0);
  });

  it("refuses a missing token without making a request", async () => {
    const api = createFakeApi({ search: [] });

    const outcome = await audit(api, { token: undefined });

    expect(outcome.status).toBe("configuration-error");
    if (outcome.status !== "configuration-error") return;
    expect(outcome.error.message).toBe("No integration token configured.");
    expect(outcome.error.steps).toHaveLength(4);
    expect(api.calls).toEqual([]);
  });

  it("refuses the placeholder token", async () => {
    const api = createFakeApi({ search: [] });

    const outcome = await audit(api, { token: PLACEHOLDER_TOKEN });

    expect(outcome.status).toBe("configuration-error");
    if (outcome.status !== "configuration-error") return;
    expect(outcome.error.message).toBe("The integration token is still the placeholder value.");
  });

  it("wraps an unexpected throw as a failed outcome", async () => {
    const outcome = await runAudit({
      token: "test-secret",
      pacer: immediatePacer,
      fetch: async () => {
        throw new TypeError("boom");
      },
      onProgress: () => {
        throw new Error("renderer crashed");
      },
    });

    expect(outcome.status).toBe("failed");
    if (outcome.status !== "failed") return;
    expect(outcome.error.kind).toBe("unexpected");
    expect(outcome.error.message).toBe("renderer crashed");
  });

  it("sends the configured API version and base URL", async () => {
    const api = createFakeApi({ search: [{ ids: [] }] });
    const config = { ...defaultConfig(), base_url: "https://api.example.test/v1", api_version: "2023-01-01" };

    await audit(api, { config });

    expect(api.calls[0].url).toBe("https://api.example.test/v1/search");
    expect(api.calls[0].headers["notion-version"]).toBe("2023-01-01");
    expect(api.calls[0].headers["authorization"]).toBe("Bearer test-secret");
  });

  it("probes only when enabled by option or config", async () => {
    const shareUrl = "https://www.notion.so/workspace/Page-p1";
    const options = {
      search: [{ ids: ["p1"] }],
      pages: { p1: makePage("p1") },
      publicSites: { [shareUrl]: { status: 200, body: "<html>Roadmap</html>" } },
    };

    const off = createFakeApi(options);
    await audit(off);
    expect(off.calls.map((c) => c.url)).not.toContain(shareUrl);

    const viaConfig = createFakeApi(options);
    const config = { ...defaultConfig(), probe: { enabled: true, timeout_ms: 500 } };
    const outcome = await audit(viaConfig, { config });
    expect(viaConfig.calls.map((c) => c.url)).toContain(shareUrl);
    expect(outcome.status).toBe("complete");
    if (outcome.status !== "complete") return;
    expect(outcome.result.report.entries[0].publicIndicators).toEqual(["reachable-without-auth"]);

    const overridden = createFakeApi(options);
    await audit(overridden, { config, probe: false });
    expect(overridden.calls.map((c) => c.url)).not.toContain(shareUrl);
  });
});
