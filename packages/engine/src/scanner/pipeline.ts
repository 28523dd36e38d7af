/**
 * Scan pipeline.
 *
 *   1. Discover page ids through the paginated search endpoint
 *   2. Fetch each page's metadata, one request at a time
 *   3. Derive public-exposure indicators (plus the probe, when enabled)
 *   4. Classify and aggregate into a Report
 *
 * Everything runs sequentially; the pacing policy sits between requests.
 * Discovery and fetch failures shrink the data set and are returned on the
 * result instead of being thrown.
 */

import type { WorkspaceClient } from "../api/client.js";
import type { Label, PageRecord, Report } from "../api/schemas.js";
import type { DetailFetchFailure, DiscoveryFailure, ProbeFailure } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { FixedIntervalPacer, type PacingPolicy } from "../pacing.js";
import { listAllPages } from "./page-lister.js";
import { fetchPageRecord } from "./page-fetcher.js";
import { aggregateReport, type AnalyzedPage } from "./report.js";
import {
  deriveIndicators,
  deriveIndicatorsWithProbe,
  type HeuristicOptions,
  type ProbeOptions,
} from "./sharing-heuristic.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ScanProgress =
  | { phase: "discovered"; total: number }
  | { phase: "fetch"; current: number; total: number; pageId: string }
  | { phase: "done"; analyzed: number; total: number };

export interface PageScannerOptions {
  client: WorkspaceClient;
  /** Defaults to a fixed 100 ms delay. */
  pacer?: PacingPolicy;
  heuristics?: HeuristicOptions;
  /** Opt-in anonymous reachability probe. Off unless given. */
  probe?: ProbeOptions;
  logger?: Logger;
  now?: () => Date;
  onProgress?: (event: ScanProgress) => void;
}

export interface ScanResult {
  report: Report;
  /** Page ids returned by discovery (before any fetch failures). */
  discovered: number;
  discoveryFailure: DiscoveryFailure | null;
  fetchFailures: DetailFetchFailure[];
  /** Reachability requests that failed; each page counted as not reachable. */
  probeFailures: ProbeFailure[];
}

// ---------------------------------------------------------------------------
// Scanner
// ---------------------------------------------------------------------------

export class PageScanner {
  private readonly client: WorkspaceClient;
  private readonly pacer: PacingPolicy;
  private readonly heuristics: HeuristicOptions;
  private readonly probe: ProbeOptions | undefined;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly onProgress: (event: ScanProgress) => void;

  constructor(options: PageScannerOptions) {
    this.client = options.client;
    this.pacer = options.pacer ?? new FixedIntervalPacer();
    this.heuristics = options.heuristics ?? {};
    this.probe = options.probe;
    this.log = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
    this.onProgress = options.onProgress ?? (() => {});
  }

  async scan(): Promise<ScanResult> {
    const startTime = Date.now();

    const { stubs, failure: discoveryFailure } = await listAllPages(this.client, {
      pacer: this.pacer,
      logger: this.log,
    });
    this.log.info(`Discovered ${stubs.length} page(s)`);
    this.onProgress({ phase: "discovered", total: stubs.length });

    const analyzed: AnalyzedPage[] = [];
    const fetchFailures: DetailFetchFailure[] = [];
    const probeFailures: ProbeFailure[] = [];

    for (const [index, stub] of stubs.entries()) {
      this.onProgress({ phase: "fetch", current: index + 1, total: stubs.length, pageId: stub.id });

      const fetched = await fetchPageRecord(this.client, stub.id, this.log);
      if (fetched.record === null) {
        fetchFailures.push(fetched.failure);
      } else {
        analyzed.push({ record: fetched.record, indicators: await this.indicatorsFor(fetched.record, probeFailures) });
      }

      await this.pacer.wait();
    }

    this.onProgress({ phase: "done", analyzed: analyzed.length, total: stubs.length });

    const report = aggregateReport(analyzed, { now: this.now });
    const elapsed = Date.now() - startTime;
    this.log.info(
      `Analyzed ${report.totalScanned}/${stubs.length} page(s) in ${elapsed}ms, ` +
        `${report.entries.length} flagged (${report.riskSummary.high} high, ${report.riskSummary.medium} medium)`,
    );
    if (fetchFailures.length > 0) {
      this.log.warn(`${fetchFailures.length} page(s) could not be fetched and were left out`);
    }

    if (probeFailures.length > 0) {
      this.log.info(`${probeFailures.length} reachability request(s) failed; those pages were treated as not reachable`);
    }

    return { report, discovered: stubs.length, discoveryFailure, fetchFailures, probeFailures };
  }

  private async indicatorsFor(record: PageRecord, probeFailures: ProbeFailure[]): Promise<Label[]> {
    if (!this.probe) return deriveIndicators(record, this.heuristics);
    const onFailure = this.probe.onFailure;
    return deriveIndicatorsWithProbe(record, {
      ...this.heuristics,
      ...this.probe,
      logger: this.probe.logger ?? this.log,
      onFailure: (failure) => {
        probeFailures.push(failure);
        onFailure?.(failure);
      },
    });
  }
}
