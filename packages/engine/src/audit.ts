/**
 * Audit entry point.
 *
 * Validates the credential, builds the client and scanner from config, runs
 * one scan and returns a typed outcome. Nothing here exits the process; the
 * caller maps outcomes to exit codes.
 */

import { WorkspaceClient, type FetchLike } from "./api/client.js";
import { assertUsableToken, createPacer, defaultConfig, type PagescopeConfig } from "./config.js";
import {
  ConfigurationError,
  toScanError,
  type DetailFetchFailure,
  type DiscoveryFailure,
  type ScanError,
} from "./errors.js";
import type { Logger } from "./logger.js";
import type { PacingPolicy } from "./pacing.js";
import { PageScanner, type ScanProgress, type ScanResult } from "./scanner/pipeline.js";

export interface AuditOptions {
  /** Resolved integration token (see resolveToken). */
  token: string | undefined;
  config?: PagescopeConfig;
  /** Overrides `config.probe.enabled`. */
  probe?: boolean;
  /** Replaces global fetch for API calls and the probe. */
  fetch?: FetchLike;
  /** Overrides the pacer built from config. */
  pacer?: PacingPolicy;
  logger?: Logger;
  now?: () => Date;
  onProgress?: (event: ScanProgress) => void;
}

export type AuditOutcome =
  | { status: "complete"; result: ScanResult }
  | { status: "partial"; result: ScanResult; failures: Array<DiscoveryFailure | DetailFetchFailure> }
  | { status: "configuration-error"; error: ConfigurationError }
  | { status: "failed"; error: ScanError };

export async function runAudit(options: AuditOptions): Promise<AuditOutcome> {
  const config = options.config ?? defaultConfig();

  try {
    assertUsableToken(options.token);

    const client = new WorkspaceClient({
      token: options.token,
      baseUrl: config.base_url,
      apiVersion: config.api_version,
      fetch: options.fetch,
    });

    const probeEnabled = options.probe ?? config.probe.enabled;
    const scanner = new PageScanner({
      client,
      pacer: options.pacer ?? createPacer(config),
      heuristics: { privateUrlMarkers: config.private_url_markers },
      probe: probeEnabled
        ? { timeoutMs: config.probe.timeout_ms, fetch: options.fetch, logger: options.logger }
        : undefined,
      logger: options.logger,
      now: options.now,
      onProgress: options.onProgress,
    });

    const result = await scanner.scan();
    const failures: Array<DiscoveryFailure | DetailFetchFailure> = [
      ...(result.discoveryFailure ? [result.discoveryFailure] : []),
      ...result.fetchFailures,
    ];

    return failures.length > 0
      ? { status: "partial", result, failures }
      : { status: "complete", result };
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) return { status: "configuration-error", error: err };
    return { status: "failed", error: toScanError(err) };
  }
}
