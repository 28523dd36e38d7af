/**
 * Public-exposure heuristics.
 *
 * The API has no sharing flag, so these are weak signals, not a verdict:
 *   - the page carries a non-empty public URL field
 *   - the canonical URL lacks every private/workspace marker
 *   - (opt-in) the URL answers 200 to an anonymous request with no sign-in wall
 */

import type { Label, PageRecord } from "../api/schemas.js";
import type { FetchLike } from "../api/client.js";
import { ProbeFailure } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";

export const DEFAULT_PRIVATE_URL_MARKERS: readonly string[] = ["private", "workspace"];
export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;
const SIGN_IN_MARKERS = ["sign in", "login"];

export interface HeuristicOptions {
  /** Substrings that mark a URL as workspace-scoped. */
  privateUrlMarkers?: readonly string[];
}

export interface ProbeOptions {
  timeoutMs?: number;
  /** Replaces global fetch. Never given credentials. */
  fetch?: FetchLike;
  logger?: Logger;
  /** Called with each failed or timed-out request. */
  onFailure?: (failure: ProbeFailure) => void;
}

export function deriveIndicators(
  record: Pick<PageRecord, "url" | "publicUrl">,
  options: HeuristicOptions = {},
): Label[] {
  const markers = options.privateUrlMarkers ?? DEFAULT_PRIVATE_URL_MARKERS;
  const labels: Label[] = [];

  if (record.publicUrl) labels.push("public-url-present");

  if (record.url && !markers.some((m) => record.url.includes(m))) {
    labels.push("url-pattern-suggests-public");
  }

  return labels;
}

/**
 * Anonymous GET of the page URL. Resolves true only for a 200 whose body
 * shows no sign-in markers; every failure resolves false.
 */
export async function probePublicAccess(
  url: string,
  options: ProbeOptions = {},
): Promise<boolean> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const doFetch: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const log = options.logger ?? defaultLogger;

  if (!url) return false;

  try {
    const res = await doFetch(url, {
      method: "GET",
      redirect: "follow",
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (res.status !== 200) {
      await res.body?.cancel();
      return false;
    }

    const body = (await res.text()).toLowerCase();
    return !SIGN_IN_MARKERS.some((m) => body.includes(m));
  } catch (err: unknown) {
    const failure = new ProbeFailure(
      `reachability probe for ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
      url,
    );
    log.debug(failure.message);
    options.onFailure?.(failure);
    return false;
  }
}

export interface ProbingHeuristicOptions extends HeuristicOptions, ProbeOptions {}

export async function deriveIndicatorsWithProbe(
  record: Pick<PageRecord, "url" | "publicUrl">,
  options: ProbingHeuristicOptions = {},
): Promise<Label[]> {
  const labels = deriveIndicators(record, options);
  if (await probePublicAccess(record.url, options)) {
    labels.push("reachable-without-auth");
  }
  return labels;
}
