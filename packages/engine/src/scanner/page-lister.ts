/**
 * Page discovery.
 *
 * Walks the search endpoint with its continuation cursor until the service
 * reports no further results. A failed request ends the walk early; whatever
 * was collected is still returned, with the failure attached.
 */

import type { WorkspaceClient } from "../api/client.js";
import { DiscoveryFailure } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { immediatePacer, type PacingPolicy } from "../pacing.js";

export interface PageStub {
  id: string;
}

export interface ListPagesOptions {
  pacer?: PacingPolicy;
  logger?: Logger;
}

export interface ListResult {
  stubs: PageStub[];
  /** Set when pagination stopped on a failed request. */
  failure: DiscoveryFailure | null;
}

export async function listAllPages(
  client: WorkspaceClient,
  options: ListPagesOptions = {},
): Promise<ListResult> {
  const pacer = options.pacer ?? immediatePacer;
  const log = options.logger ?? defaultLogger;
  const stubs: PageStub[] = [];
  let cursor: string | null = null;
  let batch = 0;

  while (true) {
    batch++;
    const res = await client.searchPages(cursor);

    if (!res.ok) {
      const failure = new DiscoveryFailure(
        `page search failed on batch ${batch}: ${res.message}`,
        res.status,
        stubs.length,
      );
      log.warn(`${failure.message} — keeping ${stubs.length} page(s) found so far`);
      return { stubs, failure };
    }

    for (const result of res.data.results) stubs.push({ id: result.id });
    log.debug(`[discover] batch ${batch}: ${res.data.results.length} page(s), ${stubs.length} total`);

    const next = res.data.next_cursor ?? null;
    if (!res.data.has_more || !next) break;

    cursor = next;
    await pacer.wait();
  }

  return { stubs, failure: null };
}
