/**
 * Page detail retrieval: resolves a page id to an immutable PageRecord.
 */

import type { WorkspaceClient } from "../api/client.js";
import type { PageObject, PageRecord } from "../api/schemas.js";
import { DetailFetchFailure } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";

export const UNTITLED = "Untitled";

export type FetchResult =
  | { record: PageRecord; failure: null }
  | { record: null; failure: DetailFetchFailure };

/** Plain text of the first non-empty title property. */
export function extractTitle(page: Pick<PageObject, "properties">): string {
  for (const prop of Object.values(page.properties)) {
    if (prop.type !== "title") continue;
    const parts = prop.title ?? [];
    if (parts.length > 0) {
      return parts.map((t) => t.plain_text ?? "").join("");
    }
  }
  return UNTITLED;
}

export function toPageRecord(page: PageObject): PageRecord {
  return Object.freeze({
    id: page.id,
    title: extractTitle(page),
    url: page.url,
    createdTime: page.created_time,
    lastEditedTime: page.last_edited_time,
    createdById: page.created_by?.id ?? "",
    parentType: page.parent?.type ?? "",
    archived: page.archived,
    publicUrl: page.public_url ? page.public_url : null,
  });
}

export async function fetchPageRecord(
  client: WorkspaceClient,
  pageId: string,
  log: Logger = defaultLogger,
): Promise<FetchResult> {
  const res = await client.retrievePage(pageId);
  if (!res.ok) {
    const failure = new DetailFetchFailure(
      `page ${pageId} could not be fetched: ${res.message}`,
      pageId,
      res.status,
    );
    log.warn(failure.message);
    return { record: null, failure };
  }
  return { record: toPageRecord(res.data), failure: null };
}
