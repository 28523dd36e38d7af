/**
 * Workspace API client.
 *
 * Thin wrapper over the Notion REST API via native fetch. Every call carries
 * the bearer token and the pinned API version. Responses are validated with
 * Zod; failures come back as values so callers decide what a failure means
 * for the run.
 */

import { z } from "zod";

import {
  PageObjectSchema,
  SearchResponseSchema,
  type PageObject,
  type SearchResponse,
} from "./schemas.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const DEFAULT_BASE_URL = "https://api.notion.com/v1";
export const DEFAULT_API_VERSION = "2022-06-28";
export const SEARCH_PAGE_SIZE = 100;

export interface WorkspaceClientOptions {
  /** Integration token. Injected here; never read from the environment. */
  token: string;
  baseUrl?: string;
  apiVersion?: string;
  /** Replaces global fetch (tests pass an in-process fake). */
  fetch?: FetchLike;
}

export type ApiResult<T> =
  | { ok: true; data: T }
  | { ok: false; status: number | null; message: string };

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class WorkspaceClient {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly apiVersion: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: WorkspaceClientOptions) {
    this.token = options.token;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, "");
    this.apiVersion = options.apiVersion ?? DEFAULT_API_VERSION;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /** One page of the search endpoint, restricted to page objects. */
  searchPages(cursor?: string | null): Promise<ApiResult<SearchResponse>> {
    const body: Record<string, unknown> = {
      filter: { property: "object", value: "page" },
      page_size: SEARCH_PAGE_SIZE,
    };
    if (cursor) body.start_cursor = cursor;

    return this.request("/search", { method: "POST", body: JSON.stringify(body) }, SearchResponseSchema);
  }

  /** Full metadata for one page. */
  retrievePage(pageId: string): Promise<ApiResult<PageObject>> {
    return this.request(
      `/pages/${encodeURIComponent(pageId)}`,
      { method: "GET" },
      PageObjectSchema,
    );
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.token}`,
      "Notion-Version": this.apiVersion,
      "Content-Type": "application/json",
    };
  }

  private async request<T>(
    path: string,
    init: { method: "GET" | "POST"; body?: string },
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<ApiResult<T>> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        ...init,
        headers: this.headers(),
      });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, status: null, message: `request failed: ${message}` };
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      return {
        ok: false,
        status: response.status,
        message: `API error ${response.status}: ${body.slice(0, 200)}`,
      };
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch {
      return { ok: false, status: response.status, message: "response body is not valid JSON" };
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "unknown shape";
      return { ok: false, status: response.status, message: `unexpected response shape — ${where}` };
    }

    return { ok: true, data: parsed.data };
  }
}
