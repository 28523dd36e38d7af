import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { immediatePacer, type FetchLike } from "@pagescope/engine";
import {
  createProgressRenderer,
  replaceExtension,
  resolveOutputPaths,
  runScan,
  type ProgressStream,
  type ScanOptions,
} from "../commands/scan.js";
import { EXIT } from "../exit-codes.js";

const TEST_DIR = join(tmpdir(), `pagescope-scan-test-${Date.now()}`);

interface FakePage {
  url: string;
  public_url?: string | null;
}

function json(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { "Content-Type": "application/json" } });
}

/** Serves one search batch and the given pages; any other page id answers 500. */
function fakeWorkspace(pages: Record<string, FakePage | null>): { fetch: FetchLike; urls: string[] } {
  const urls: string[] = [];
  const fetch: FetchLike = async (url) => {
    urls.push(url);
    if (url.endsWith("/search")) {
      return json({
        results: Object.keys(pages).map((id) => ({ object: "page", id })),
        has_more: false,
        next_cursor: null,
      });
    }
    const id = decodeURIComponent(url.split("/").pop() ?? "");
    const page = pages[id];
    if (!page) return new Response("internal error", { status: 500 });
    return json({
      object: "page",
      id,
      url: page.url,
      public_url: page.public_url ?? null,
      created_time: "2024-01-10T09:00:00.000Z",
      last_edited_time: "2024-03-01T12:00:00.000Z",
      created_by: { id: "user-1" },
      parent: { type: "workspace" },
      archived: false,
      properties: { title: { type: "title", title: [{ plain_text: `Page ${id}` }] } },
    });
  };
  return { fetch, urls };
}

const PRIVATE_PAGE: FakePage = { url: "https://www.notion.so/workspace/Notes" };
const MEDIUM_PAGE: FakePage = {
  url: "https://www.notion.so/workspace/Handbook",
  public_url: "https://acme.notion.site/Handbook",
};
const HIGH_PAGE: FakePage = { url: "https://www.notion.so/Roadmap", public_url: "https://acme.notion.site/Roadmap" };

function scan(overrides: Partial<ScanOptions>, workspace = fakeWorkspace({ p1: PRIVATE_PAGE })) {
  return runScan({
    format: "json",
    probe: false,
    token: "test-secret",
    cwd: TEST_DIR,
    env: {},
    fetch: workspace.fetch,
    pacer: immediatePacer,
    now: () => new Date("2024-05-01T08:30:00.000Z"),
    ...overrides,
  });
}

function readJson(name: string): unknown {
  return JSON.parse(readFileSync(join(TEST_DIR, name), "utf-8"));
}

describe("resolveOutputPaths", () => {
  it("uses the default report name per format", () => {
    expect(resolveOutputPaths("json")).toEqual({ json: "pagescope-report.json" });
    expect(resolveOutputPaths("csv")).toEqual({ csv: "pagescope-report.csv" });
    expect(resolveOutputPaths("markdown")).toEqual({ markdown: "pagescope-report.md" });
  });

  it("derives the CSV path from the JSON path for both", () => {
    expect(resolveOutputPaths("both", "out/audit.json")).toEqual({ json: "out/audit.json", csv: "out/audit.csv" });
  });

  it("keeps JSON and CSV apart when the output already ends in .csv", () => {
    expect(resolveOutputPaths("both", "out/audit.csv")).toEqual({ json: "out/audit.json", csv: "out/audit.csv" });
  });
});

describe("createProgressRenderer", () => {
  function stream(isTTY: boolean): { out: ProgressStream; written: string[] } {
    const written: string[] = [];
    return {
      written,
      out: {
        isTTY,
        write(chunk: string) {
          written.push(chunk);
          return true;
        },
      },
    };
  }

  const events = [
    { phase: "discovered", total: 1 },
    { phase: "fetch", current: 1, total: 1, pageId: "p1" },
    { phase: "done", analyzed: 1, total: 1 },
  ] as const;

  it("draws the bar on a terminal", () => {
    const { out, written } = stream(true);
    const render = createProgressRenderer(out, "info");
    for (const e of events) render(e);

    expect(written).toHaveLength(3);
    expect(written[1].startsWith("\r[")).toBe(true);
  });

  it("writes only the discovery line when stderr is not a terminal", () => {
    const { out, written } = stream(false);
    const render = createProgressRenderer(out, "info");
    for (const e of events) render(e);

    expect(written).toEqual(["[pagescope] Found 1 page(s). Analyzing...\n"]);
  });

  it("stays silent under --quiet", () => {
    const { out, written } = stream(true);
    const render = createProgressRenderer(out, "error");
    for (const e of events) render(e);

    expect(written).toEqual([]);
  });
});

describe("replaceExtension", () => {
  it("swaps the last extension", () => {
    expect(replaceExtension("report.v2.json", ".csv")).toBe("report.v2.csv");
  });

  it("appends when there is none", () => {
    expect(replaceExtension("report", ".csv")).toBe("report.csv");
  });
});

describe("runScan", () => {
  let stderr: () => string;

  beforeEach(() => {
    mkdirSync(TEST_DIR, { recursive: true });
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const spy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    stderr = () => spy.mock.calls.map(([chunk]) => String(chunk)).join("");
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
    vi.restoreAllMocks();
  });

  it("writes a JSON report and exits cleanly", async () => {
    expect(await scan({})).toBe(EXIT.OK);

    expect(readJson("pagescope-report.json")).toMatchObject({
      scanTimestamp: "2024-05-01T08:30:00.000Z",
      totalScanned: 1,
      entries: [],
      riskSummary: { high: 0, medium: 0, low: 0 },
    });
  });

  it("writes JSON and CSV side by side for both", async () => {
    const code = await scan({ format: "both", output: "out/audit.json" }, fakeWorkspace({ p1: HIGH_PAGE }));

    expect(code).toBe(EXIT.OK);
    expect(existsSync(join(TEST_DIR, "out/audit.json"))).toBe(true);
    expect(readFileSync(join(TEST_DIR, "out/audit.csv"), "utf-8").split("\n")[1]).toBe(
      'Page p1,https://www.notion.so/Roadmap,high,"Explicit public URL present, URL pattern suggests public exposure",2024-03-01T12:00:00.000Z',
    );
  });

  it("writes two distinct files for both with a .csv output", async () => {
    const code = await scan({ format: "both", output: "report.csv" }, fakeWorkspace({ p1: HIGH_PAGE }));

    expect(code).toBe(EXIT.OK);
    expect(readJson("report.json")).toMatchObject({ totalScanned: 1 });
    expect(readFileSync(join(TEST_DIR, "report.csv"), "utf-8").split("\n")[0]).toBe(
      "Title,URL,Risk Level,Public Indicators,Last Edited Time",
    );
  });

  it("writes a markdown report", async () => {
    expect(await scan({ format: "markdown" })).toBe(EXIT.OK);
    expect(readFileSync(join(TEST_DIR, "pagescope-report.md"), "utf-8").split("\n")[0]).toBe(
      "# Page Exposure Report: Workspace",
    );
  });

  it("rejects an unknown format before any request", async () => {
    const workspace = fakeWorkspace({});

    expect(await scan({ format: "xml" }, workspace)).toBe(EXIT.USAGE);
    expect(workspace.urls).toEqual([]);
    expect(stderr()).toContain("invalid format 'xml'");
  });

  it("rejects an unknown --fail-on level", async () => {
    expect(await scan({ failOn: "critical" })).toBe(EXIT.USAGE);
  });

  it("fails when an explicit config file is missing", async () => {
    expect(await scan({ config: "nope.yml" })).toBe(EXIT.USAGE);
    expect(stderr()).toContain("config file not found: nope.yml");
  });

  it("prints setup guidance when no token is available", async () => {
    const workspace = fakeWorkspace({});

    expect(await scan({ token: undefined }, workspace)).toBe(EXIT.USAGE);
    expect(workspace.urls).toEqual([]);
    expect(stderr()).toContain("No integration token configured.");
    expect(stderr()).toContain("1. Create a new integration");
  });

  it("takes the token from the environment", async () => {
    expect(await scan({ token: undefined, env: { PAGESCOPE_TOKEN: "test-secret" } })).toBe(EXIT.OK);
  });

  it("takes the token and settings from the config file", async () => {
    writeFileSync(join(TEST_DIR, ".pagescope.yml"), "token: test-secret\nrequest_delay_ms: 0\n");

    expect(await scan({ token: undefined })).toBe(EXIT.OK);
  });

  it("exits with the partial code when a page fetch fails", async () => {
    const code = await scan({}, fakeWorkspace({ p1: PRIVATE_PAGE, p2: null }));

    expect(code).toBe(EXIT.PARTIAL);
    expect(readJson("pagescope-report.json")).toMatchObject({ totalScanned: 1 });
  });

  it("exits with the threshold code when --fail-on is reached", async () => {
    expect(await scan({ failOn: "medium" }, fakeWorkspace({ p1: MEDIUM_PAGE }))).toBe(EXIT.THRESHOLD);
  });

  it("ignores medium pages for --fail-on high", async () => {
    expect(await scan({ failOn: "high" }, fakeWorkspace({ p1: MEDIUM_PAGE }))).toBe(EXIT.OK);
  });
});
