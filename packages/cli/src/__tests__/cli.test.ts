import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { main, parseArgs, UsageError } from "../cli.js";
import { EXIT } from "../exit-codes.js";

describe("parseArgs", () => {
  beforeEach(() => {
    vi.stubEnv("PAGESCOPE_LOG_LEVEL", "silent");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("parses command as first positional", () => {
    const result = parseArgs(["init", "./audit"]);
    expect(result.command).toBe("init");
    expect(result.positional).toEqual(["./audit"]);
  });

  it("parses key-value flags", () => {
    const result = parseArgs(["scan", "--format", "json", "--fail-on", "high", "--token", "test-secret"]);
    expect(result.args).toEqual({ format: "json", "fail-on": "high", token: "test-secret" });
  });

  it("parses short flags", () => {
    const result = parseArgs(["scan", "-f", "both", "-o", "out/report.json"]);
    expect(result.args["format"]).toBe("both");
    expect(result.args["output"]).toBe("out/report.json");
  });

  it("parses --probe as boolean", () => {
    const result = parseArgs(["scan", "--probe", "-f", "csv"]);
    expect(result.args["probe"]).toBe("true");
    expect(result.args["format"]).toBe("csv");
  });

  it("throws when a value flag has no value", () => {
    expect(() => parseArgs(["scan", "--format"])).toThrow(UsageError);
    expect(() => parseArgs(["scan", "-o", "--probe"])).toThrow("-o requires a value");
  });

  it("warns about unknown flags and keeps going", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    const result = parseArgs(["scan", "--color", "auto", "-f", "json"]);

    expect(stderr).toHaveBeenCalledWith("[pagescope] Warning: unknown flag --color\n");
    expect(result.args["format"]).toBe("json");
  });

  it("--verbose sets the log level to debug", () => {
    parseArgs(["scan", "--verbose"]);
    expect(process.env.PAGESCOPE_LOG_LEVEL).toBe("debug");
  });

  it("--quiet sets the log level to error", () => {
    parseArgs(["scan", "--quiet"]);
    expect(process.env.PAGESCOPE_LOG_LEVEL).toBe("error");
  });
});

describe("main", () => {
  let written: () => string[];

  beforeEach(() => {
    const spy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    written = () => spy.mock.calls.map(([chunk]) => String(chunk));
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints help and a usage code with no arguments", async () => {
    expect(await main([])).toBe(EXIT.USAGE);
    expect(written().join("")).toContain("pagescope scan --format <fmt>");
  });

  it("prints help with --help", async () => {
    expect(await main(["--help"])).toBe(EXIT.OK);
  });

  it("prints the version", async () => {
    expect(await main(["version"])).toBe(EXIT.OK);
    expect(written()).toEqual(["pagescope v0.1.0\n"]);
  });

  it("lists the indicators", async () => {
    expect(await main(["indicators"])).toBe(EXIT.OK);
    const out = written().join("");
    expect(out).toContain("public-url-present");
    expect(out).toContain("reachable-without-auth");
  });

  it("rejects an unknown command", async () => {
    expect(await main(["deploy"])).toBe(EXIT.USAGE);
  });

  it("maps a missing flag value to a usage code", async () => {
    expect(await main(["scan", "--format"])).toBe(EXIT.USAGE);
  });

  it("rejects scan without a format", async () => {
    expect(await main(["scan"])).toBe(EXIT.USAGE);
  });
});
