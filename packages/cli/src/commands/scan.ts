import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, extname, resolve } from "node:path";
import {
  CONFIG_FILE_NAME,
  TOKEN_ENV_VAR,
  defaultConfig,
  formatCsvReport,
  formatJsonReport,
  generateMarkdownReport,
  loadConfig,
  logger,
  parseLevel,
  resolveToken,
  runAudit,
  type AuditOutcome,
  type FetchLike,
  type PacingPolicy,
  type Report,
  type ScanProgress,
} from "@pagescope/engine";
import {
  formatFailureChecklist,
  formatHighRiskWarning,
  formatSetupGuidance,
  formatSummary,
  progressBar,
} from "../formatter.js";
import { EXIT, type ExitCode } from "../exit-codes.js";

export const VALID_FORMATS = ["json", "csv", "both", "markdown"] as const;
export type ReportFormat = (typeof VALID_FORMATS)[number];

const VALID_FAIL_ON = ["medium", "high"] as const;
type FailOn = (typeof VALID_FAIL_ON)[number];

export interface ScanOptions {
  format: string | undefined;
  output?: string;
  token?: string;
  /** Config file path; defaults to .pagescope.yml in `cwd`. */
  config?: string;
  probe: boolean;
  failOn?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Test seams. */
  fetch?: FetchLike;
  pacer?: PacingPolicy;
  now?: () => Date;
}

export interface OutputPaths {
  json?: string;
  csv?: string;
  markdown?: string;
}

const DEFAULT_BASENAME = "pagescope-report";

function isFormat(value: string): value is ReportFormat {
  return (VALID_FORMATS as readonly string[]).includes(value);
}

function isFailOn(value: string): value is FailOn {
  return (VALID_FAIL_ON as readonly string[]).includes(value);
}

/** `report.json` → `report.csv`; a path without an extension gets `.csv` appended. */
export function replaceExtension(path: string, ext: string): string {
  const current = extname(path);
  return (current ? path.slice(0, -current.length) : path) + ext;
}

export function resolveOutputPaths(format: ReportFormat, output?: string): OutputPaths {
  switch (format) {
    case "json":
      return { json: output ?? `${DEFAULT_BASENAME}.json` };
    case "csv":
      return { csv: output ?? `${DEFAULT_BASENAME}.csv` };
    case "markdown":
      return { markdown: output ?? `${DEFAULT_BASENAME}.md` };
    case "both": {
      const base = output ?? `${DEFAULT_BASENAME}.json`;
      const csv = replaceExtension(base, ".csv");
      // `-o report.csv` names the CSV; the JSON goes beside it.
      const json = csv === base ? replaceExtension(base, ".json") : base;
      return { json, csv };
    }
  }
}

function writeReportFile(cwd: string, path: string, content: string): string {
  const full = resolve(cwd, path);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content, "utf-8");
  return full;
}

export interface ProgressStream {
  write(chunk: string): boolean;
  isTTY?: boolean;
}

/**
 * Progress on stderr. The redrawn bar needs a terminal; nothing is drawn
 * when the log level is above info.
 */
export function createProgressRenderer(
  stream: ProgressStream = process.stderr,
  level: string | undefined = process.env.PAGESCOPE_LOG_LEVEL,
): (event: ScanProgress) => void {
  if (parseLevel(level) > parseLevel("info")) return () => {};
  const drawBar = stream.isTTY === true;

  return (event) => {
    switch (event.phase) {
      case "discovered":
        stream.write(`[pagescope] Found ${event.total} page(s). Analyzing...\n`);
        break;
      case "fetch":
        if (drawBar) {
          stream.write(`\r${progressBar(event.current, event.total)} ${event.current}/${event.total}\x1b[K`);
        }
        break;
      case "done":
        if (drawBar && event.total > 0) stream.write("\n");
        break;
    }
  };
}

function thresholdReached(report: Report, failOn: FailOn | undefined): boolean {
  if (!failOn) return false;
  if (failOn === "high") return report.riskSummary.high > 0;
  return report.riskSummary.high + report.riskSummary.medium > 0;
}

export async function runScan(options: ScanOptions): Promise<ExitCode> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  // Validate --format
  if (!options.format || !isFormat(options.format)) {
    const got = options.format ? `invalid format '${options.format}'` : "--format is required";
    process.stderr.write(`[pagescope] Error: ${got}. Must be one of: ${VALID_FORMATS.join(", ")}\n`);
    return EXIT.USAGE;
  }
  const format = options.format;

  let failOn: FailOn | undefined;
  if (options.failOn !== undefined) {
    if (!isFailOn(options.failOn)) {
      process.stderr.write(
        `[pagescope] Error: invalid --fail-on '${options.failOn}'. Must be one of: ${VALID_FAIL_ON.join(", ")}\n`,
      );
      return EXIT.USAGE;
    }
    failOn = options.failOn;
  }

  const configFile = options.config ?? CONFIG_FILE_NAME;
  const loaded = loadConfig(cwd, configFile);
  if (!loaded && options.config) {
    process.stderr.write(`[pagescope] Error: config file not found: ${options.config}\n`);
    return EXIT.USAGE;
  }
  const config = loaded ?? defaultConfig();

  const token = resolveToken({ flag: options.token, env: env[TOKEN_ENV_VAR], config });
  const paths = resolveOutputPaths(format, options.output);

  process.stdout.write(`\x1b[36m\x1b[1mpagescope scan\x1b[0m\n`);
  process.stdout.write(
    `\x1b[2mFormat: ${format.toUpperCase()} | Output: ${Object.values(paths).join(", ")}\x1b[0m\n\n`,
  );

  const outcome: AuditOutcome = await runAudit({
    token,
    config,
    probe: options.probe || undefined,
    fetch: options.fetch,
    pacer: options.pacer,
    now: options.now,
    onProgress: createProgressRenderer(),
  });

  switch (outcome.status) {
    case "configuration-error":
      process.stderr.write(formatSetupGuidance(outcome.error));
      return EXIT.USAGE;
    case "failed":
      process.stderr.write(formatFailureChecklist(outcome.error));
      return EXIT.FAILED;
    case "complete":
    case "partial":
      break;
  }

  const { report } = outcome.result;
  const written: string[] = [];

  try {
    if (paths.json) written.push(writeReportFile(cwd, paths.json, formatJsonReport(report)));
    if (paths.csv) written.push(writeReportFile(cwd, paths.csv, formatCsvReport(report)));
    if (paths.markdown) written.push(writeReportFile(cwd, paths.markdown, generateMarkdownReport(report)));
  } catch (err) {
    process.stderr.write(
      `[pagescope] Error: could not write report: ${err instanceof Error ? err.message : String(err)}\n`,
    );
    return EXIT.FAILED;
  }

  process.stdout.write(formatSummary(report));
  process.stdout.write(formatHighRiskWarning(report));
  for (const file of written) {
    process.stdout.write(`\x1b[32mReport written to ${file}\x1b[0m\n`);
  }

  if (outcome.status === "partial") {
    const { discoveryFailure, fetchFailures } = outcome.result;
    if (discoveryFailure) {
      logger.warn(`Discovery stopped early: ${discoveryFailure.message}`);
    }
    if (fetchFailures.length > 0) {
      logger.warn(`${fetchFailures.length} page(s) were skipped because they could not be fetched`);
    }
  }

  if (thresholdReached(report, failOn)) return EXIT.THRESHOLD;
  return outcome.status === "partial" ? EXIT.PARTIAL : EXIT.OK;
}
