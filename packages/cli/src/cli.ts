import { runScan, type ScanOptions } from "./commands/scan.js";
import { runInit } from "./commands/init.js";
import { runIndicators } from "./commands/indicators.js";
import { EXIT } from "./exit-codes.js";

const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36mpagescope\x1b[0m — find workspace pages that may be publicly exposed
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  pagescope scan --format <fmt>     Scan the workspace and write a report
  pagescope init [path]             Write a starter .pagescope.yml
  pagescope indicators              List the exposure indicators
  pagescope version                 Print version

\x1b[1mSCAN OPTIONS\x1b[0m
  -f, --format <fmt>           Required. json, csv, both, markdown
  -o, --output <file>          Report path (default: pagescope-report.json)
                               With --format both, the CSV path swaps the extension for .csv
                               (a .csv output keeps the CSV there and writes the JSON beside it)
  --token <token>              Integration token (or set PAGESCOPE_TOKEN env var)
  --config <file>              Config file (default: ./.pagescope.yml)
  --probe                      Also request each page URL anonymously (slow, heuristic)
  --fail-on <level>            Exit 4 if any page is at or above level (medium, high)

\x1b[1mEXAMPLES\x1b[0m
  pagescope scan -f json                                JSON report in the current directory
  pagescope scan -f both -o audit/report.json           audit/report.json and audit/report.csv
  pagescope scan -f csv --fail-on high                  CI gate on high-risk pages
  pagescope scan -f markdown --probe                    Shareable report, with reachability probe

\x1b[1mGLOBAL OPTIONS\x1b[0m
  --verbose                    Set log level to debug
  --quiet                      Suppress info/warn output

\x1b[1mEXIT CODES\x1b[0m
  0 complete   1 failed   2 configuration/usage error   3 partial data   4 --fail-on reached

\x1b[1mENVIRONMENT\x1b[0m
  PAGESCOPE_TOKEN                   Integration token
  PAGESCOPE_LOG_LEVEL               Log level: debug, info, warn, error, silent

`);
}

const BOOLEAN_FLAGS = new Set(["help", "version", "verbose", "quiet", "probe"]);

const KNOWN_FLAGS = new Set([
  ...BOOLEAN_FLAGS,
  "format", "output", "token", "config", "fail-on",
]);

const SHORT_FLAGS: Record<string, string> = { f: "format", o: "output" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseArgs(argv: string[]): { command: string; args: Record<string, string>; positional: string[] } {
  const command = argv[0] || "";
  const args: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const key = arg.slice(2);

      if (!KNOWN_FLAGS.has(key)) {
        process.stderr.write(`[pagescope] Warning: unknown flag --${key}\n`);
      }

      if (BOOLEAN_FLAGS.has(key)) {
        args[key] = "true";
      } else {
        if (i + 1 >= argv.length || argv[i + 1].startsWith("-")) {
          throw new UsageError(`--${key} requires a value`);
        }
        args[key] = argv[++i];
      }
    } else if (arg.startsWith("-") && arg.length > 1) {
      const key = arg.slice(1);
      if (key === "h") args["help"] = "true";
      else if (key === "v") args["version"] = "true";
      else if (SHORT_FLAGS[key]) {
        if (i + 1 >= argv.length || argv[i + 1].startsWith("-")) {
          throw new UsageError(`-${key} requires a value`);
        }
        args[SHORT_FLAGS[key]] = argv[++i];
      } else {
        process.stderr.write(`[pagescope] Warning: unknown flag -${key}\n`);
      }
    } else {
      positional.push(arg);
    }
  }

  // Handle --verbose / --quiet
  if (args["verbose"] === "true") {
    process.env.PAGESCOPE_LOG_LEVEL = "debug";
  } else if (args["quiet"] === "true") {
    process.env.PAGESCOPE_LOG_LEVEL = "error";
  }

  return { command, args, positional };
}

export async function main(rawArgs: string[]): Promise<number> {
  if (rawArgs.length === 0 || rawArgs.includes("--help") || rawArgs.includes("-h")) {
    printHelp();
    return rawArgs.length === 0 ? EXIT.USAGE : EXIT.OK;
  }

  if (rawArgs.includes("--version") || rawArgs.includes("-v")) {
    process.stdout.write(`pagescope v${VERSION}\n`);
    return EXIT.OK;
  }

  let parsed: ReturnType<typeof parseArgs>;
  try {
    parsed = parseArgs(rawArgs);
  } catch (err) {
    if (err instanceof UsageError) {
      process.stderr.write(`[pagescope] Error: ${err.message}\n`);
      return EXIT.USAGE;
    }
    throw err;
  }
  const { command, args, positional } = parsed;

  switch (command) {
    case "version":
      process.stdout.write(`pagescope v${VERSION}\n`);
      return EXIT.OK;

    case "indicators":
      runIndicators();
      return EXIT.OK;

    case "init":
      return runInit({ path: positional[0] || "." });

    case "scan": {
      const scanOpts: ScanOptions = {
        format: args["format"],
        output: args["output"],
        token: args["token"],
        config: args["config"],
        probe: args["probe"] === "true",
        failOn: args["fail-on"],
      };
      return runScan(scanOpts);
    }

    default:
      process.stderr.write(`Unknown command: ${command}\n`);
      printHelp();
      return EXIT.USAGE;
  }
}
