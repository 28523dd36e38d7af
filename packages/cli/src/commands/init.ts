import { existsSync, writeFileSync, statSync } from "node:fs";
import { resolve, join } from "node:path";
import {
  CONFIG_FILE_NAME,
  DEFAULT_API_VERSION,
  DEFAULT_BASE_URL,
  DEFAULT_PRIVATE_URL_MARKERS,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_REQUEST_DELAY_MS,
  PLACEHOLDER_TOKEN,
} from "@pagescope/engine";
import { EXIT, type ExitCode } from "../exit-codes.js";

export interface InitOptions {
  path: string;
}

export function generateConfig(): string {
  return `# pagescope configuration

# Prefer the PAGESCOPE_TOKEN environment variable over storing the token here.
token: ${PLACEHOLDER_TOKEN}

api_version: "${DEFAULT_API_VERSION}"
base_url: ${DEFAULT_BASE_URL}

# Delay between API requests. pacing: fixed | token-bucket
request_delay_ms: ${DEFAULT_REQUEST_DELAY_MS}
pacing: fixed
bucket_capacity: 3

# URLs containing any of these are treated as workspace-scoped
private_url_markers:
${DEFAULT_PRIVATE_URL_MARKERS.map((m) => `  - ${m}`).join("\n")}

# Anonymous reachability probe (also available as --probe)
probe:
  enabled: false
  timeout_ms: ${DEFAULT_PROBE_TIMEOUT_MS}
`;
}

export function runInit(options: InitOptions): ExitCode {
  const dir = resolve(options.path);

  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    process.stderr.write(`\x1b[31mError:\x1b[0m ${dir} is not a directory\n`);
    return EXIT.USAGE;
  }

  const configFile = join(dir, CONFIG_FILE_NAME);

  if (existsSync(configFile)) {
    process.stdout.write(`\x1b[2m  skipped\x1b[0m  ${CONFIG_FILE_NAME} (already exists)\n`);
    return EXIT.OK;
  }

  writeFileSync(configFile, generateConfig());
  process.stdout.write(`\x1b[32m  created\x1b[0m  ${CONFIG_FILE_NAME}\n`);
  process.stdout.write(
    `\nNext: set PAGESCOPE_TOKEN (or edit ${CONFIG_FILE_NAME}), then run \x1b[36mpagescope scan -f json\x1b[0m\n`,
  );
  return EXIT.OK;
}
