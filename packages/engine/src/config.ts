/**
 * Config loader: reads and validates `.pagescope.yml`.
 * Uses Zod for per-field validation; bad values warn and fall back to defaults.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";

import { DEFAULT_API_VERSION, DEFAULT_BASE_URL } from "./api/client.js";
import { ConfigurationError } from "./errors.js";
import { logger } from "./logger.js";
import {
  DEFAULT_REQUEST_DELAY_MS,
  FixedIntervalPacer,
  TokenBucketPacer,
  immediatePacer,
  type PacingPolicy,
  type Sleep,
} from "./pacing.js";
import { DEFAULT_PRIVATE_URL_MARKERS, DEFAULT_PROBE_TIMEOUT_MS } from "./scanner/sharing-heuristic.js";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export const CONFIG_FILE_NAME = ".pagescope.yml";
export const PLACEHOLDER_TOKEN = "your_integration_token_here";
export const TOKEN_ENV_VAR = "PAGESCOPE_TOKEN";

export const VALID_PACING = ["fixed", "token-bucket"] as const;
export type PacingMode = (typeof VALID_PACING)[number];

export interface PagescopeConfig {
  /** Integration token. Prefer the env var; a file value is a fallback. */
  token?: string;
  api_version: string;
  base_url: string;
  /** Delay between requests; 0 disables pacing. */
  request_delay_ms: number;
  pacing: PacingMode;
  /** Burst size for the token-bucket pacer. */
  bucket_capacity: number;
  private_url_markers: string[];
  probe: {
    enabled: boolean;
    timeout_ms: number;
  };
}

export function defaultConfig(): PagescopeConfig {
  return {
    api_version: DEFAULT_API_VERSION,
    base_url: DEFAULT_BASE_URL,
    request_delay_ms: DEFAULT_REQUEST_DELAY_MS,
    pacing: "fixed",
    bucket_capacity: 3,
    private_url_markers: [...DEFAULT_PRIVATE_URL_MARKERS],
    probe: { enabled: false, timeout_ms: DEFAULT_PROBE_TIMEOUT_MS },
  };
}

/* ------------------------------------------------------------------ */
/*  Zod schemas                                                        */
/* ------------------------------------------------------------------ */

const fieldSchemas = {
  token: z.string().min(1),
  api_version: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD"),
  base_url: z.string().url(),
  request_delay_ms: z.number().int().nonnegative(),
  pacing: z.enum(VALID_PACING),
  bucket_capacity: z.number().int().positive(),
  private_url_markers: z.array(z.string().min(1)),
};

const probeSchema = z
  .object({
    enabled: z.boolean().optional(),
    timeout_ms: z.number().int().positive().optional(),
  })
  .strict();

const KNOWN_KEYS = [...Object.keys(fieldSchemas), "probe"];

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

export function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

function levenshtein(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      row[j] = a[i - 1] === b[j - 1]
        ? prev[j - 1]
        : 1 + Math.min(prev[j], row[j - 1], prev[j - 1]);
    }
    prev = row;
  }

  return prev[b.length];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pick<T>(
  data: Record<string, unknown>,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T | undefined {
  if (data[key] === undefined || data[key] === null) return undefined;
  const result = schema.safeParse(data[key]);
  if (result.success) return result.data;
  const issue = result.error.issues[0]?.message ?? "invalid value";
  logger.warn(`Warning: invalid ${key} (${issue}). Using default.`);
  return undefined;
}

function hint(key: string): string {
  const suggestion = didYouMean(key, KNOWN_KEYS);
  return suggestion ? ` (did you mean '${suggestion}'?)` : "";
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

/**
 * Load the config file from `dir` (or the file itself when `file` is absolute).
 * Returns the parsed config merged with defaults, or null if no file exists.
 */
export function loadConfig(dir: string, file: string = CONFIG_FILE_NAME): PagescopeConfig | null {
  const configPath = resolve(dir, file);

  if (!existsSync(configPath)) return null;

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(configPath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(`Warning: could not parse ${file}: ${message}. Using defaults.`);
    return defaultConfig();
  }

  if (!isRecord(parsed)) return defaultConfig();

  return parseConfig(parsed);
}

/** Validate a raw config object field by field. */
export function parseConfig(data: Record<string, unknown>): PagescopeConfig {
  const config = defaultConfig();

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.includes(key)) {
      logger.warn(`Warning: unknown config key '${key}'${hint(key)}`);
    }
  }

  const token = pick(data, "token", fieldSchemas.token);
  if (token !== undefined) config.token = token;
  config.api_version = pick(data, "api_version", fieldSchemas.api_version) ?? config.api_version;
  config.base_url = pick(data, "base_url", fieldSchemas.base_url) ?? config.base_url;
  config.request_delay_ms = pick(data, "request_delay_ms", fieldSchemas.request_delay_ms) ?? config.request_delay_ms;
  config.bucket_capacity = pick(data, "bucket_capacity", fieldSchemas.bucket_capacity) ?? config.bucket_capacity;
  config.private_url_markers = pick(data, "private_url_markers", fieldSchemas.private_url_markers) ?? config.private_url_markers;

  if (data.pacing !== undefined) {
    const pacing = pick(data, "pacing", fieldSchemas.pacing);
    if (pacing === undefined && typeof data.pacing === "string") {
      const suggestion = didYouMean(data.pacing, VALID_PACING);
      if (suggestion) logger.warn(`Warning: did you mean pacing '${suggestion}'?`);
    }
    config.pacing = pacing ?? config.pacing;
  }

  if (data.probe !== undefined) {
    const result = probeSchema.safeParse(data.probe);
    if (result.success) {
      config.probe = {
        enabled: result.data.enabled ?? config.probe.enabled,
        timeout_ms: result.data.timeout_ms ?? config.probe.timeout_ms,
      };
    } else {
      for (const issue of result.error.issues) {
        logger.warn(`Warning: config validation error: ${["probe", ...issue.path].join(".")}: ${issue.message}`);
      }
    }
  }

  return config;
}

/* ------------------------------------------------------------------ */
/*  Credential                                                         */
/* ------------------------------------------------------------------ */

export interface TokenSources {
  flag?: string;
  env?: string;
  config?: PagescopeConfig | null;
}

/** `--token` beats the environment, which beats the config file. */
export function resolveToken(sources: TokenSources): string | undefined {
  return sources.flag || sources.env || sources.config?.token || undefined;
}

export function assertUsableToken(token: string | undefined): asserts token is string {
  if (!token || !token.trim()) {
    throw new ConfigurationError("No integration token configured.");
  }
  if (token.trim() === PLACEHOLDER_TOKEN) {
    throw new ConfigurationError("The integration token is still the placeholder value.");
  }
}

/* ------------------------------------------------------------------ */
/*  Pacing                                                             */
/* ------------------------------------------------------------------ */

export function createPacer(config: PagescopeConfig, sleep?: Sleep): PacingPolicy {
  if (config.request_delay_ms === 0) return immediatePacer;
  if (config.pacing === "token-bucket") {
    return new TokenBucketPacer({
      capacity: config.bucket_capacity,
      refillPerSecond: 1000 / config.request_delay_ms,
      sleep,
    });
  }
  return new FixedIntervalPacer(config.request_delay_ms, sleep);
}
