/**
 * Minimal structured logger for @pagescope/engine.
 *
 * Respects PAGESCOPE_LOG_LEVEL env var (debug | info | warn | error | silent).
 * Writes to stderr so stdout stays clean for CLI/report output.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;
type Level = keyof typeof LEVELS;

function isLevel(raw: string): raw is Level {
  return Object.prototype.hasOwnProperty.call(LEVELS, raw);
}

export function parseLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  const key = raw.toLowerCase();
  return isLevel(key) ? LEVELS[key] : LEVELS.info;
}

// Read on every call: the CLI flips the level after this module has loaded.
function current(): number {
  return parseLevel(process.env.PAGESCOPE_LOG_LEVEL);
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export const logger: Logger = {
  debug(msg: string) { if (current() <= LEVELS.debug) process.stderr.write(`[pagescope] ${msg}\n`); },
  info(msg: string)  { if (current() <= LEVELS.info)  process.stderr.write(`[pagescope] ${msg}\n`); },
  warn(msg: string)  { if (current() <= LEVELS.warn)  process.stderr.write(`[pagescope] ${msg}\n`); },
  error(msg: string) { if (current() <= LEVELS.error) process.stderr.write(`[pagescope] ${msg}\n`); },
};
