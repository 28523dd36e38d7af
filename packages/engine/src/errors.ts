/**
 * Closed error taxonomy for an audit run.
 *
 * Discovery, detail-fetch and probe failures are recovered where they happen
 * and travel on the scan result as values. Configuration and unexpected
 * failures end the run and are returned as an AuditOutcome.
 */

export type ScanErrorKind =
  | "discovery"
  | "detail-fetch"
  | "probe"
  | "configuration"
  | "unexpected";

export abstract class ScanError extends Error {
  abstract readonly kind: ScanErrorKind;
}

/** Discovery request failed; pagination stopped and earlier pages were kept. */
export class DiscoveryFailure extends ScanError {
  readonly kind = "discovery";

  constructor(
    message: string,
    /** HTTP status, or null when the request never got a response. */
    readonly status: number | null,
    /** Number of page stubs collected before the halt. */
    readonly collected: number,
  ) {
    super(message);
    this.name = "DiscoveryFailure";
  }
}

/** A single page could not be fetched; it is left out of the analysis. */
export class DetailFetchFailure extends ScanError {
  readonly kind = "detail-fetch";

  constructor(
    message: string,
    readonly pageId: string,
    readonly status: number | null,
  ) {
    super(message);
    this.name = "DetailFetchFailure";
  }
}

/** The unauthenticated reachability probe failed or timed out. */
export class ProbeFailure extends ScanError {
  readonly kind = "probe";

  constructor(message: string, readonly url: string) {
    super(message);
    this.name = "ProbeFailure";
  }
}

export const SETUP_STEPS: readonly string[] = [
  "Create a new integration at https://www.notion.so/my-integrations",
  "Copy its token into .pagescope.yml (token:) or the PAGESCOPE_TOKEN environment variable",
  "Grant the integration access to the workspace",
  "Share individual pages with the integration where page-level access is required",
];

/** Missing or placeholder credential. Carries the steps to fix it. */
export class ConfigurationError extends ScanError {
  readonly kind = "configuration";
  readonly steps: readonly string[];

  constructor(message: string, steps: readonly string[] = SETUP_STEPS) {
    super(message);
    this.name = "ConfigurationError";
    this.steps = steps;
  }
}

/** Anything outside the recovered kinds. */
export class UnexpectedScanError extends ScanError {
  readonly kind = "unexpected";

  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = "UnexpectedScanError";
  }
}

export function toScanError(err: unknown): ScanError {
  return err instanceof ScanError ? err : new UnexpectedScanError(err);
}
