// ---------------------------------------------------------------------------
// @pagescope/engine
//
// Workspace page exposure audit: discovery, heuristics, risk tiers, reports.
// ---------------------------------------------------------------------------

// API
export {
  WorkspaceClient,
  DEFAULT_API_VERSION,
  DEFAULT_BASE_URL,
  SEARCH_PAGE_SIZE,
  type ApiResult,
  type FetchLike,
  type WorkspaceClientOptions,
} from "./api/client.js";

export {
  LabelSchema,
  LABEL_DESCRIPTIONS,
  RiskTierSchema,
  PageRecordSchema,
  RiskEntrySchema,
  ReportSchema,
  type Label,
  type RiskTier,
  type AssignedTier,
  type PageRecord,
  type RiskEntry,
  type RiskSummary,
  type Report,
} from "./api/schemas.js";

// Scanner
export { listAllPages, type PageStub, type ListResult, type ListPagesOptions } from "./scanner/page-lister.js";
export { fetchPageRecord, extractTitle, toPageRecord, UNTITLED, type FetchResult } from "./scanner/page-fetcher.js";
export {
  deriveIndicators,
  deriveIndicatorsWithProbe,
  probePublicAccess,
  DEFAULT_PRIVATE_URL_MARKERS,
  DEFAULT_PROBE_TIMEOUT_MS,
  type HeuristicOptions,
  type ProbeOptions,
} from "./scanner/sharing-heuristic.js";
export { classifyRisk } from "./scanner/risk-classifier.js";
export {
  aggregateReport,
  buildRecommendations,
  sortEntries,
  BASELINE_RECOMMENDATIONS,
  HIGH_RISK_RECOMMENDATION,
  MEDIUM_RISK_RECOMMENDATION,
  type AnalyzedPage,
  type AggregateOptions,
} from "./scanner/report.js";
export { PageScanner, type PageScannerOptions, type ScanProgress, type ScanResult } from "./scanner/pipeline.js";

// Pacing
export {
  FixedIntervalPacer,
  TokenBucketPacer,
  immediatePacer,
  DEFAULT_REQUEST_DELAY_MS,
  type PacingPolicy,
  type TokenBucketOptions,
  type Sleep,
  type Clock,
} from "./pacing.js";

// Formatters
export { formatJsonReport } from "./formatters/json-report.js";
export { formatCsvReport, escapeCsvField, CSV_HEADER, INDICATOR_DELIMITER } from "./formatters/csv-report.js";
export { generateMarkdownReport, type ReportOptions } from "./formatters/markdown-report.js";

// Errors
export {
  ScanError,
  DiscoveryFailure,
  DetailFetchFailure,
  ProbeFailure,
  ConfigurationError,
  UnexpectedScanError,
  SETUP_STEPS,
  toScanError,
  type ScanErrorKind,
} from "./errors.js";

// Config
export {
  loadConfig,
  parseConfig,
  defaultConfig,
  resolveToken,
  assertUsableToken,
  createPacer,
  didYouMean,
  CONFIG_FILE_NAME,
  PLACEHOLDER_TOKEN,
  TOKEN_ENV_VAR,
  type PagescopeConfig,
  type TokenSources,
} from "./config.js";

// Logger
export { logger, parseLevel, type Logger } from "./logger.js";

// Main entry point
export { runAudit, type AuditOptions, type AuditOutcome } from "./audit.js";
