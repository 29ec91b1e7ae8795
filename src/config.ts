/**
 * Run configuration. Every value has a default and may be overridden through
 * the environment (`REPORT_*`) or, for the CLI, by explicit overrides.
 */

/** Settings for one report run. */
export type ReportConfig = {
  /** Search endpoint queried page by page. */
  searchUrl: string;
  /** Free-text query term sent as `q`. */
  query: string;
  /** Namespace prefix every included identifier must start with. */
  prefix: string;
  /** Sub-prefixes whose packages are dropped before ranking. */
  excludedPrefixes: string[];
  /** `semVerLevel` selector sent with every request. */
  semVerLevel: string;
  /** Page size sent as `take`. */
  pageSize: number;
  /** Number of packages kept in the report. */
  limit: number;
  /** Per-request timeout in milliseconds. */
  timeoutMs: number;
  /** Upper bound on requests issued by one fetch. */
  maxPages: number;
  /** Path of the HTML file written by the CLI. */
  outputPath: string;
  /** Log one line per fetched page to stderr. */
  verbose: boolean;
};

export const DEFAULT_SEARCH_URL = "https://azuresearch-usnc.nuget.org/query";
export const DEFAULT_OUTPUT = "azure_data_plane_downloads.html";
// The NuGet search service caps `take` at 1000.
const MAX_PAGE_SIZE = 1000;

export const defaultConfig: Readonly<ReportConfig> = {
  searchUrl: DEFAULT_SEARCH_URL,
  query: "Azure.",
  prefix: "Azure.",
  excludedPrefixes: ["Azure.ResourceManager", "Azure.Core", "Azure.Identity"],
  semVerLevel: "2.0.0",
  pageSize: 100,
  limit: 50,
  timeoutMs: 30_000,
  maxPages: 1000,
  outputPath: DEFAULT_OUTPUT,
  verbose: false,
};

type Env = Record<string, string | undefined>;

/**
 * Parse a positive integer, falling back when the value is missing or not a
 * whole number above zero.
 */
export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function parseList(raw: string | undefined, fallback: string[]): string[] {
  if (raw == null) return fallback;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function nonEmpty(raw: string | undefined, fallback: string): string {
  const v = raw?.trim();
  return v ? v : fallback;
}

/**
 * Build the configuration for a run.
 *
 * @param env - Environment to read `REPORT_*` variables from.
 * @param overrides - Values that win over both defaults and environment.
 */
export function loadConfig(env: Env = process.env, overrides: Partial<ReportConfig> = {}): ReportConfig {
  const fromEnv: ReportConfig = {
    searchUrl: nonEmpty(env.REPORT_SEARCH_URL, defaultConfig.searchUrl),
    query: nonEmpty(env.REPORT_QUERY, defaultConfig.query),
    prefix: nonEmpty(env.REPORT_PREFIX, defaultConfig.prefix),
    excludedPrefixes: parseList(env.REPORT_EXCLUDE, [...defaultConfig.excludedPrefixes]),
    semVerLevel: nonEmpty(env.REPORT_SEMVER_LEVEL, defaultConfig.semVerLevel),
    pageSize: Math.min(parsePositiveInt(env.REPORT_PAGE_SIZE, defaultConfig.pageSize), MAX_PAGE_SIZE),
    limit: parsePositiveInt(env.REPORT_LIMIT, defaultConfig.limit),
    timeoutMs: parsePositiveInt(env.REPORT_TIMEOUT_MS, defaultConfig.timeoutMs),
    maxPages: parsePositiveInt(env.REPORT_MAX_PAGES, defaultConfig.maxPages),
    outputPath: nonEmpty(env.REPORT_OUTPUT, defaultConfig.outputPath),
    verbose: env.REPORT_VERBOSE === "1" || env.REPORT_VERBOSE === "true",
  };
  return { ...fromEnv, ...overrides };
}
