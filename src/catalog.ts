/** Paginated package search: fetch, decode and filter catalog entries. */
import { httpGet } from "./http.js";
import { TransportError, errorMessage } from "./errors.js";
import type { ReportConfig } from "./config.js";

/** One package record returned by the search API. */
export type CatalogEntry = {
  /** Package id, e.g. "Azure.Storage.Blobs" */
  readonly identifier: string;
  /** Latest version reported by the search index */
  readonly version: string;
  /** Cumulative download count */
  readonly popularity: number;
  /** Package description, possibly empty */
  readonly description: string;
  /** Project URL, when the package declares one */
  readonly homepage?: string;
  /** Owner account names */
  readonly maintainers: readonly string[];
};

/** Settings {@link fetchCatalog} reads from the run configuration. */
export type CatalogQuery = Pick<
  ReportConfig,
  "searchUrl" | "query" | "prefix" | "excludedPrefixes" | "semVerLevel" | "pageSize" | "timeoutMs" | "maxPages" | "verbose"
>;

type SearchPage = {
  totalHits?: unknown;
  data?: unknown;
};

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function toCount(raw: unknown): number {
  const n = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
  return typeof n === "number" && Number.isFinite(n) && n > 0 ? Math.trunc(n) : 0;
}

function toOwners(raw: unknown): string[] {
  if (typeof raw === "string") {
    return raw
      .split(",")
      .map((o) => o.trim())
      .filter(Boolean);
  }
  if (Array.isArray(raw)) {
    return raw.filter((o): o is string => typeof o === "string" && o.length > 0);
  }
  return [];
}

/**
 * Map one raw search item into a {@link CatalogEntry}, substituting
 * defaults for missing or malformed fields.
 *
 * @returns The entry, or undefined when the item has no usable id.
 */
export function decodeEntry(raw: unknown): CatalogEntry | undefined {
  if (!isRecord(raw)) return undefined;
  const id = raw.id;
  if (typeof id !== "string" || id.length === 0) return undefined;
  const projectUrl = raw.projectUrl;
  return Object.freeze({
    identifier: id,
    version: typeof raw.version === "string" ? raw.version : "",
    popularity: toCount(raw.totalDownloads),
    description: typeof raw.description === "string" ? raw.description : "",
    homepage: typeof projectUrl === "string" && projectUrl.length > 0 ? projectUrl : undefined,
    maintainers: Object.freeze(toOwners(raw.owners)),
  });
}

/** Whether an identifier is in the namespace and outside every excluded sub-prefix. */
export function isIncluded(identifier: string, prefix: string, excluded: readonly string[]): boolean {
  if (!identifier.startsWith(prefix)) return false;
  return !excluded.some((p) => identifier.startsWith(p));
}

/** Build the search URL for the page starting at `skip`. */
export function searchUrl(query: CatalogQuery, skip: number): string {
  const url = new URL(query.searchUrl);
  url.searchParams.set("q", query.query);
  url.searchParams.set("prerelease", "false");
  url.searchParams.set("semVerLevel", query.semVerLevel);
  url.searchParams.set("take", String(query.pageSize));
  url.searchParams.set("skip", String(skip));
  return url.toString();
}

async function fetchPage(url: string, timeoutMs: number): Promise<SearchPage> {
  const res = await httpGet(url, { timeoutMs });
  if (!res.ok) {
    throw new TransportError(`search failed: ${res.status} ${res.statusText}`.trim(), { status: res.status, url });
  }
  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    throw new TransportError(`search returned invalid JSON: ${errorMessage(err)}`, { url, cause: err });
  }
  if (!isRecord(body)) throw new TransportError("search returned an unexpected payload", { url });
  return body;
}

/**
 * Walk the search results page by page and collect every entry that passes
 * the namespace rules.
 *
 * Paging stops on an empty page, or once the offset reaches the reported
 * `totalHits`. A server that does neither within `maxPages` requests aborts
 * the fetch.
 *
 * @param query - Endpoint, filters and paging settings.
 * @returns Matching entries in the order the server returned them.
 * @throws {@link TransportError} on any failed request or unreadable page.
 */
export async function fetchCatalog(query: CatalogQuery): Promise<CatalogEntry[]> {
  const entries: CatalogEntry[] = [];
  // NuGet ids are case-insensitive; the index can shift while paging.
  const seen = new Set<string>();
  let skip = 0;

  for (let page = 0; ; page++) {
    if (page >= query.maxPages) {
      throw new TransportError(`search did not finish within ${query.maxPages} pages`);
    }
    const data = await fetchPage(searchUrl(query, skip), query.timeoutMs);
    const items = Array.isArray(data.data) ? data.data : [];
    if (items.length === 0) break;

    for (const item of items) {
      const entry = decodeEntry(item);
      if (!entry || !isIncluded(entry.identifier, query.prefix, query.excludedPrefixes)) continue;
      const k = entry.identifier.toLowerCase();
      if (seen.has(k)) continue;
      seen.add(k);
      entries.push(entry);
    }

    skip += query.pageSize;
    if (query.verbose) console.error(`fetched ${skip} results, ${entries.length} matching`);
    const totalHits = data.totalHits;
    if (typeof totalHits === "number" && skip >= totalHits) break;
  }

  return entries;
}
