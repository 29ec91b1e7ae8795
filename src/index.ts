/**
 * Download report pipeline: search the package index, keep the most
 * downloaded matches and render them as a standalone HTML page.
 */
import { fetchCatalog as _fetchCatalog } from "./catalog.js";
import { topN } from "./rank.js";
import { renderReport, type RenderOptions } from "./report.js";
import type { ReportConfig } from "./config.js";
import type { CatalogEntry } from "./catalog.js";

export { decodeEntry, fetchCatalog, isIncluded, searchUrl } from "./catalog.js";
export type { CatalogEntry, CatalogQuery } from "./catalog.js";
export { defaultConfig, loadConfig } from "./config.js";
export type { ReportConfig } from "./config.js";
export { TransportError } from "./errors.js";
export { humanize } from "./humanize.js";
export { topN } from "./rank.js";
export { barWidth, escapeHtml, formatTimestamp, renderReport } from "./report.js";
export type { RenderOptions } from "./report.js";

/** Result of one pipeline run. */
export type Report = {
  /** Ranked entries included in the document */
  entries: CatalogEntry[];
  /** Rendered HTML */
  html: string;
};

/**
 * Fetch, rank and render in one go. Nothing is rendered if the fetch fails.
 *
 * @param config - Run configuration.
 * @param generatedAt - Timestamp printed in the document.
 * @param deps - Optional overrides, used by tests.
 */
export async function generateReport(
  config: ReportConfig,
  generatedAt: Date,
  deps: { fetchCatalog?: typeof _fetchCatalog; render?: RenderOptions } = {}
): Promise<Report> {
  const fetchCatalog = deps.fetchCatalog ?? _fetchCatalog;
  const all = await fetchCatalog(config);
  const entries = topN(all, config.limit);
  return { entries, html: renderReport(entries, generatedAt, deps.render) };
}
