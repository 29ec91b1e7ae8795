/**
 * Static HTML rendering of a ranked package list. Everything is inlined so
 * the file can be opened or published on its own.
 */
import type { CatalogEntry } from "./catalog.js";
import { humanize } from "./humanize.js";

/** Text shown around the table. */
export type RenderOptions = {
  /** Page title and heading */
  title?: string;
  /** Footer attribution line */
  source?: string;
};

/** Smallest width, in percent, of a bar for a non-zero count. */
export const MIN_BAR_WIDTH = 2;
const OWNERS_PLACEHOLDER = "—";
const UNSAFE_LINK = /^\s*(javascript|data|vbscript):/i;
const COLUMNS = ["#", "Package", "Owners", "Total Downloads", "Human Readable"];

const DEFAULT_TITLE = "Azure Data-Plane SDK Downloads";
const DEFAULT_SOURCE = "Source: nuget.org search API (data-plane packages only).";

const grouped = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

const STYLES = `
    body { font-family: Arial, sans-serif; margin: 2rem; background-color: #f5f7fa; color: #1f2933; }
    h1 { margin-bottom: 0.5rem; }
    .meta { margin-bottom: 1.5rem; color: #52606d; }
    table { width: 100%; border-collapse: collapse; background-color: #ffffff; box-shadow: 0 1px 3px rgba(0, 0, 0, 0.1); }
    th, td { padding: 0.75rem 1rem; border-bottom: 1px solid #d9e2ec; vertical-align: top; }
    th { background-color: #243b53; color: #f0f4f8; text-align: left; }
    tr:nth-child(even) td { background-color: #f8fafc; }
    td.rank { width: 3rem; font-weight: bold; }
    td.package { width: 38%; }
    td.package a { color: #0967d2; text-decoration: none; }
    td.package a:hover { text-decoration: underline; }
    td.owners { width: 22%; font-size: 0.95rem; color: #334e68; }
    .description { margin-top: 0.35rem; font-size: 0.9rem; color: #52606d; }
    td.downloads { position: relative; width: 27%; }
    td.downloads .bar { margin-top: 0.4rem; height: 0.6rem; background: linear-gradient(90deg, #2bb0ed, #1f9dff); border-radius: 0.3rem; }
    td.human { width: 10%; font-weight: bold; text-align: right; }
    .footer { margin-top: 1rem; font-size: 0.85rem; color: #829ab1; }`;

/** Escape text for use in HTML content and double-quoted attributes. */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Bar width in percent for `popularity` relative to the largest count.
 * Positive counts never drop below {@link MIN_BAR_WIDTH}; zero stays zero.
 */
export function barWidth(popularity: number, max: number): number {
  if (max <= 0 || popularity <= 0) return 0;
  return Math.max(MIN_BAR_WIDTH, (popularity / max) * 100);
}

/** ISO-8601 UTC timestamp with second precision, e.g. `2024-05-01T12:00:00Z`. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function packageLabel(entry: CatalogEntry): string {
  const id = escapeHtml(entry.identifier);
  // Script-capable schemes are shown as plain text; every other homepage is linked.
  if (!entry.homepage || UNSAFE_LINK.test(entry.homepage)) return id;
  return `<a href="${escapeHtml(entry.homepage)}" target="_blank" rel="noopener">${id}</a>`;
}

/** Render one table row; `rank` is 1-based. */
export function renderRow(entry: CatalogEntry, rank: number, max: number): string {
  const owners = entry.maintainers.length > 0 ? escapeHtml(entry.maintainers.join(", ")) : OWNERS_PLACEHOLDER;
  const width = barWidth(entry.popularity, max).toFixed(2);
  return (
    "<tr>" +
    `<td class="rank">${rank}</td>` +
    `<td class="package">${packageLabel(entry)}<div class="description">${escapeHtml(entry.description)}</div></td>` +
    `<td class="owners">${owners}</td>` +
    `<td class="downloads">${grouped.format(entry.popularity)}<div class="bar" style="width: ${width}%;"></div></td>` +
    `<td class="human">${humanize(entry.popularity)}</td>` +
    "</tr>"
  );
}

/**
 * Render the full report document.
 *
 * @param entries - Ranked entries, highest first; bars scale to the first one.
 * @param generatedAt - Timestamp printed in the header.
 * @param opts - Optional title and footer text.
 */
export function renderReport(entries: readonly CatalogEntry[], generatedAt: Date, opts: RenderOptions = {}): string {
  const title = escapeHtml(opts.title ?? DEFAULT_TITLE);
  const source = escapeHtml(opts.source ?? DEFAULT_SOURCE);
  const max = entries[0]?.popularity ?? 0;
  const rows =
    entries.length > 0
      ? entries.map((e, i) => renderRow(e, i + 1, max)).join("\n            ")
      : `<tr><td colspan="${COLUMNS.length}">No packages found.</td></tr>`;
  const header = COLUMNS.map((c) => `<th>${c}</th>`).join("");

  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="utf-8">
    <title>${title}</title>
    <style>${STYLES}
    </style>
</head>
<body>
    <h1>${title}</h1>
    <div class="meta">Top ${entries.length} packages by total downloads. Generated at ${formatTimestamp(generatedAt)}.</div>
    <table>
        <thead>
            <tr>${header}</tr>
        </thead>
        <tbody>
            ${rows}
        </tbody>
    </table>
    <div class="footer">${source}</div>
</body>
</html>
`;
}
