#!/usr/bin/env node
import { writeFile as _writeFile } from "node:fs/promises";
import { Command, CommanderError } from "commander";
import { generateReport as _generateReport } from "./index.js";
import { loadConfig, parsePositiveInt, type ReportConfig } from "./config.js";
import { TransportError } from "./errors.js";

function buildProgram(): Command {
  return new Command()
    .name("sdk-downloads-report")
    .description("Rank packages from a search index by total downloads and write an HTML report.")
    .option("-o, --output <path>", "path to the HTML file to generate")
    .option("-n, --limit <count>", "number of packages to include")
    .exitOverride();
}

export async function run(
  argv: string[] = process.argv,
  deps: {
    generateReport?: typeof _generateReport;
    writeFile?: (path: string, data: string) => Promise<void>;
    now?: () => Date;
    env?: Record<string, string | undefined>;
  } = {}
): Promise<void> {
  const generateReport = deps.generateReport ?? _generateReport;
  const writeFile = deps.writeFile ?? ((path: string, data: string) => _writeFile(path, data, "utf8"));
  const now = deps.now ?? (() => new Date());

  const program = buildProgram();
  try {
    program.parse(argv, { from: "node" });
  } catch (err: unknown) {
    // --help and --version also end up here, with exit code 0.
    if (err instanceof CommanderError) {
      if (err.exitCode !== 0) process.exit(err.exitCode);
      return;
    }
    throw err;
  }
  const opts = program.opts<{ output?: string; limit?: string }>();

  try {
    const overrides: Partial<ReportConfig> = {};
    if (opts.output) overrides.outputPath = opts.output;
    if (opts.limit !== undefined) {
      const limit = parsePositiveInt(opts.limit, 0);
      if (limit === 0) throw new Error(`--limit must be a positive integer, got "${opts.limit}"`);
      overrides.limit = limit;
    }
    const config = loadConfig(deps.env ?? process.env, overrides);

    const { entries, html } = await generateReport(config, now());
    await writeFile(config.outputPath, html);
    console.log(`Wrote ${entries.length} package entries to ${config.outputPath}`);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(err instanceof TransportError ? `Failed to fetch package data: ${msg}` : msg);
    process.exit(1);
  }
}

/* c8 ignore next 3 */
if (!process.env.VITEST) {
  void run();
}
