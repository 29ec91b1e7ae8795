import { describe, it, expect } from "vitest";
import { defaultConfig, loadConfig, parsePositiveInt } from "../src/config.js";

describe("loadConfig", () => {
  it("returns defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config).toEqual(defaultConfig);
    expect(config.searchUrl).toBe("https://azuresearch-usnc.nuget.org/query");
    expect(config.pageSize).toBe(100);
    expect(config.limit).toBe(50);
    expect(config.outputPath).toBe("azure_data_plane_downloads.html");
  });

  it("reads REPORT_* variables", () => {
    const config = loadConfig({
      REPORT_SEARCH_URL: "https://search.test/query",
      REPORT_QUERY: "Contoso.",
      REPORT_PREFIX: "Contoso.",
      REPORT_EXCLUDE: "Contoso.Internal, Contoso.Legacy ,",
      REPORT_PAGE_SIZE: "25",
      REPORT_LIMIT: "10",
      REPORT_TIMEOUT_MS: "5000",
      REPORT_MAX_PAGES: "7",
      REPORT_OUTPUT: "out/report.html",
      REPORT_VERBOSE: "1",
    });
    expect(config).toMatchObject({
      searchUrl: "https://search.test/query",
      query: "Contoso.",
      prefix: "Contoso.",
      excludedPrefixes: ["Contoso.Internal", "Contoso.Legacy"],
      pageSize: 25,
      limit: 10,
      timeoutMs: 5000,
      maxPages: 7,
      outputPath: "out/report.html",
      verbose: true,
    });
  });

  it("falls back on unusable numbers and caps the page size", () => {
    const config = loadConfig({ REPORT_LIMIT: "ten", REPORT_TIMEOUT_MS: "-1", REPORT_PAGE_SIZE: "5000" });
    expect(config.limit).toBe(50);
    expect(config.timeoutMs).toBe(30_000);
    expect(config.pageSize).toBe(1000);
  });

  it("lets an empty REPORT_EXCLUDE clear the exclusions", () => {
    expect(loadConfig({ REPORT_EXCLUDE: "" }).excludedPrefixes).toEqual([]);
  });

  it("applies overrides last", () => {
    const config = loadConfig({ REPORT_LIMIT: "10" }, { limit: 3, outputPath: "x.html" });
    expect(config.limit).toBe(3);
    expect(config.outputPath).toBe("x.html");
  });

  it("does not share the default exclusion list", () => {
    const config = loadConfig({});
    config.excludedPrefixes.push("Azure.Extra");
    expect(defaultConfig.excludedPrefixes).not.toContain("Azure.Extra");
  });
});

describe("parsePositiveInt", () => {
  it("accepts whole numbers above zero only", () => {
    expect(parsePositiveInt("12", 1)).toBe(12);
    expect(parsePositiveInt("0", 1)).toBe(1);
    expect(parsePositiveInt("1.5", 1)).toBe(1);
    expect(parsePositiveInt(" ", 1)).toBe(1);
    expect(parsePositiveInt(undefined, 1)).toBe(1);
  });
});
