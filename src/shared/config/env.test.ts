import { describe, expect, it } from "vitest";
import { loadAppConfig, normalizeCik } from "./env";

describe("loadAppConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadAppConfig({});

    expect(config).toEqual({
      nodeEnv: "development",
      logLevel: undefined,
      tickers: ["AAPL"],
      csvPath: "data/fundamentals.csv",
      outputDir: "data",
      seriesYearLimit: 10,
      edgar: {
        baseUrl: "https://data.sec.gov",
        userAgent: "fundamentals-builder/0.1 (contact: devnull@example.com)",
        timeoutMs: 30_000,
        requestPauseMs: 250,
        cikBySymbol: new Map([["AAPL", "0000320193"]]),
      },
    });
  });

  it("normalizes configured tickers and CIK pairs", () => {
    const config = loadAppConfig({
      NODE_ENV: "test",
      APP_TICKERS: " aaa, bbb ,,",
      SEC_EDGAR_CIK_MAP: "aaa:1, BBB : 0000000022 ,",
      SEC_EDGAR_REQUEST_PAUSE_MS: "0",
      SERIES_YEAR_LIMIT: "5",
    });

    expect(config.nodeEnv).toBe("test");
    expect(config.tickers).toEqual(["AAA", "BBB"]);
    expect(config.edgar.cikBySymbol).toEqual(
      new Map([
        ["AAA", "0000000001"],
        ["BBB", "0000000022"],
      ]),
    );
    expect(config.edgar.requestPauseMs).toBe(0);
    expect(config.seriesYearLimit).toBe(5);
  });

  it("rejects malformed CIK pairs", () => {
    expect(() => loadAppConfig({ SEC_EDGAR_CIK_MAP: "AAA-1" })).toThrow(
      "Expected TICKER:CIK pair, received 'AAA-1'.",
    );
    expect(() => loadAppConfig({ SEC_EDGAR_CIK_MAP: "AAA:12ab" })).toThrow(
      "Expected TICKER:CIK pair",
    );
  });

  it("validates LOG_LEVEL against the logger's levels", () => {
    expect(loadAppConfig({ LOG_LEVEL: "warn" }).logLevel).toBe("warn");
    expect(loadAppConfig({ LOG_LEVEL: " " }).logLevel).toBeUndefined();
    expect(() => loadAppConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });

  it("rejects a non-positive series limit", () => {
    expect(() => loadAppConfig({ SERIES_YEAR_LIMIT: "0" })).toThrow();
  });
});

describe("normalizeCik", () => {
  it("pads numeric and string CIKs to ten digits", () => {
    expect(normalizeCik(320193)).toBe("0000320193");
    expect(normalizeCik("CIK0000789019")).toBe("0000789019");
  });
});
