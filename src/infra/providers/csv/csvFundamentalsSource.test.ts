import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CsvFundamentalsSource } from "./csvFundamentalsSource";

let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(path.join(tmpdir(), "fundamentals-csv-"));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

const writeCsv = async (contents: string): Promise<string> => {
  const csvPath = path.join(workDir, "fundamentals.csv");
  await writeFile(csvPath, contents, "utf-8");
  return csvPath;
};

describe("CsvFundamentalsSource", () => {
  it("finds the row for a ticker case-insensitively", async () => {
    const csvPath = await writeCsv(
      "ticker,asOf,revenue,cogs\nabc,2023-12-31,5,1\nxyz,2024-12-31,100,\n",
    );
    const source = new CsvFundamentalsSource(csvPath);

    const result = await source.findRow({ symbol: "XYZ" });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toEqual({
      ticker: "xyz",
      asOf: "2024-12-31",
      revenue: "100",
      cogs: "",
    });
  });

  it("returns the first matching row when a ticker repeats", async () => {
    const csvPath = await writeCsv("ticker,revenue\nXYZ,1\nXYZ,2\n");
    const source = new CsvFundamentalsSource(csvPath);

    const result = await source.findRow({ symbol: "xyz" });

    expect(result.isOk() && result.value.revenue).toBe("1");
  });

  it("reports unknown tickers as not found", async () => {
    const csvPath = await writeCsv("ticker,revenue\nABC,1\n");
    const source = new CsvFundamentalsSource(csvPath);

    const result = await source.findRow({ symbol: "XYZ" });

    if (result.isOk()) {
      throw new Error("expected not found");
    }
    expect(result.error.code).toBe("not_found");
    expect(result.error.message).toBe(`Ticker XYZ not found in ${csvPath}`);
  });

  it("reports a missing file as a configuration error", async () => {
    const csvPath = path.join(workDir, "missing.csv");
    const source = new CsvFundamentalsSource(csvPath);

    const result = await source.findRow({ symbol: "XYZ" });

    if (result.isOk()) {
      throw new Error("expected missing file error");
    }
    expect(result.error.code).toBe("config_invalid");
    expect(result.error.message).toBe(`CSV not found at ${csvPath}`);
  });

  it("reads the file once per instance", async () => {
    const csvPath = await writeCsv("ticker,revenue\nXYZ,1\n");
    const source = new CsvFundamentalsSource(csvPath);

    const first = await source.findRow({ symbol: "XYZ" });
    await writeFile(csvPath, "ticker,revenue\nXYZ,2\n", "utf-8");
    const second = await source.findRow({ symbol: "XYZ" });

    expect(first.isOk() && first.value.revenue).toBe("1");
    expect(second.isOk() && second.value.revenue).toBe("1");
  });
});
