import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { CommanderError } from "commander";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadAppConfig } from "../shared/config/env";
import { buildCli } from "./main";

let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(path.join(tmpdir(), "fundamentals-cli-"));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

const createCli = (env: Record<string, string> = {}) => {
  const cli = buildCli(() =>
    loadAppConfig({
      NODE_ENV: "test",
      FUNDAMENTALS_CSV_PATH: path.join(workDir, "fundamentals.csv"),
      FUNDAMENTALS_OUTPUT_DIR: path.join(workDir, "out"),
      SEC_EDGAR_REQUEST_PAUSE_MS: "0",
      ...env,
    }),
  );

  for (const command of [cli, ...cli.commands]) {
    command.exitOverride().configureOutput({
      writeOut: () => {},
      writeErr: () => {},
    });
  }

  return cli;
};

const argv = (...args: string[]): string[] => ["node", "fundamentals-builder", ...args];

describe("fundamentals-builder CLI", () => {
  it("writes the CSV document for the requested ticker", async () => {
    await writeFile(
      path.join(workDir, "fundamentals.csv"),
      "ticker,asOf,revenue,cogs\nXYZ,2024-12-31,100,\n",
      "utf-8",
    );

    await createCli().parseAsync(argv("csv", "xyz"));

    const written = JSON.parse(
      await readFile(path.join(workDir, "out", "XYZ.json"), "utf-8"),
    );
    expect(written.asOf).toBe("2024-12-31");
    expect(written.statements.incomeStatement.revenue).toBe(100);
    expect(written.statements.incomeStatement.cogs).toBeNull();
  });

  it("builds from the CSV without an EDGAR user agent", async () => {
    await writeFile(
      path.join(workDir, "fundamentals.csv"),
      "ticker,revenue\nXYZ,100\n",
      "utf-8",
    );

    await createCli({ SEC_EDGAR_USER_AGENT: "" }).parseAsync(argv("csv", "XYZ"));

    const written = JSON.parse(
      await readFile(path.join(workDir, "out", "XYZ.json"), "utf-8"),
    );
    expect(written.statements.incomeStatement.revenue).toBe(100);
  });

  it("honors the --csv and --out overrides", async () => {
    const csvPath = path.join(workDir, "other.csv");
    const outDir = path.join(workDir, "elsewhere");
    await writeFile(csvPath, "ticker,revenue\nABC,7\n", "utf-8");

    await createCli().parseAsync(argv("csv", "ABC", "--csv", csvPath, "--out", outDir));

    expect(await readdir(outDir)).toEqual(["ABC.json"]);
  });

  it("fails with a diagnostic when the ticker is not in the CSV", async () => {
    const csvPath = path.join(workDir, "fundamentals.csv");
    await writeFile(csvPath, "ticker,revenue\nABC,7\n", "utf-8");

    await expect(createCli().parseAsync(argv("csv", "XYZ"))).rejects.toThrow(
      `Ticker XYZ not found in ${csvPath}`,
    );
  });

  it("fails with a diagnostic when the CSV is missing", async () => {
    await expect(createCli().parseAsync(argv("csv", "XYZ"))).rejects.toThrow(
      `CSV not found at ${path.join(workDir, "fundamentals.csv")}`,
    );
  });

  it("rejects the csv command without a ticker", async () => {
    const run = createCli().parseAsync(argv("csv"));

    await expect(run).rejects.toBeInstanceOf(CommanderError);
    await expect(run).rejects.toMatchObject({
      code: "commander.missingArgument",
    });
  });

  it("requires an EDGAR user agent for the edgar command", async () => {
    await expect(
      createCli({
        SEC_EDGAR_USER_AGENT: " ",
        APP_TICKERS: "AAPL",
      }).parseAsync(argv("edgar")),
    ).rejects.toThrow("SEC_EDGAR_USER_AGENT is required");
  });

  it("skips unmapped tickers in the EDGAR batch without writing", async () => {
    await createCli({
      APP_TICKERS: "NOPE",
      SEC_EDGAR_CIK_MAP: "AAPL:320193",
    }).parseAsync(argv("edgar"));

    await expect(readdir(path.join(workDir, "out"))).rejects.toMatchObject({
      code: "ENOENT",
    });
  });
});
