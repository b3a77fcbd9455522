import { Command } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { loadAppConfig, type AppConfig } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

/**
 * Defines one command surface for the local and the SEC EDGAR builders.
 */
export const buildCli = (loadConfig: () => AppConfig = () => loadAppConfig()) => {
  const cli = new Command();
  cli
    .name("fundamentals-builder")
    .description("Build fundamentals JSON documents for the front-end");

  cli
    .command("csv")
    .description("Build one ticker's document from the local fundamentals CSV")
    .argument("<ticker>", "Ticker symbol")
    .option("--csv <path>", "CSV file to read instead of FUNDAMENTALS_CSV_PATH")
    .option("--out <dir>", "Output directory instead of FUNDAMENTALS_OUTPUT_DIR")
    .action(async (ticker: string, opts: { csv?: string; out?: string }) => {
      const runtime = createRuntime(loadConfig(), {
        csvPath: opts.csv,
        outputDir: opts.out,
      });

      const result = await runtime.buildService.buildFromCsv(ticker);
      if (result.isErr()) {
        throw new Error(result.error.message);
      }
    });

  cli
    .command("edgar")
    .description("Build documents for every configured ticker from SEC companyfacts")
    .option("--out <dir>", "Output directory instead of FUNDAMENTALS_OUTPUT_DIR")
    .action(async (opts: { out?: string }) => {
      const config = loadConfig();
      const runtime = createRuntime(config, { outputDir: opts.out });

      const summary = await runtime.buildService.buildFromEdgar(config.tickers);
      logger.info(
        {
          written: summary.written.map((item) => item.symbol),
          skipped: summary.skipped.map((item) => item.symbol),
          failed: summary.failed.map((item) => item.symbol),
        },
        "EDGAR batch finished",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (
  argv: string[],
  loadConfig?: () => AppConfig,
): Promise<void> => {
  const cli = buildCli(loadConfig);
  await cli.parseAsync(argv);
};
