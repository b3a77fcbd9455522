import type { CompanyFactsProviderPort } from "../../core/ports/inboundPorts";
import { FundamentalsBuildService } from "../services/fundamentalsBuildService";
import { FundamentalsExtractionService } from "../services/fundamentalsExtractionService";
import type { AppConfig } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { JsonFileDocumentWriter } from "../../infra/output/jsonFileDocumentWriter";
import { CsvFundamentalsSource } from "../../infra/providers/csv/csvFundamentalsSource";
import { SecEdgarCompanyFactsProvider } from "../../infra/providers/sec/secEdgarCompanyFactsProvider";
import { SystemDelay } from "../../infra/system/systemPorts";

export type RuntimeOverrides = {
  csvPath?: string;
  outputDir?: string;
};

/**
 * Centralizes runtime wiring so both CLI commands share one composition root.
 */
export const createRuntime = (
  config: AppConfig,
  overrides: RuntimeOverrides = {},
) => {
  const extractor = new FundamentalsExtractionService(config.seriesYearLimit);
  // Built on first fetch so the CSV command runs without EDGAR settings.
  let edgarProvider: SecEdgarCompanyFactsProvider | undefined;
  const companyFacts: CompanyFactsProviderPort = {
    fetchCompanyFacts: async (request) => {
      if (!edgarProvider) {
        edgarProvider = new SecEdgarCompanyFactsProvider(
          config.edgar.baseUrl,
          config.edgar.userAgent,
          config.edgar.cikBySymbol,
          config.edgar.timeoutMs,
        );
      }

      return edgarProvider.fetchCompanyFacts(request);
    },
  };
  const csvRows = new CsvFundamentalsSource(overrides.csvPath ?? config.csvPath);
  const writer = new JsonFileDocumentWriter(
    overrides.outputDir ?? config.outputDir,
  );

  const buildService = new FundamentalsBuildService(
    extractor,
    companyFacts,
    csvRows,
    writer,
    new SystemDelay(),
    config.edgar.requestPauseMs,
    logger,
  );

  return { config, buildService };
};

export type Runtime = ReturnType<typeof createRuntime>;
