import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  CompanyFactsProviderPort,
  FundamentalsRowSourcePort,
} from "../../core/ports/inboundPorts";
import type {
  DelayPort,
  DocumentWriterPort,
} from "../../core/ports/outboundPorts";
import type { Logger } from "../../shared/logger/logger";
import type { FundamentalsExtractionService } from "./fundamentalsExtractionService";

export type BuildFailure = {
  symbol: string;
  code: AppBoundaryError["code"];
  reason: string;
};

export type WrittenDocument = {
  symbol: string;
  path: string;
};

export type BatchBuildSummary = {
  written: WrittenDocument[];
  skipped: BuildFailure[];
  failed: BuildFailure[];
};

const toFailure = (symbol: string, error: AppBoundaryError): BuildFailure => ({
  symbol,
  code: error.code,
  reason: error.message,
});

/**
 * Runs fetch, extraction and write per ticker. Each ticker stands alone: one failure never blocks the next.
 */
export class FundamentalsBuildService {
  constructor(
    private readonly extractor: FundamentalsExtractionService,
    private readonly companyFacts: CompanyFactsProviderPort,
    private readonly csvRows: FundamentalsRowSourcePort,
    private readonly writer: DocumentWriterPort,
    private readonly delay: DelayPort,
    private readonly requestPauseMs: number,
    private readonly log: Logger,
  ) {}

  /**
   * Builds documents from SEC companyfacts, pausing between requests. Unmapped tickers are skipped with a warning.
   */
  async buildFromEdgar(tickers: readonly string[]): Promise<BatchBuildSummary> {
    const summary: BatchBuildSummary = { written: [], skipped: [], failed: [] };
    let hasFetched = false;

    for (const rawTicker of tickers) {
      const symbol = rawTicker.trim().toUpperCase();
      if (!symbol) {
        continue;
      }

      if (hasFetched) {
        await this.delay.wait(this.requestPauseMs);
      }

      this.log.info({ symbol }, "Fetching companyfacts");
      const factsResult = await this.companyFacts.fetchCompanyFacts({ symbol });

      if (factsResult.isErr()) {
        const error = factsResult.error;
        if (error.code === "config_invalid") {
          this.log.warn({ symbol, reason: error.message }, "No CIK mapping, skipping");
          summary.skipped.push(toFailure(symbol, error));
          continue;
        }

        hasFetched = true;
        this.log.error(
          {
            symbol,
            code: error.code,
            httpStatus: error.httpStatus,
            reason: error.message,
          },
          "Company facts fetch failed",
        );
        summary.failed.push(toFailure(symbol, error));
        continue;
      }

      hasFetched = true;
      const document = this.extractor.fromCompanyFacts(factsResult.value.payload);
      const written = await this.writer.write(symbol, document);

      if (written.isErr()) {
        this.log.error(
          { symbol, code: written.error.code, reason: written.error.message },
          "Document write failed",
        );
        summary.failed.push(toFailure(symbol, written.error));
        continue;
      }

      this.log.info({ symbol, path: written.value }, "Wrote fundamentals document");
      summary.written.push({ symbol, path: written.value });
    }

    return summary;
  }

  /**
   * Builds one document from the local CSV row for `ticker`.
   */
  async buildFromCsv(
    ticker: string,
  ): Promise<Result<WrittenDocument, AppBoundaryError>> {
    const symbol = ticker.trim().toUpperCase();
    const rowResult = await this.csvRows.findRow({ symbol });
    if (rowResult.isErr()) {
      return err(rowResult.error);
    }

    const document = this.extractor.fromCsvRow(rowResult.value);
    const written = await this.writer.write(symbol, document);
    if (written.isErr()) {
      return err(written.error);
    }

    this.log.info({ symbol, path: written.value }, "Wrote fundamentals document");
    return ok({ symbol, path: written.value });
  }
}
