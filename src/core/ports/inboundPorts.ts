import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { CompanyFactsPayload } from "../entities/companyFacts";

export type CompanyFactsRequest = {
  symbol: string;
};

export type CompanyFactsResult = {
  symbol: string;
  cik: string;
  payload: CompanyFactsPayload;
};

/**
 * One CSV data row keyed by header name. Cells absent from a short row are simply missing.
 */
export type FundamentalsCsvRow = Readonly<Record<string, string | undefined>>;

export type CsvRowRequest = {
  symbol: string;
};

export interface CompanyFactsProviderPort {
  fetchCompanyFacts(
    request: CompanyFactsRequest,
  ): Promise<Result<CompanyFactsResult, AppBoundaryError>>;
}

export interface FundamentalsRowSourcePort {
  findRow(
    request: CsvRowRequest,
  ): Promise<Result<FundamentalsCsvRow, AppBoundaryError>>;
}
