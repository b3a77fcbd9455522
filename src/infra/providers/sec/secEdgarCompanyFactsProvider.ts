import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { CompanyFactsPayload } from "../../../core/entities/companyFacts";
import type {
  CompanyFactsProviderPort,
  CompanyFactsRequest,
  CompanyFactsResult,
} from "../../../core/ports/inboundPorts";
import { normalizeCik } from "../../../shared/config/env";
import { logger } from "../../../shared/logger/logger";
import { HttpJsonClient, type HttpClientError } from "../../http/httpJsonClient";

const PROVIDER = "sec-edgar";

const isCompanyFactsPayload = (body: unknown): body is CompanyFactsPayload =>
  typeof body === "object" && body !== null && !Array.isArray(body);

/**
 * Fetches XBRL companyfacts for tickers with a configured CIK. One request per ticker, no retries.
 */
export class SecEdgarCompanyFactsProvider implements CompanyFactsProviderPort {
  constructor(
    private readonly baseUrl: string,
    private readonly userAgent: string,
    private readonly cikBySymbol: ReadonlyMap<string, string>,
    private readonly timeoutMs = 30_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.userAgent.trim()) {
      throw new Error(
        "SEC_EDGAR_USER_AGENT is required when fetching SEC EDGAR company facts.",
      );
    }
  }

  async fetchCompanyFacts(
    request: CompanyFactsRequest,
  ): Promise<Result<CompanyFactsResult, AppBoundaryError>> {
    const symbol = request.symbol.trim().toUpperCase();
    const mappedCik = this.cikBySymbol.get(symbol);

    if (!mappedCik) {
      return err({
        source: "edgar",
        code: "config_invalid",
        provider: PROVIDER,
        message: `No CIK mapping configured for ${symbol}.`,
        retryable: false,
      });
    }

    const cik = normalizeCik(mappedCik);
    const url = this.companyFactsUrl(cik);
    logger.debug({ symbol, cik, url }, "Fetching SEC companyfacts");

    const response = await this.httpClient.getJson({
      url,
      timeoutMs: this.timeoutMs,
      headers: {
        "User-Agent": this.userAgent,
        Accept: "application/json",
      },
    });

    if (response.isErr()) {
      return err(this.mapToBoundaryError(response.error, symbol));
    }

    if (!isCompanyFactsPayload(response.value)) {
      return err({
        source: "edgar",
        code: "malformed_response",
        provider: PROVIDER,
        message: `SEC companyfacts payload for ${symbol} was not a JSON object.`,
        retryable: false,
      });
    }

    return ok({ symbol, cik, payload: response.value });
  }

  companyFactsUrl(cik: string): string {
    return new URL(
      `/api/xbrl/companyfacts/CIK${normalizeCik(cik)}.json`,
      this.baseUrl,
    ).toString();
  }

  private mapToBoundaryError(
    failure: HttpClientError,
    symbol: string,
  ): AppBoundaryError {
    const base = {
      source: "edgar",
      provider: PROVIDER,
      message: `${symbol}: ${failure.message}`,
      retryable: failure.retryable,
      httpStatus: failure.httpStatus,
      cause: failure.cause ?? { url: failure.url, body: failure.bodySnippet },
    } as const;

    switch (failure.code) {
      case "timeout":
        return { ...base, code: "timeout" };
      case "invalid_json":
        return { ...base, code: "invalid_json" };
      case "transport_error":
        return { ...base, code: "transport_error" };
      case "non_success_status":
        return { ...base, code: this.mapHttpCode(failure.httpStatus) };
    }
  }

  private mapHttpCode(httpStatus: number | undefined): AppBoundaryError["code"] {
    if (httpStatus === 429) {
      return "rate_limited";
    }

    if (httpStatus === 401 || httpStatus === 403) {
      return "auth_invalid";
    }

    if (httpStatus === 404) {
      return "not_found";
    }

    return "provider_error";
  }
}
