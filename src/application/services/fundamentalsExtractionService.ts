import type {
  CompanyFactsPayload,
  RawFactTable,
} from "../../core/entities/companyFacts";
import {
  createFundamentalsDocument,
  type FundamentalsDocument,
} from "../../core/entities/fundamentals";
import {
  asOfReferenceConcepts,
  lineItemConcepts,
  seriesConcepts,
  type LineItem,
} from "../../core/fundamentals/conceptChains";
import {
  annualSeriesOf,
  combineWhenPresent,
  DEFAULT_SERIES_YEAR_LIMIT,
  latestAnnualEntryOf,
  latestAnnualValueOf,
  usGaapFacts,
} from "../../core/fundamentals/factSelection";
import { parseNumericCell } from "../../core/fundamentals/numericCell";
import type { FundamentalsCsvRow } from "../../core/ports/inboundPorts";

/**
 * Maps raw company facts or a CSV row into the one fixed-shape fundamentals document.
 */
export class FundamentalsExtractionService {
  constructor(
    private readonly seriesYearLimit = DEFAULT_SERIES_YEAR_LIMIT,
  ) {}

  /**
   * Picks the latest annual 10-K value per line item and derives the few fields that need arithmetic.
   */
  fromCompanyFacts(payload: CompanyFactsPayload): FundamentalsDocument {
    const facts = usGaapFacts(payload);
    const latest = (item: LineItem): number | null =>
      latestAnnualValueOf(facts, lineItemConcepts[item]);

    const totalCurrentAssets = latest("totalCurrentAssets");
    const currentLiabilities = latest("currentLiabilities");
    const operatingCashFlow = latest("operatingCashFlow");
    const capitalExpenditures = latest("capitalExpenditures");

    const workingCapital = combineWhenPresent(
      totalCurrentAssets,
      currentLiabilities,
      (assets, liabilities) => assets - liabilities,
    );

    // Capex is reported as a negative outflow, so FCF is a plain sum.
    const freeCashFlow = combineWhenPresent(
      operatingCashFlow,
      capitalExpenditures,
      (cashFromOperations, capex) => cashFromOperations + capex,
    );

    const profitHistory = annualSeriesOf(
      facts,
      seriesConcepts.netIncome,
      this.seriesYearLimit,
    );

    return createFundamentalsDocument({
      asOf: this.resolveAsOf(payload, facts),
      incomeStatement: {
        revenue: latest("revenue"),
        cogs: latest("cogs"),
        grossProfit: latest("grossProfit"),
        operatingIncomeEBIT: latest("operatingIncomeEBIT"),
        netIncome: latest("netIncome"),
      },
      balanceSheet: {
        totalAssets: latest("totalAssets"),
        totalCurrentAssets,
        cashAndEquivalents: latest("cashAndEquivalents"),
        totalLiabilities: latest("totalLiabilities"),
        currentLiabilities,
        longTermDebt: latest("longTermDebt"),
        shortTermDebt: latest("shortTermDebt"),
        shareholdersEquity: latest("shareholdersEquity"),
      },
      cashFlow: {
        operatingCashFlow,
        freeCashFlow,
        capitalExpenditures,
        dividendsPaid: latest("dividendsPaid"),
      },
      quality: {
        retainedEarnings: latest("retainedEarnings"),
        workingCapital,
        tenYearProfitHistory: profitHistory,
      },
      multiYearFinancials: {
        revenue: annualSeriesOf(
          facts,
          seriesConcepts.revenue,
          this.seriesYearLimit,
        ),
        netIncome: [...profitHistory],
      },
    });
  }

  /**
   * Copies the known CSV columns verbatim; nothing is derived for local rows.
   */
  fromCsvRow(row: FundamentalsCsvRow): FundamentalsDocument {
    const cell = (column: string): number | null =>
      parseNumericCell(row[column]);

    return createFundamentalsDocument({
      asOf: row.asOf ?? "",
      market: {
        sharePrice: cell("sharePrice"),
        sharesOutstanding: cell("sharesOut"),
        marketCap: cell("marketCap"),
        enterpriseValue: cell("enterpriseValue"),
      },
      incomeStatement: {
        revenue: cell("revenue"),
        cogs: cell("cogs"),
        operatingIncomeEBIT: cell("opIncome"),
        netIncome: cell("netIncome"),
      },
      balanceSheet: {
        totalAssets: cell("totalAssets"),
        totalCurrentAssets: cell("currAssets"),
        cashAndEquivalents: cell("cash"),
        currentLiabilities: cell("currLiab"),
        longTermDebt: cell("ltDebt"),
        shortTermDebt: cell("stDebt"),
      },
      cashFlow: {
        operatingCashFlow: cell("opCF"),
        freeCashFlow: cell("fcf"),
        capitalExpenditures: cell("capex"),
      },
    });
  }

  /**
   * Dates the document by the latest annual balance-sheet, revenue or earnings entry, else labels it by entity name.
   */
  private resolveAsOf(payload: CompanyFactsPayload, facts: RawFactTable): string {
    const reference = latestAnnualEntryOf(facts, asOfReferenceConcepts);
    if (reference) {
      if (reference.end) {
        return reference.end;
      }

      return reference.fy === null ? "" : String(reference.fy);
    }

    return typeof payload.entityName === "string" ? payload.entityName : "";
  }
}
