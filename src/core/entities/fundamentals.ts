export type AnnualSeriesPoint = {
  fy: number;
  value: number;
};

export type AnnualSeries = AnnualSeriesPoint[];

export type MarketSection = {
  sharePrice: number | null;
  sharesOutstanding: number | null;
  marketCap: number | null;
  enterpriseValue: number | null;
  historicalPrices: never[];
};

export type IncomeStatement = {
  revenue: number | null;
  cogs: number | null;
  grossProfit: number | null;
  operatingExpenses: number | null;
  depreciationAmort: number | null;
  operatingIncomeEBIT: number | null;
  ebitda: number | null;
  interestExpense: number | null;
  pretaxIncome: number | null;
  netIncome: number | null;
  netIncomeExNRI: number | null;
};

export type BalanceSheet = {
  totalAssets: number | null;
  totalCurrentAssets: number | null;
  cashAndEquivalents: number | null;
  accountsReceivable: number | null;
  inventory: number | null;
  otherCurrentAssets: number | null;
  totalLiabilities: number | null;
  currentLiabilities: number | null;
  accountsPayable: number | null;
  longTermDebt: number | null;
  shortTermDebt: number | null;
  shareholdersEquity: number | null;
  investedCapital: number | null;
};

export type CashFlowStatement = {
  operatingCashFlow: number | null;
  freeCashFlow: number | null;
  capitalExpenditures: number | null;
  ownerEarnings: number | null;
  dividendsPaid: number | null;
  cashFlowFromFinancing: number | null;
  taxRate: number | null;
};

export type QualitySection = {
  retainedEarnings: number | null;
  workingCapital: number | null;
  tenYearProfitHistory: AnnualSeries;
  segmentRevenue: never[];
};

export type MultiYearFinancials = {
  revenue: AnnualSeries;
  ebitda: AnnualSeries;
  netIncome: AnnualSeries;
  freeCashFlow: AnnualSeries;
  bookValue: AnnualSeries;
};

export type FinancingDetail = {
  shareRepurchases: number | null;
  shareIssuances: number | null;
};

/**
 * The document the front-end reads. Its key set never changes: missing data is `null` or `[]`.
 */
export type FundamentalsDocument = {
  asOf: string;
  market: MarketSection;
  statements: {
    incomeStatement: IncomeStatement;
    balanceSheet: BalanceSheet;
    cashFlow: CashFlowStatement;
  };
  optional: {
    quality: QualitySection;
    multiYearFinancials: MultiYearFinancials;
    financingDetail: FinancingDetail;
  };
};

export type FundamentalsOverrides = {
  asOf?: string;
  market?: Partial<Omit<MarketSection, "historicalPrices">>;
  incomeStatement?: Partial<IncomeStatement>;
  balanceSheet?: Partial<BalanceSheet>;
  cashFlow?: Partial<CashFlowStatement>;
  quality?: Partial<Omit<QualitySection, "segmentRevenue">>;
  multiYearFinancials?: Partial<MultiYearFinancials>;
  financingDetail?: Partial<FinancingDetail>;
};

/**
 * Builds a complete document: every field starts null or empty, then the given sections are overlaid.
 */
export const createFundamentalsDocument = (
  overrides: FundamentalsOverrides = {},
): FundamentalsDocument => ({
  asOf: overrides.asOf ?? "",
  market: {
    sharePrice: null,
    sharesOutstanding: null,
    marketCap: null,
    enterpriseValue: null,
    ...overrides.market,
    historicalPrices: [],
  },
  statements: {
    incomeStatement: {
      revenue: null,
      cogs: null,
      grossProfit: null,
      operatingExpenses: null,
      depreciationAmort: null,
      operatingIncomeEBIT: null,
      ebitda: null,
      interestExpense: null,
      pretaxIncome: null,
      netIncome: null,
      netIncomeExNRI: null,
      ...overrides.incomeStatement,
    },
    balanceSheet: {
      totalAssets: null,
      totalCurrentAssets: null,
      cashAndEquivalents: null,
      accountsReceivable: null,
      inventory: null,
      otherCurrentAssets: null,
      totalLiabilities: null,
      currentLiabilities: null,
      accountsPayable: null,
      longTermDebt: null,
      shortTermDebt: null,
      shareholdersEquity: null,
      investedCapital: null,
      ...overrides.balanceSheet,
    },
    cashFlow: {
      operatingCashFlow: null,
      freeCashFlow: null,
      capitalExpenditures: null,
      ownerEarnings: null,
      dividendsPaid: null,
      cashFlowFromFinancing: null,
      taxRate: null,
      ...overrides.cashFlow,
    },
  },
  optional: {
    quality: {
      retainedEarnings: null,
      workingCapital: null,
      tenYearProfitHistory: [],
      ...overrides.quality,
      segmentRevenue: [],
    },
    multiYearFinancials: {
      revenue: [],
      ebitda: [],
      netIncome: [],
      freeCashFlow: [],
      bookValue: [],
      ...overrides.multiYearFinancials,
    },
    financingDetail: {
      shareRepurchases: null,
      shareIssuances: null,
      ...overrides.financingDetail,
    },
  },
});
