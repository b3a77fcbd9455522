/**
 * us-gaap concepts tried in order for each line item. Filers tag the same
 * economic fact under different concepts, so the first one that reports wins.
 */
export const lineItemConcepts = {
  revenue: ["Revenues", "SalesRevenueNet"],
  cogs: ["CostOfRevenue", "CostOfGoodsAndServicesSold"],
  grossProfit: ["GrossProfit"],
  operatingIncomeEBIT: ["OperatingIncomeLoss", "OperatingIncome"],
  netIncome: ["NetIncomeLoss"],
  totalAssets: ["Assets"],
  totalLiabilities: ["Liabilities"],
  shareholdersEquity: [
    "StockholdersEquity",
    "StockholdersEquityIncludingPortionAttributableToNoncontrollingInterest",
  ],
  cashAndEquivalents: [
    "CashAndCashEquivalentsAtCarryingValue",
    "CashAndCashEquivalentsFairValueDisclosure",
  ],
  longTermDebt: ["LongTermDebtNoncurrent", "LongTermDebt"],
  shortTermDebt: ["DebtCurrent", "ShortTermBorrowings"],
  totalCurrentAssets: ["AssetsCurrent"],
  currentLiabilities: ["LiabilitiesCurrent"],
  retainedEarnings: ["RetainedEarningsAccumulatedDeficit"],
  operatingCashFlow: [
    "NetCashProvidedByUsedInOperatingActivities",
    "NetCashProvidedByUsedInOperatingActivitiesContinuingOperations",
  ],
  capitalExpenditures: [
    "PaymentsToAcquirePropertyPlantAndEquipment",
    "CapitalExpenditures",
  ],
  dividendsPaid: ["PaymentsOfDividends", "PaymentsOfDividendsCommonStock"],
} as const satisfies Record<string, readonly string[]>;

export type LineItem = keyof typeof lineItemConcepts;

export const seriesConcepts = {
  revenue: ["Revenues", "SalesRevenueNet"],
  netIncome: ["NetIncomeLoss"],
} as const satisfies Record<string, readonly string[]>;

/**
 * Entries whose period end (or fiscal year) dates the whole document.
 */
export const asOfReferenceConcepts = [
  "Assets",
  "Revenues",
  "NetIncomeLoss",
] as const;
