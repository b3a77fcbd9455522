import { z } from "zod";
import type {
  AnnualFactEntry,
  CompanyFactsPayload,
  RawFactTable,
} from "../entities/companyFacts";
import type { AnnualSeries } from "../entities/fundamentals";

export const ANNUAL_REPORT_FORM = "10-K";
export const FULL_YEAR_PERIOD = "FY";
export const REPORTING_UNIT = "USD";
export const US_GAAP_TAXONOMY = "us-gaap";
export const DEFAULT_SERIES_YEAR_LIMIT = 10;

/**
 * Accepts only full-year 10-K values. A malformed `fy` or `end` does not disqualify the value.
 */
const annualObservationSchema = z.object({
  form: z.literal(ANNUAL_REPORT_FORM),
  fp: z.literal(FULL_YEAR_PERIOD),
  val: z.number().finite(),
  fy: z.number().int().nullable().catch(null).default(null),
  end: z.string().nullable().catch(null).default(null),
});

/**
 * Returns the us-gaap concept table, or an empty table when the payload has none.
 */
export const usGaapFacts = (payload: CompanyFactsPayload): RawFactTable => {
  const table = payload.facts?.[US_GAAP_TAXONOMY];
  return table && typeof table === "object" ? table : {};
};

/**
 * Lists a concept's qualifying USD observations in their original order.
 */
export const annualEntries = (
  facts: RawFactTable,
  concept: string,
): AnnualFactEntry[] => {
  const observations = facts[concept]?.units?.[REPORTING_UNIT];
  if (!Array.isArray(observations)) {
    return [];
  }

  const entries: AnnualFactEntry[] = [];
  for (const observation of observations) {
    const parsed = annualObservationSchema.safeParse(observation);
    if (parsed.success) {
      entries.push(parsed.data);
    }
  }

  return entries;
};

/**
 * Array#sort is stable, so entries sharing a fiscal year keep their source order.
 */
const newestFirst = (entries: AnnualFactEntry[]): AnnualFactEntry[] =>
  [...entries].sort((left, right) => (right.fy ?? 0) - (left.fy ?? 0));

export const pickLatestAnnualEntry = (
  facts: RawFactTable,
  concept: string,
): AnnualFactEntry | null => newestFirst(annualEntries(facts, concept))[0] ?? null;

export const pickLatestAnnualValue = (
  facts: RawFactTable,
  concept: string,
): number | null => pickLatestAnnualEntry(facts, concept)?.val ?? null;

/**
 * Collects at most `limit` distinct fiscal years, newest first, then returns them oldest to newest.
 * The first observation seen for a year wins, so amended filings do not add extra points.
 */
export const buildAnnualSeries = (
  facts: RawFactTable,
  concept: string,
  limit = DEFAULT_SERIES_YEAR_LIMIT,
): AnnualSeries => {
  const series: AnnualSeries = [];
  const seenYears = new Set<number>();

  for (const entry of newestFirst(annualEntries(facts, concept))) {
    if (series.length >= limit) {
      break;
    }

    if (entry.fy === null || seenYears.has(entry.fy)) {
      continue;
    }

    seenYears.add(entry.fy);
    series.push({ fy: entry.fy, value: entry.val });
  }

  return series.reverse();
};

/**
 * Walks candidate concepts in order and returns the first lookup result that counts as available.
 */
export const firstAvailable = <T>(
  concepts: readonly string[],
  lookup: (concept: string) => T,
  isAvailable: (value: T) => boolean,
): T | null => {
  for (const concept of concepts) {
    const value = lookup(concept);
    if (isAvailable(value)) {
      return value;
    }
  }

  return null;
};

export const latestAnnualValueOf = (
  facts: RawFactTable,
  concepts: readonly string[],
): number | null =>
  firstAvailable(
    concepts,
    (concept) => pickLatestAnnualValue(facts, concept),
    (value) => value !== null,
  );

export const latestAnnualEntryOf = (
  facts: RawFactTable,
  concepts: readonly string[],
): AnnualFactEntry | null =>
  firstAvailable(
    concepts,
    (concept) => pickLatestAnnualEntry(facts, concept),
    (entry) => entry !== null,
  );

export const annualSeriesOf = (
  facts: RawFactTable,
  concepts: readonly string[],
  limit = DEFAULT_SERIES_YEAR_LIMIT,
): AnnualSeries =>
  firstAvailable(
    concepts,
    (concept) => buildAnnualSeries(facts, concept, limit),
    (series) => series.length > 0,
  ) ?? [];

/**
 * Applies `combine` only when both operands are present.
 */
export const combineWhenPresent = (
  left: number | null,
  right: number | null,
  combine: (left: number, right: number) => number,
): number | null =>
  left === null || right === null ? null : combine(left, right);
