/**
 * One reported value inside a companyfacts unit list. Every field is optional
 * because filers and the API omit them freely.
 */
export type FactObservation = {
  form?: unknown;
  fp?: unknown;
  fy?: unknown;
  val?: unknown;
  end?: unknown;
  accn?: unknown;
  filed?: unknown;
};

export type ConceptFacts = {
  label?: string;
  description?: string;
  units?: Record<string, FactObservation[] | undefined>;
};

/**
 * Concept name to reported values, e.g. `facts["us-gaap"]`.
 */
export type RawFactTable = Record<string, ConceptFacts | undefined>;

export type CompanyFactsPayload = {
  cik?: number | string;
  entityName?: unknown;
  facts?: Record<string, RawFactTable | undefined>;
};

/**
 * An observation that passed the annual-report filter.
 */
export type AnnualFactEntry = {
  form: string;
  fp: string;
  fy: number | null;
  val: number;
  end: string | null;
};
