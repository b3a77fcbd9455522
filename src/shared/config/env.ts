import "dotenv/config";
import { z } from "zod";

/**
 * Pads a CIK to the 10-digit form the companyfacts endpoint expects.
 */
export const normalizeCik = (cik: string | number): string =>
  String(cik).replace(/\D/g, "").padStart(10, "0");

const CIK_PATTERN = /^\d{1,10}$/;

export const logLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export type LogLevel = z.infer<typeof logLevelSchema>;

const blankAsUnset = (value: unknown) =>
  typeof value === "string" && !value.trim() ? undefined : value;

const symbolList = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((item) => item.trim().toUpperCase())
      .filter(Boolean),
  );

const cikMap = z.string().transform((raw, ctx) => {
  const bySymbol = new Map<string, string>();

  for (const pair of raw.split(",")) {
    const trimmed = pair.trim();
    if (!trimmed) {
      continue;
    }

    const [symbol, cik, ...rest] = trimmed.split(":").map((part) => part.trim());
    if (!symbol || !cik || rest.length > 0 || !CIK_PATTERN.test(cik)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected TICKER:CIK pair, received '${trimmed}'.`,
      });
      return z.NEVER;
    }

    bySymbol.set(symbol.toUpperCase(), normalizeCik(cik));
  }

  return bySymbol;
});

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  LOG_LEVEL: z.preprocess(blankAsUnset, logLevelSchema.optional()),
  APP_TICKERS: symbolList.default("AAPL"),
  SEC_EDGAR_CIK_MAP: cikMap.default("AAPL:0000320193"),
  SEC_EDGAR_BASE_URL: z.string().url().default("https://data.sec.gov"),
  SEC_EDGAR_USER_AGENT: z
    .string()
    .default("fundamentals-builder/0.1 (contact: devnull@example.com)"),
  SEC_EDGAR_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SEC_EDGAR_REQUEST_PAUSE_MS: z.coerce.number().int().min(0).default(250),
  FUNDAMENTALS_CSV_PATH: z.string().min(1).default("data/fundamentals.csv"),
  FUNDAMENTALS_OUTPUT_DIR: z.string().min(1).default("data"),
  SERIES_YEAR_LIMIT: z.coerce.number().int().positive().default(10),
});

export type AppEnv = z.infer<typeof envSchema>;

export type EdgarConfig = {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  requestPauseMs: number;
  cikBySymbol: ReadonlyMap<string, string>;
};

export type AppConfig = {
  nodeEnv: AppEnv["NODE_ENV"];
  logLevel: LogLevel | undefined;
  tickers: string[];
  csvPath: string;
  outputDir: string;
  seriesYearLimit: number;
  edgar: EdgarConfig;
};

/**
 * Validates the environment into one explicit config value that callers pass down instead of reading globals.
 */
export const loadAppConfig = (
  source: NodeJS.ProcessEnv = process.env,
): AppConfig => {
  const parsed = envSchema.parse(source);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    tickers: parsed.APP_TICKERS,
    csvPath: parsed.FUNDAMENTALS_CSV_PATH,
    outputDir: parsed.FUNDAMENTALS_OUTPUT_DIR,
    seriesYearLimit: parsed.SERIES_YEAR_LIMIT,
    edgar: {
      baseUrl: parsed.SEC_EDGAR_BASE_URL,
      userAgent: parsed.SEC_EDGAR_USER_AGENT,
      timeoutMs: parsed.SEC_EDGAR_TIMEOUT_MS,
      requestPauseMs: parsed.SEC_EDGAR_REQUEST_PAUSE_MS,
      cikBySymbol: parsed.SEC_EDGAR_CIK_MAP,
    },
  };
};
