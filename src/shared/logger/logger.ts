import pino from "pino";
import { logLevelSchema, type LogLevel } from "../config/env";

const defaultLevel = (nodeEnv: string | undefined): LogLevel => {
  if (nodeEnv === "production") {
    return "info";
  }

  return nodeEnv === "test" ? "silent" : "debug";
};

/**
 * Unknown levels fall back to the default here; `loadAppConfig` reports them.
 */
export const resolveLogLevel = (
  source: NodeJS.ProcessEnv = process.env,
): LogLevel => {
  const configured = logLevelSchema.safeParse(source.LOG_LEVEL?.trim());
  return configured.success ? configured.data : defaultLevel(source.NODE_ENV);
};

export const logger = pino({
  name: "fundamentals-builder",
  level: resolveLogLevel(),
});

export type Logger = typeof logger;

export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
