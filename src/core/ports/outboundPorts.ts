import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { FundamentalsDocument } from "../entities/fundamentals";

export interface DocumentWriterPort {
  /**
   * Persists one ticker's document and resolves to the written location.
   */
  write(
    symbol: string,
    document: FundamentalsDocument,
  ): Promise<Result<string, AppBoundaryError>>;
}

export interface DelayPort {
  wait(ms: number): Promise<void>;
}
