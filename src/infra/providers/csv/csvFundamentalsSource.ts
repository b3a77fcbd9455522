import { readFile } from "node:fs/promises";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  CsvRowRequest,
  FundamentalsCsvRow,
  FundamentalsRowSourcePort,
} from "../../../core/ports/inboundPorts";
import { logger } from "../../../shared/logger/logger";
import { parseCsv, type CsvTable } from "./csvParser";

const PROVIDER = "local-csv";
const TICKER_COLUMN = "ticker";

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Serves fundamentals rows from one CSV file. The file is read on first use and kept for the life of the instance.
 */
export class CsvFundamentalsSource implements FundamentalsRowSourcePort {
  private table: CsvTable | null = null;

  constructor(private readonly csvPath: string) {}

  async findRow(
    request: CsvRowRequest,
  ): Promise<Result<FundamentalsCsvRow, AppBoundaryError>> {
    const symbol = request.symbol.trim().toUpperCase();
    const tableResult = await this.loadTable();
    if (tableResult.isErr()) {
      return err(tableResult.error);
    }

    const row = tableResult.value.records.find(
      (record) => (record[TICKER_COLUMN] ?? "").trim().toUpperCase() === symbol,
    );

    if (!row) {
      return err({
        source: "csv",
        code: "not_found",
        provider: PROVIDER,
        message: `Ticker ${symbol} not found in ${this.csvPath}`,
        retryable: false,
      });
    }

    return ok(row);
  }

  private async loadTable(): Promise<Result<CsvTable, AppBoundaryError>> {
    if (this.table) {
      return ok(this.table);
    }

    let text: string;
    try {
      text = await readFile(this.csvPath, "utf-8");
    } catch (error) {
      const missing = isMissingFileError(error);
      return err({
        source: "csv",
        code: missing ? "config_invalid" : "io_error",
        provider: PROVIDER,
        message: missing
          ? `CSV not found at ${this.csvPath}`
          : `Failed to read CSV at ${this.csvPath}`,
        retryable: false,
        cause: error,
      });
    }

    const table = parseCsv(text);
    logger.debug(
      { csvPath: this.csvPath, rowCount: table.records.length },
      "Loaded fundamentals CSV",
    );
    this.table = table;
    return ok(table);
  }
}
