import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { FundamentalsDocument } from "../../core/entities/fundamentals";
import type { DocumentWriterPort } from "../../core/ports/outboundPorts";

/**
 * Writes `<outputDir>/<TICKER>.json`, pretty-printed, creating the directory when needed.
 */
export class JsonFileDocumentWriter implements DocumentWriterPort {
  constructor(private readonly outputDir: string) {}

  async write(
    symbol: string,
    document: FundamentalsDocument,
  ): Promise<Result<string, AppBoundaryError>> {
    const outPath = this.pathFor(symbol);

    try {
      await mkdir(this.outputDir, { recursive: true });
      await writeFile(outPath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
      return ok(outPath);
    } catch (error) {
      return err({
        source: "output",
        code: "io_error",
        provider: "json-file",
        message: `Failed to write ${outPath}: ${error instanceof Error ? error.message : String(error)}`,
        retryable: false,
        cause: error,
      });
    }
  }

  pathFor(symbol: string): string {
    return path.join(this.outputDir, `${symbol.trim().toUpperCase()}.json`);
  }
}
