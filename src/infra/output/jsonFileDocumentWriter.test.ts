import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFundamentalsDocument } from "../../core/entities/fundamentals";
import { JsonFileDocumentWriter } from "./jsonFileDocumentWriter";

let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(path.join(tmpdir(), "fundamentals-out-"));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

describe("JsonFileDocumentWriter", () => {
  it("writes a pretty-printed document named after the ticker", async () => {
    const outputDir = path.join(workDir, "nested", "data");
    const writer = new JsonFileDocumentWriter(outputDir);
    const document = createFundamentalsDocument({
      asOf: "2024-12-31",
      incomeStatement: { revenue: 100 },
    });

    const result = await writer.write("xyz", document);

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toBe(path.join(outputDir, "XYZ.json"));

    const contents = await readFile(result.value, "utf-8");
    expect(contents).toBe(`${JSON.stringify(document, null, 2)}\n`);
    expect(contents.startsWith('{\n  "asOf": "2024-12-31",\n  "market": {\n')).toBe(
      true,
    );
    expect(JSON.parse(contents)).toEqual(document);
  });

  it("returns an io error when the output path is not a directory", async () => {
    const blocker = path.join(workDir, "blocker");
    await writeFile(blocker, "not a directory", "utf-8");
    const writer = new JsonFileDocumentWriter(blocker);

    const result = await writer.write("XYZ", createFundamentalsDocument());

    if (result.isOk()) {
      throw new Error("expected write failure");
    }
    expect(result.error.source).toBe("output");
    expect(result.error.code).toBe("io_error");
  });
});
