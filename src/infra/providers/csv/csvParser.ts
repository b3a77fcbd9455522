export type CsvTable = {
  header: string[];
  records: Array<Record<string, string>>;
};

/**
 * Splits CSV text into rows of fields. Handles double-quoted fields with
 * embedded commas, doubled quotes and line breaks, and both LF and CRLF.
 */
const tokenize = (text: string): string[][] => {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text.charAt(index);

    if (inQuotes) {
      if (char === '"' && text.charAt(index + 1) === '"') {
        field += '"';
        index += 1;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      row.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text.charAt(index + 1) === "\n") {
        index += 1;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += char;
    }
  }

  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
};

const isBlankRow = (row: string[]): boolean =>
  row.every((field) => field.trim() === "");

/**
 * Parses CSV text whose first row names the columns. Blank lines are skipped;
 * a short row leaves its trailing columns unset.
 */
export const parseCsv = (text: string): CsvTable => {
  const rows = tokenize(text.replace(/^\uFEFF/, "")).filter(
    (row) => !isBlankRow(row),
  );
  const [headerRow, ...dataRows] = rows;
  const header = (headerRow ?? []).map((name) => name.trim());

  const records = dataRows.map((row) => {
    const record: Record<string, string> = {};
    header.forEach((name, column) => {
      const value = row[column];
      if (value !== undefined && !(name in record)) {
        record[name] = value;
      }
    });
    return record;
  });

  return { header, records };
};
