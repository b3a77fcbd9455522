const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Reads a tabular cell as a number. Blank, missing and non-numeric text all become null.
 */
export const parseNumericCell = (raw: string | undefined): number | null => {
  const normalized = raw?.trim();
  if (!normalized || !DECIMAL_PATTERN.test(normalized)) {
    return null;
  }

  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : null;
};
