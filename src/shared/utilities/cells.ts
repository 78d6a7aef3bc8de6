/**
 * Normalisation of spreadsheet cell values
 */

/**
 * Trimmed text of a cell; blank cells and NaN become null
 */
export function cellText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    return Number.isNaN(value) ? null : String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  const text = String(value).trim();
  return text === '' ? null : text;
}

/**
 * Numeric value of a cell. Thousands separators are accepted.
 * @returns null for blank cells, NaN when the cell is not a number
 */
export function cellNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isNaN(value) ? null : value;
  }
  const text = cellText(value);
  if (text === null) return null;
  const parsed = Number(text.replace(/,/g, ''));
  return Number.isFinite(parsed) ? parsed : NaN;
}
