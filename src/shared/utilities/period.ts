export interface Period {
  year: number;
  month: number;
}

const PERIOD_PATTERN = /^(\d{4})-(\d{1,2})$/;

/**
 * Parse `YYYY-MM`; null when the text is not a valid month
 */
export function parsePeriod(value: string): Period | null {
  const match = PERIOD_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  return month >= 1 && month <= 12 ? { year, month } : null;
}

export function formatPeriod({ year, month }: Period): string {
  return `${year}-${String(month).padStart(2, '0')}`;
}
