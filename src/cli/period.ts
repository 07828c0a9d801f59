import { DateWindow } from "../types";

const PERIOD_PATTERN = /^(\d{4})-(\d{2})\s+to\s+(\d{4})-(\d{2})$/i;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function lastDayOfMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** "1946-10 to 1946-12" → 1946-10-01 .. 1946-12-31; anything else → undefined. */
export function parsePeriod(value: string): DateWindow | undefined {
  const match = PERIOD_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }

  const [startYear, startMonth, endYear, endMonth] = match.slice(1).map((part) => Number.parseInt(part, 10));
  if (startMonth < 1 || startMonth > 12 || endMonth < 1 || endMonth > 12) {
    return undefined;
  }
  if (startYear * 12 + startMonth > endYear * 12 + endMonth) {
    return undefined;
  }

  return {
    start: `${startYear}-${pad(startMonth)}-01`,
    end: `${endYear}-${pad(endMonth)}-${pad(lastDayOfMonth(endYear, endMonth))}`,
  };
}
