export const NO_DATA = 'no data';

export const utcDate = (year: number, month: number, day: number) =>
  new Date(Date.UTC(year, month - 1, day));

export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !isNaN(value.getTime());
}

/**
 * Number of days in a month (month is 1-12).
 */
export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Formats as DD.MM.YYYY, or "no data" when the date is missing.
 */
export function formatDate(date: Date | null): string {
  if (!isValidDate(date)) return NO_DATA;
  const day = String(date.getUTCDate()).padStart(2, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${day}.${month}.${date.getUTCFullYear()}`;
}

/**
 * Accepts DD.MM.YYYY, DD-MM-YYYY, DD/MM/YYYY and ISO YYYY-MM-DD.
 * Returns null for empty, "n/a" and anything that is not a real calendar date.
 */
export function parseDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const cleaned = value.trim();
  if (!cleaned || cleaned.toLowerCase() === 'n/a') return null;

  let day: number;
  let month: number;
  let year: number;

  const dayFirst = cleaned.match(/^(\d{1,2})[./-](\d{1,2})[./-](\d{4})$/);
  const isoMatch = cleaned.match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (dayFirst) {
    [day, month, year] = [dayFirst[1], dayFirst[2], dayFirst[3]].map(Number);
  } else if (isoMatch) {
    [year, month, day] = [isoMatch[1], isoMatch[2], isoMatch[3]].map(Number);
  } else {
    return null;
  }

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return utcDate(year, month, day);
}
