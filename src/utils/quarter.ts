import { Quarter } from '../dividend/dividend.model';
import { ForecastValidationError } from '../forecast/forecast.errors';
import { daysInMonth, isValidDate } from './time-normalize';

const QUARTER_BY_MONTH: readonly Quarter[] = [1, 1, 1, 2, 2, 2, 3, 3, 3, 4, 4, 4];

export function isQuarter(value: unknown): value is Quarter {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

export function quarterOfMonth(month: number): Quarter {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ForecastValidationError(`Month out of range: ${month}`, {
      month,
    });
  }
  return QUARTER_BY_MONTH[month - 1];
}

/**
 * Calendar quarter of a (month, day, year) triple. The day is checked against
 * the month's length; without a year February accepts the 29th.
 */
export function classifyQuarter(
  month: number,
  day?: number,
  year?: number,
): Quarter {
  const quarter = quarterOfMonth(month);
  if (day !== undefined) {
    const maxDay = daysInMonth(year ?? 2000, month);
    if (!Number.isInteger(day) || day < 1 || day > maxDay) {
      throw new ForecastValidationError(
        `Day out of range for month ${month}: ${day}`,
        { month, day, year },
      );
    }
  }
  return quarter;
}

export function quarterOfDate(date: Date): Quarter {
  if (!isValidDate(date)) {
    throw new ForecastValidationError('Invalid date', { date: String(date) });
  }
  return quarterOfMonth(date.getUTCMonth() + 1);
}

export const formatPeriod = (year: number, quarter: Quarter | null) =>
  quarter === null ? `${year}` : `Q${quarter} ${year}`;
