import {
  PaymentRecord,
  Quarter,
  SourceKind,
  StrategyTag,
} from '../dividend/dividend.model';
import { formatPeriod, isQuarter } from '../utils/quarter';
import {
  daysInMonth,
  formatDate,
  isValidDate,
  utcDate,
} from '../utils/time-normalize';
import {
  ForecastConstructionError,
  ForecastValidationError,
} from './forecast.errors';

// 15 Mar / 15 Jun / 15 Sep / 15 Dec
export const STANDARD_QUARTER_DATES: Record<
  Quarter,
  { month: number; day: number }
> = {
  1: { month: 3, day: 15 },
  2: { month: 6, day: 15 },
  3: { month: 9, day: 15 },
  4: { month: 12, day: 15 },
};

export const DEFAULT_PAYMENT_DAY = 15;

/**
 * Builds a date in the target year. A day the month does not have
 * (31 April, 29 February outside leap years) moves to the month's last day.
 */
export function synthesizeForecastDate(
  year: number,
  month: number | null,
  day: number | null,
): Date {
  if (!Number.isInteger(year)) {
    throw new ForecastConstructionError(`Invalid target year: ${year}`, {
      year,
    });
  }
  if (month === null || !Number.isInteger(month) || month < 1 || month > 12) {
    throw new ForecastConstructionError(
      `Cannot build a forecast date without a valid month (got ${month})`,
      { year, month, day },
    );
  }
  if (day === null || !Number.isInteger(day) || day < 1) {
    throw new ForecastConstructionError(
      `Cannot build a forecast date without a valid day (got ${day})`,
      { year, month, day },
    );
  }
  return utcDate(year, month, Math.min(day, daysInMonth(year, month)));
}

export function standardQuarterDate(year: number, quarter: Quarter): Date {
  const { month, day } = STANDARD_QUARTER_DATES[quarter];
  return synthesizeForecastDate(year, month, day);
}

export interface ForecastDraft {
  strategy_tag: StrategyTag;
  record_date: Date | null;
  dividend_value: number;
}

export function createForecastRecord(
  owner: { ticker: string; name: string },
  year: number,
  quarter: number,
  draft: ForecastDraft,
): PaymentRecord {
  if (!isQuarter(quarter)) {
    throw new ForecastValidationError(`Quarter out of range: ${quarter}`, {
      quarter,
    });
  }
  if (!Number.isFinite(draft.dividend_value) || draft.dividend_value < 0) {
    throw new ForecastValidationError(
      `Dividend value must be a non-negative number (got ${draft.dividend_value})`,
      { dividend_value: draft.dividend_value },
    );
  }
  if (draft.record_date !== null && !isValidDate(draft.record_date)) {
    throw new ForecastValidationError('Malformed forecast date', {
      year,
      quarter,
    });
  }

  const record: PaymentRecord = {
    ticker: owner.ticker,
    name: owner.name,
    record_date: draft.record_date,
    record_date_str: formatDate(draft.record_date),
    dividend_value: draft.dividend_value,
    period: formatPeriod(year, quarter),
    source_kind: SourceKind.DERIVED_FORECAST,
    year,
    quarter,
    month: draft.record_date ? draft.record_date.getUTCMonth() + 1 : null,
    announcement_date: null,
    strategy_tag: draft.strategy_tag,
  };
  return Object.freeze(record);
}
