import {
  PaymentRecord,
  Quarter,
  QUARTERS,
  SourceKind,
} from '../dividend/dividend.model';
import { classifyQuarter, quarterOfDate, quarterOfMonth } from '../utils/quarter';
import { mean, mostFrequent, roundAmount } from '../utils/statistics';
import { DEFAULT_PAYMENT_DAY, STANDARD_QUARTER_DATES } from './forecast.factory';

export interface QuarterlyAggregate {
  quarter: Quarter;
  avg_dividend: number;
  month: number;
  day: number;
  sample_size: number;
}

export interface DateGroupAggregate {
  month: number;
  day: number;
  quarter: Quarter;
  avg_dividend: number;
  sample_size: number;
}

export interface AnnualAggregate {
  avg_dividend: number;
  sample_size: number;
}

// zero-valued actuals are known skips, not payments to average
export const isHistoricalPayment = (record: PaymentRecord) =>
  record.source_kind === SourceKind.ACTUAL && record.dividend_value > 0;

const monthOf = (record: PaymentRecord): number | null =>
  record.month ?? (record.record_date ? record.record_date.getUTCMonth() + 1 : null);

const dayOf = (record: PaymentRecord): number | null =>
  record.record_date ? record.record_date.getUTCDate() : null;

function quarterOf(record: PaymentRecord): Quarter | null {
  if (record.quarter !== null) return record.quarter;
  const month = monthOf(record);
  if (month !== null) return quarterOfMonth(month);
  if (record.record_date) return quarterOfDate(record.record_date);
  return null;
}

/**
 * One aggregate per quarter that has at least one payment, in quarter order.
 * Typical month is the most frequent month; typical day the most frequent day
 * within that month. Buckets without any month use the quarter's standard date.
 */
export function aggregateQuarterly(
  history: readonly PaymentRecord[],
): QuarterlyAggregate[] {
  const buckets = new Map<Quarter, PaymentRecord[]>();
  for (const record of history) {
    if (!isHistoricalPayment(record)) continue;
    const quarter = quarterOf(record);
    if (quarter === null) continue;
    const bucket = buckets.get(quarter) ?? [];
    bucket.push(record);
    buckets.set(quarter, bucket);
  }

  const aggregates: QuarterlyAggregate[] = [];
  for (const quarter of QUARTERS) {
    const bucket = buckets.get(quarter);
    if (!bucket || bucket.length === 0) continue;

    const months = bucket
      .map(monthOf)
      .filter((month): month is number => month !== null);
    const typicalMonth = mostFrequent(months);

    if (typicalMonth === null) {
      const standard = STANDARD_QUARTER_DATES[quarter];
      aggregates.push({
        quarter,
        avg_dividend: roundAmount(mean(bucket.map((r) => r.dividend_value))),
        month: standard.month,
        day: standard.day,
        sample_size: bucket.length,
      });
      continue;
    }

    const days = bucket
      .filter((record) => monthOf(record) === typicalMonth)
      .map(dayOf)
      .filter((day): day is number => day !== null);

    aggregates.push({
      quarter,
      avg_dividend: roundAmount(mean(bucket.map((r) => r.dividend_value))),
      month: typicalMonth,
      day: mostFrequent(days) ?? DEFAULT_PAYMENT_DAY,
      sample_size: bucket.length,
    });
  }
  return aggregates;
}

/**
 * Groups dated payments by exact (month, day), ordered by month then day.
 */
export function aggregateByDate(
  history: readonly PaymentRecord[],
): DateGroupAggregate[] {
  const groups = new Map<string, { month: number; day: number; values: number[] }>();
  for (const record of history) {
    if (!isHistoricalPayment(record) || !record.record_date) continue;
    const month = record.record_date.getUTCMonth() + 1;
    const day = record.record_date.getUTCDate();
    const key = `${month}-${day}`;
    const group = groups.get(key) ?? { month, day, values: [] };
    group.values.push(record.dividend_value);
    groups.set(key, group);
  }

  return [...groups.values()]
    .sort((a, b) => a.month - b.month || a.day - b.day)
    .map((group) => ({
      month: group.month,
      day: group.day,
      quarter: classifyQuarter(group.month, group.day),
      avg_dividend: roundAmount(mean(group.values)),
      sample_size: group.values.length,
    }));
}

export function aggregateAnnual(
  history: readonly PaymentRecord[],
): AnnualAggregate | null {
  const values = history
    .filter(isHistoricalPayment)
    .map((record) => record.dividend_value);
  if (values.length === 0) return null;
  return {
    avg_dividend: roundAmount(mean(values)),
    sample_size: values.length,
  };
}
