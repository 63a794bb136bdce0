import {
  PaymentRecord,
  Quarter,
  SiteForecast,
  SiteForecastMap,
  SourceKind,
  StrategyTag,
  siteForecastKey,
} from '../dividend/dividend.model';
import { TickerDataset } from '../forecast/forecast.type';
import { formatPeriod, quarterOfDate } from '../utils/quarter';
import { formatDate, parseDate } from '../utils/time-normalize';

// an actual payment on an ISO date, e.g. payment('X', '2023-06-15', 6)
export function payment(
  ticker: string,
  isoDate: string,
  value: number,
): PaymentRecord {
  const date = parseDate(isoDate);
  if (!date) throw new Error(`bad fixture date ${isoDate}`);
  const quarter = quarterOfDate(date);
  const year = date.getUTCFullYear();
  return {
    ticker,
    name: `${ticker} Corp`,
    record_date: date,
    record_date_str: formatDate(date),
    dividend_value: value,
    period: formatPeriod(year, quarter),
    source_kind: SourceKind.ACTUAL,
    year,
    quarter,
    month: date.getUTCMonth() + 1,
    announcement_date: null,
    strategy_tag: StrategyTag.ACTUAL,
  };
}

// an actual payment known only by year and quarter
export function undatedPayment(
  ticker: string,
  year: number,
  quarter: Quarter | null,
  value: number,
): PaymentRecord {
  return {
    ticker,
    name: `${ticker} Corp`,
    record_date: null,
    record_date_str: formatDate(null),
    dividend_value: value,
    period: formatPeriod(year, quarter),
    source_kind: SourceKind.ACTUAL,
    year,
    quarter,
    month: null,
    announcement_date: null,
    strategy_tag: StrategyTag.ACTUAL,
  };
}

export function siteForecast(
  year: number,
  quarter: Quarter,
  value: number,
  isoDate: string | null = null,
): SiteForecast {
  return {
    year,
    quarter,
    record_date: parseDate(isoDate),
    dividend_value: value,
  };
}

export function siteForecasts(...entries: SiteForecast[]): SiteForecastMap {
  return new Map(entries.map((f) => [siteForecastKey(f.year, f.quarter), f]));
}

export function dataset(
  ticker: string,
  history: PaymentRecord[],
  sites: SiteForecastMap = new Map(),
): TickerDataset {
  return { ticker, name: `${ticker} Corp`, history, site_forecasts: sites };
}
