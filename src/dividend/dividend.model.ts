export type Quarter = 1 | 2 | 3 | 4;

export const QUARTERS: readonly Quarter[] = [1, 2, 3, 4];

// numeric codes are what the export writes in the forecast_type column
export enum SourceKind {
  ACTUAL = 0,
  SITE_FORECAST = 1,
  DERIVED_FORECAST = 2,
}

export const SOURCE_KIND_LABEL: Record<SourceKind, string> = {
  [SourceKind.ACTUAL]: 'Actual',
  [SourceKind.SITE_FORECAST]: 'Site forecast',
  [SourceKind.DERIVED_FORECAST]: 'Our forecast',
};

export enum StrategyTag {
  ACTUAL = 'ACTUAL',
  SITE_RAW = 'SITE_RAW',
  SITE_CURRENT = 'SITE_CURRENT',
  SITE_FUTURE = 'SITE_FUTURE',
  QUARTERLY_HISTORY = 'QUARTERLY_HISTORY',
  DATE_HISTORY = 'DATE_HISTORY',
  ANNUAL_HISTORY = 'ANNUAL_HISTORY',
  CRITICAL_INACTIVE = 'CRITICAL_INACTIVE',
  EMERGENCY_FALLBACK = 'EMERGENCY_FALLBACK',
  SITE_DERIVED = 'SITE_DERIVED',
}

//map from tag to the short code shown in exports
export const STRATEGY_CODE: Record<StrategyTag, string> = {
  [StrategyTag.ACTUAL]: '0',
  [StrategyTag.SITE_RAW]: '1',
  [StrategyTag.SITE_CURRENT]: '2.1',
  [StrategyTag.SITE_FUTURE]: '2.2',
  [StrategyTag.QUARTERLY_HISTORY]: '3.1',
  [StrategyTag.DATE_HISTORY]: '3.2',
  [StrategyTag.ANNUAL_HISTORY]: '3.3',
  [StrategyTag.CRITICAL_INACTIVE]: '3.4',
  [StrategyTag.EMERGENCY_FALLBACK]: '3.5',
  [StrategyTag.SITE_DERIVED]: '3.6',
};

export const STRATEGY_LABEL: Record<StrategyTag, string> = {
  [StrategyTag.ACTUAL]: 'Actual data',
  [StrategyTag.SITE_RAW]: 'Site forecast',
  [StrategyTag.SITE_CURRENT]: 'Site forecast (current year)',
  [StrategyTag.SITE_FUTURE]: 'Site forecast (future years)',
  [StrategyTag.QUARTERLY_HISTORY]: 'Quarterly history',
  [StrategyTag.DATE_HISTORY]: 'Payment dates history',
  [StrategyTag.ANNUAL_HISTORY]: 'Annual history',
  [StrategyTag.CRITICAL_INACTIVE]: 'Inactive company',
  [StrategyTag.EMERGENCY_FALLBACK]: 'Emergency fallback',
  [StrategyTag.SITE_DERIVED]: 'Site forecast over history',
};

/**
 * One dividend event, either observed or projected.
 * `record_date` is null when the date is unknown ("no data").
 */
export interface PaymentRecord {
  readonly ticker: string;
  readonly name: string;
  readonly record_date: Date | null;
  readonly record_date_str: string;
  readonly dividend_value: number;
  readonly period: string;
  readonly source_kind: SourceKind;
  readonly year: number;
  readonly quarter: Quarter | null;
  readonly month: number | null;
  readonly announcement_date: Date | null;
  readonly strategy_tag: StrategyTag;
}

// third-party forecast, keyed by `${year}-${quarter}`
export interface SiteForecast {
  readonly year: number;
  readonly quarter: Quarter;
  readonly record_date: Date | null;
  readonly dividend_value: number;
}

export type SiteForecastMap = ReadonlyMap<string, SiteForecast>;

export const siteForecastKey = (year: number, quarter: number): string =>
  `${year}-${quarter}`;
