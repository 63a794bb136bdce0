import {
  PaymentRecord,
  SiteForecastMap,
  StrategyTag,
} from '../dividend/dividend.model';
import { ForecastErrorCode } from './forecast.errors';

export interface CascadeOptions {
  currentYear: number;
  years: number;
  historyYears: number;
}

// everything the cascade needs for one ticker
export interface TickerDataset {
  ticker: string;
  name: string;
  history: PaymentRecord[];
  site_forecasts: SiteForecastMap;
}

export interface SkipEvent {
  ticker: string;
  strategy: StrategyTag | null;
  year: number | null;
  quarter: number | null;
  kind: ForecastErrorCode;
  reason: string;
}

export interface TickerForecastResult {
  ticker: string;
  name: string;
  critical_scenario: boolean;
  // strategies that produced at least one record, in the order they ran
  strategies: StrategyTag[];
  records: PaymentRecord[];
  forecasts: PaymentRecord[];
  skipped: SkipEvent[];
}

export interface BatchCounters {
  tickers: number;
  records: number;
  forecasts: number;
  skipped: number;
  critical_tickers: number;
  by_strategy: Partial<Record<StrategyTag, number>>;
}

export interface ForecastBatchResult {
  options: CascadeOptions;
  generated_at: Date;
  results: TickerForecastResult[];
  records: PaymentRecord[];
  skipped: SkipEvent[];
  counters: BatchCounters;
}
