import { PaymentRecord, StrategyTag } from '../dividend/dividend.model';
import {
  BatchCounters,
  SkipEvent,
  TickerForecastResult,
} from './forecast.type';

/**
 * Append-only collection of per-ticker results for one run.
 */
export class ForecastAccumulator {
  private readonly results: TickerForecastResult[] = [];
  private readonly failures: SkipEvent[] = [];

  append(result: TickerForecastResult): void {
    this.results.push(Object.freeze({ ...result }));
  }

  // a ticker whose whole cascade failed
  recordFailure(event: SkipEvent): void {
    this.failures.push(Object.freeze({ ...event }));
  }

  get tickerResults(): readonly TickerForecastResult[] {
    return this.results;
  }

  records(): PaymentRecord[] {
    return this.results.flatMap((result) => result.records);
  }

  skipped(): SkipEvent[] {
    return [...this.results.flatMap((result) => result.skipped), ...this.failures];
  }

  counters(): BatchCounters {
    const byStrategy: Partial<Record<StrategyTag, number>> = {};
    for (const record of this.records()) {
      byStrategy[record.strategy_tag] = (byStrategy[record.strategy_tag] ?? 0) + 1;
    }
    return {
      tickers: this.results.length,
      records: this.records().length,
      forecasts: this.results.reduce((sum, r) => sum + r.forecasts.length, 0),
      skipped: this.skipped().length,
      critical_tickers: this.results.filter((r) => r.critical_scenario).length,
      by_strategy: byStrategy,
    };
  }
}
