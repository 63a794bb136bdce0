import { StrategyTag } from '../dividend/dividend.model';
import { payment } from '../testing/payment.fixtures';
import { ForecastAccumulator } from './forecast.accumulator';
import { TickerForecastResult } from './forecast.type';

describe('ForecastAccumulator', () => {
  const result = (ticker: string, critical: boolean): TickerForecastResult => ({
    ticker,
    name: ticker,
    critical_scenario: critical,
    strategies: [],
    records: [payment(ticker, '2023-06-15', 1)],
    forecasts: [],
    skipped: [
      {
        ticker,
        strategy: StrategyTag.ACTUAL,
        year: 2023,
        quarter: 2,
        kind: 'VALIDATION_ERROR',
        reason: 'Invalid dividend value: NaN',
      },
    ],
  });

  it('collects records, skips and counters in append order', () => {
    const accumulator = new ForecastAccumulator();
    accumulator.append(result('A', false));
    accumulator.append(result('B', true));
    accumulator.recordFailure({
      ticker: 'C',
      strategy: null,
      year: null,
      quarter: null,
      kind: 'CONSTRUCTION_ERROR',
      reason: 'boom',
    });

    expect(accumulator.records().map((r) => r.ticker)).toEqual(['A', 'B']);
    expect(accumulator.skipped().map((s) => s.ticker)).toEqual(['A', 'B', 'C']);
    expect(accumulator.counters()).toEqual({
      tickers: 2,
      records: 2,
      forecasts: 0,
      skipped: 3,
      critical_tickers: 1,
      by_strategy: { ACTUAL: 2 },
    });
  });
});
