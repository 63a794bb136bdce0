import { SourceKind, StrategyTag } from '../dividend/dividend.model';
import { utcDate } from '../utils/time-normalize';
import {
  ForecastConstructionError,
  ForecastValidationError,
} from './forecast.errors';
import {
  createForecastRecord,
  standardQuarterDate,
  synthesizeForecastDate,
} from './forecast.factory';

describe('forecast factory', () => {
  it('clamps days the target month does not have', () => {
    expect(synthesizeForecastDate(2025, 4, 31)).toEqual(utcDate(2025, 4, 30));
    expect(synthesizeForecastDate(2025, 2, 29)).toEqual(utcDate(2025, 2, 28));
    expect(synthesizeForecastDate(2028, 2, 29)).toEqual(utcDate(2028, 2, 29));
  });

  it('refuses to guess a missing month or day', () => {
    expect(() => synthesizeForecastDate(2025, null, 15)).toThrow(ForecastConstructionError);
    expect(() => synthesizeForecastDate(2025, 13, 15)).toThrow(ForecastConstructionError);
    expect(() => synthesizeForecastDate(2025, 6, null)).toThrow(
      'Cannot build a forecast date without a valid day (got null)',
    );
  });

  it('knows the standard quarter dates', () => {
    expect(standardQuarterDate(2025, 4)).toEqual(utcDate(2025, 12, 15));
  });

  it('builds a frozen forecast record', () => {
    const record = createForecastRecord({ ticker: 'X', name: 'X Corp' }, 2025, 3, {
      strategy_tag: StrategyTag.ANNUAL_HISTORY,
      record_date: utcDate(2025, 9, 15),
      dividend_value: 2.5,
    });

    expect(record).toEqual({
      ticker: 'X',
      name: 'X Corp',
      record_date: utcDate(2025, 9, 15),
      record_date_str: '15.09.2025',
      dividend_value: 2.5,
      period: 'Q3 2025',
      source_kind: SourceKind.DERIVED_FORECAST,
      year: 2025,
      quarter: 3,
      month: 9,
      announcement_date: null,
      strategy_tag: StrategyTag.ANNUAL_HISTORY,
    });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('rejects negative amounts and bad quarters', () => {
    const draft = {
      strategy_tag: StrategyTag.QUARTERLY_HISTORY,
      record_date: null,
      dividend_value: -1,
    };
    expect(() => createForecastRecord({ ticker: 'X', name: 'X' }, 2025, 1, draft)).toThrow(
      ForecastValidationError,
    );
    expect(() =>
      createForecastRecord({ ticker: 'X', name: 'X' }, 2025, 0, { ...draft, dividend_value: 1 }),
    ).toThrow('Quarter out of range: 0');
  });
});
