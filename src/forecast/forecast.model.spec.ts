import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { RunForecastDto } from './forecast.model';

const check = (plain: object) => validateSync(plainToInstance(RunForecastDto, plain));

describe('RunForecastDto', () => {
  it('accepts a well-formed request', () => {
    expect(
      check({
        years: 3,
        tickers: [
          {
            ticker: 'X',
            history: [{ record_date: '15.06.2023', dividend_value: 6 }],
            site_forecasts: [{ year: 2025, quarter: 2, dividend_value: 7 }],
          },
        ],
      }),
    ).toEqual([]);
  });

  it('requires at least one ticker', () => {
    expect(check({}).map((e) => e.property)).toEqual(['tickers']);
    expect(check({ tickers: [] }).map((e) => e.property)).toEqual(['tickers']);
  });

  it('validates nested entries', () => {
    const [error] = check({
      tickers: [{ ticker: 'X', site_forecasts: [{ year: 2025, quarter: 5, dividend_value: 1 }] }],
    });

    expect(error.property).toBe('tickers');
    const site = error.children?.[0]?.children?.[0]?.children?.[0]?.children?.[0];
    expect(site?.property).toBe('quarter');
    expect(site?.constraints).toEqual({ max: 'quarter must not be greater than 4' });
  });

  it('bounds the horizon', () => {
    const errors = check({ years: 51, tickers: [{ ticker: 'X' }] });
    expect(errors.map((e) => e.property)).toEqual(['years']);
  });
});
