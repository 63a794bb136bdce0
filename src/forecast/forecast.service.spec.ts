import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import forecastConfig from '../config/forecast.config';
import { StrategyTag } from '../dividend/dividend.model';
import { dataset, payment } from '../testing/payment.fixtures';
import { ForecastAccumulator } from './forecast.accumulator';
import { ForecastService } from './forecast.service';
import { ForecastCascadeService } from './forecastCascade.service';

describe('ForecastService', () => {
  let module: TestingModule;
  let service: ForecastService;
  let cascade: ForecastCascadeService;

  const paysEveryJune = () =>
    dataset('X', [payment('X', '2022-06-15', 5), payment('X', '2023-06-15', 6)]);

  beforeEach(async () => {
    module = await Test.createTestingModule({
      providers: [
        ForecastService,
        ForecastCascadeService,
        {
          provide: forecastConfig.KEY,
          useValue: {
            years: 2,
            historyYears: 3,
            currentYear: 2024,
            dataDir: './data',
            outputDir: './output',
            cacheTtl: 0,
          },
        },
      ],
    }).compile();

    service = module.get<ForecastService>(ForecastService);
    cascade = module.get<ForecastCascadeService>(ForecastCascadeService);
  });

  afterEach(async () => {
    await module.close();
  });

  it('fills run options from configuration', () => {
    expect(service.resolveOptions()).toEqual({
      currentYear: 2024,
      years: 2,
      historyYears: 3,
    });
    expect(service.resolveOptions({ years: 1, currentYear: undefined })).toEqual({
      currentYear: 2024,
      years: 1,
      historyYears: 3,
    });
  });

  it('defaults the current year to the UTC calendar year', () => {
    jest.useFakeTimers({ now: new Date('2024-12-31T23:30:00Z') });
    const unpinned = new ForecastService(new ForecastCascadeService(), {
      years: 2,
      historyYears: 3,
      currentYear: null,
      dataDir: './data',
      outputDir: './output',
      cacheTtl: 0,
    });
    try {
      expect(unpinned.resolveOptions().currentYear).toBe(2024);
    } finally {
      unpinned.onModuleDestroy();
      jest.useRealTimers();
    }
  });

  it('runs every ticker and counts the outcome', () => {
    const batch = service.runBatch([paysEveryJune(), dataset('NEW', [])]);

    expect(batch.options).toEqual({ currentYear: 2024, years: 2, historyYears: 3 });
    expect(batch.results.map((r) => r.ticker)).toEqual(['X', 'NEW']);
    expect(batch.records).toHaveLength(12);
    expect(batch.counters).toEqual({
      tickers: 2,
      records: 12,
      forecasts: 10,
      skipped: 0,
      critical_tickers: 0,
      by_strategy: {
        [StrategyTag.ACTUAL]: 2,
        [StrategyTag.QUARTERLY_HISTORY]: 2,
        [StrategyTag.EMERGENCY_FALLBACK]: 8,
      },
    });
  });

  it('caches the latest batch and each ticker', () => {
    expect(() => service.getLatestBatch()).toThrow(NotFoundException);

    const batch = service.runBatch([paysEveryJune()], { years: 1 });

    expect(service.getLatestBatch()).toBe(batch);
    expect(service.getTickerForecast('x').forecasts.map((r) => r.period)).toEqual([
      'Q2 2025',
    ]);
    expect(() => service.getTickerForecast('NOPE')).toThrow(NotFoundException);
  });

  it('records a ticker whose cascade blew up and carries on', () => {
    jest.spyOn(cascade, 'forecastTicker').mockImplementationOnce(() => {
      throw new Error('boom');
    });

    const batch = service.runBatch([dataset('BAD', []), paysEveryJune()]);

    expect(batch.results.map((r) => r.ticker)).toEqual(['X']);
    expect(batch.skipped).toEqual([
      {
        ticker: 'BAD',
        strategy: null,
        year: null,
        quarter: null,
        kind: 'CONSTRUCTION_ERROR',
        reason: 'boom',
      },
    ]);
    expect(batch.counters.skipped).toBe(1);
  });

  it('publishes an accumulator filled ticker by ticker', () => {
    const accumulator = new ForecastAccumulator();
    const options = service.resolveOptions();
    service.runTicker(paysEveryJune(), options, accumulator);

    const batch = service.publish(accumulator, options);

    expect(batch.counters.forecasts).toBe(2);
    expect(service.getTickerForecast('X').ticker).toBe('X');
  });
});
