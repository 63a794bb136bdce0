import {
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import NodeCache from 'node-cache';
import forecastConfig from '../config/forecast.config';
import { describeError } from './forecast.errors';
import { ForecastAccumulator } from './forecast.accumulator';
import { ForecastCascadeService } from './forecastCascade.service';
import {
  CascadeOptions,
  ForecastBatchResult,
  TickerDataset,
  TickerForecastResult,
} from './forecast.type';

const LATEST_BATCH_KEY = 'batch:latest';
const tickerKey = (ticker: string) => `ticker:${ticker.toUpperCase()}`;

@Injectable()
export class ForecastService implements OnModuleDestroy {
  private readonly logger = new Logger(ForecastService.name);
  private readonly cache: NodeCache;

  constructor(
    private readonly cascade: ForecastCascadeService,
    @Inject(forecastConfig.KEY)
    private readonly config: ConfigType<typeof forecastConfig>,
  ) {
    this.cache = new NodeCache({ stdTTL: config.cacheTtl, useClones: false });
  }

  onModuleDestroy() {
    this.cache.close();
  }

  resolveOptions(overrides: Partial<CascadeOptions> = {}): CascadeOptions {
    return {
      currentYear:
        overrides.currentYear ??
        this.config.currentYear ??
        new Date().getUTCFullYear(),
      years: overrides.years ?? this.config.years,
      historyYears: overrides.historyYears ?? this.config.historyYears,
    };
  }

  // ********************************************************
  // 1. Single ticker
  // ********************************************************
  runTicker(
    dataset: TickerDataset,
    options: CascadeOptions,
    accumulator: ForecastAccumulator,
  ): void {
    try {
      const result = this.cascade.forecastTicker(dataset, options);
      accumulator.append(result);
    } catch (error) {
      const reason = describeError(error);
      this.logger.error(`Failed to forecast ${dataset.ticker}: ${reason}`);
      accumulator.recordFailure({
        ticker: dataset.ticker,
        strategy: null,
        year: null,
        quarter: null,
        kind: 'CONSTRUCTION_ERROR',
        reason,
      });
    }
  }

  // ********************************************************
  // 2. Whole batch
  // ********************************************************
  /**
   * Forecasts every dataset in order, then caches each ticker result and the
   * batch as the latest run.
   */
  runBatch(
    datasets: TickerDataset[],
    overrides: Partial<CascadeOptions> = {},
  ): ForecastBatchResult {
    const options = this.resolveOptions(overrides);
    this.logger.log(
      `Forecasting ${datasets.length} tickers for ${options.years} years after ${options.currentYear} (activity window ${options.historyYears} years)`,
    );

    const accumulator = new ForecastAccumulator();
    for (const dataset of datasets) {
      this.runTicker(dataset, options, accumulator);
    }
    return this.publish(accumulator, options);
  }

  publish(
    accumulator: ForecastAccumulator,
    options: CascadeOptions,
  ): ForecastBatchResult {
    const batch: ForecastBatchResult = {
      options,
      generated_at: new Date(),
      results: [...accumulator.tickerResults],
      records: accumulator.records(),
      skipped: accumulator.skipped(),
      counters: accumulator.counters(),
    };

    for (const result of batch.results) {
      this.cache.set(tickerKey(result.ticker), result);
    }
    this.cache.set(LATEST_BATCH_KEY, batch);

    this.logger.log(
      `Forecast run finished: ${batch.counters.forecasts} forecasts, ${batch.counters.skipped} skipped, ${batch.counters.critical_tickers} inactive tickers`,
    );
    return batch;
  }

  // ********************************************************
  // 3. Cached results
  // ********************************************************
  getTickerForecast(ticker: string): TickerForecastResult {
    const result = this.cache.get<TickerForecastResult>(tickerKey(ticker));
    if (!result) {
      throw new NotFoundException(`No forecast available for ${ticker}`);
    }
    return result;
  }

  getLatestBatch(): ForecastBatchResult {
    const batch = this.cache.get<ForecastBatchResult>(LATEST_BATCH_KEY);
    if (!batch) {
      throw new NotFoundException('No forecast run has completed yet');
    }
    return batch;
  }
}
