// forecast.sync.service.ts
import {
  ConflictException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import path from 'path';
import forecastConfig from '../config/forecast.config';
import { DividendNormalizerService } from '../dividend/dividendNormalizer.service';
import { ForecastExportService } from '../export/forecastExport.service';
import { describeError } from './forecast.errors';
import { ForecastAccumulator } from './forecast.accumulator';
import { ForecastService } from './forecast.service';
import { BatchCounters } from './forecast.type';

export const DIVIDEND_DATA_FILE = 'dividends.csv';

export interface SyncReport {
  stopped: boolean;
  tickers: number;
  rejected_rows: number;
  duplicate_site_forecasts: number;
  counters: BatchCounters | null;
  files: { csvPath: string; jsonPath: string } | null;
}

@Injectable()
export class ForecastSyncService {
  private readonly logger = new Logger(ForecastSyncService.name);

  constructor(
    private readonly forecastService: ForecastService,
    private readonly normalizer: DividendNormalizerService,
    private readonly exportService: ForecastExportService,
    @Inject(forecastConfig.KEY)
    private readonly config: ConfigType<typeof forecastConfig>,
  ) {}

  private shouldStop = false;
  private isSyncing = false; // one rebuild at a time

  // lets other tasks (including a stop request) run between tickers
  private yieldToEventLoop() {
    return new Promise<void>((resolve) => setImmediate(resolve));
  }

  stopSync() {
    if (this.isSyncing) {
      this.shouldStop = true;
      this.logger.warn('⚠️ Request to stop forecast rebuild received...');
      return { message: 'Stopping forecast rebuild...' };
    }
    return { message: 'No forecast rebuild is currently running.' };
  }

  isRunning() {
    return this.isSyncing;
  }

  // weekdays at 20:00, after the data export has landed
  @Cron('0 0 20 * * 1-5', {
    name: 'daily_forecast_rebuild',
    timeZone: 'Asia/Bangkok',
  })
  async handleScheduledRebuild(): Promise<void> {
    if (this.isSyncing) {
      this.logger.warn('❌ Forecast rebuild is already in progress. Ignoring schedule.');
      return;
    }
    try {
      await this.rebuildFromDataDir();
    } catch (error) {
      this.logger.error(`❌ Scheduled forecast rebuild failed: ${describeError(error)}`);
    }
  }

  /**
   * Reads the dividend CSV from the data directory, forecasts every ticker and
   * writes the export files. A stopped rebuild publishes nothing.
   */
  async rebuildFromDataDir(): Promise<SyncReport> {
    if (this.isSyncing) {
      throw new ConflictException('A forecast rebuild is already running');
    }
    this.isSyncing = true;
    this.shouldStop = false;
    this.logger.log('🚀 Starting forecast rebuild...');

    try {
      const normalized = await this.normalizer.normalizeFile(
        path.join(this.config.dataDir, DIVIDEND_DATA_FILE),
      );
      const options = this.forecastService.resolveOptions();
      const accumulator = new ForecastAccumulator();

      for (const dataset of normalized.datasets) {
        if (this.shouldStop) {
          this.logger.warn('🛑 Forecast rebuild was stopped by user.');
          return {
            stopped: true,
            tickers: accumulator.tickerResults.length,
            rejected_rows: normalized.rejected.length,
            duplicate_site_forecasts: normalized.duplicates.length,
            counters: null,
            files: null,
          };
        }
        this.forecastService.runTicker(dataset, options, accumulator);
        await this.yieldToEventLoop();
      }

      const batch = this.forecastService.publish(accumulator, options);
      const files = await this.exportService.writeFiles(
        this.config.outputDir,
        batch.records,
      );

      return {
        stopped: false,
        tickers: batch.results.length,
        rejected_rows: normalized.rejected.length,
        duplicate_site_forecasts: normalized.duplicates.length,
        counters: batch.counters,
        files,
      };
    } finally {
      // always reset so the next rebuild can start
      this.isSyncing = false;
      this.shouldStop = false;
      this.logger.log('🏁 Forecast rebuild finished.');
    }
  }
}
