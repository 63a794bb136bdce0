import {
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
} from '@nestjs/common';
import {
  DividendNormalizerService,
  NormalizationIssue,
} from '../dividend/dividendNormalizer.service';
import {
  ForecastExportRow,
  ForecastExportService,
  ForecastSummary,
} from '../export/forecastExport.service';
import { describeError } from './forecast.errors';
import { RunForecastDto } from './forecast.model';
import { ForecastService } from './forecast.service';
import { ForecastSyncService } from './forecast.sync.service';
import { SkipEvent, TickerForecastResult } from './forecast.type';

export interface RunForecastResponse {
  summary: ForecastSummary;
  records: ForecastExportRow[];
  skipped: SkipEvent[];
  rejected: NormalizationIssue[];
  duplicates: NormalizationIssue[];
}

@Controller('forecasts')
export class ForecastController {
  private readonly logger = new Logger(ForecastController.name);

  constructor(
    private readonly forecastService: ForecastService,
    private readonly normalizer: DividendNormalizerService,
    private readonly exportService: ForecastExportService,
    private readonly syncService: ForecastSyncService,
  ) {}

  // ********************************************************
  // 1. Forecast the posted tickers
  // [POST] /forecasts
  // ********************************************************
  @Post()
  @HttpCode(HttpStatus.OK)
  run(@Body() body: RunForecastDto): RunForecastResponse {
    const rejected: NormalizationIssue[] = [];
    const duplicates: NormalizationIssue[] = [];
    const datasets = body.tickers.map((input) => {
      const normalized = this.normalizer.normalizeTickerInput(input);
      rejected.push(...normalized.rejected);
      duplicates.push(...normalized.duplicates);
      return normalized.dataset;
    });

    const batch = this.forecastService.runBatch(datasets, {
      currentYear: body.current_year,
      years: body.years,
      historyYears: body.history_years,
    });

    return {
      summary: this.exportService.summarize(batch.records),
      records: this.exportService.toRows(batch.records),
      skipped: batch.skipped,
      rejected,
      duplicates,
    };
  }

  // ********************************************************
  // 2. Latest batch
  // ********************************************************
  @Get('summary')
  getSummary(): ForecastSummary {
    return this.exportService.summarize(this.forecastService.getLatestBatch().records);
  }

  // [GET] /forecasts/export/csv
  @Get('export/csv')
  @Header('Content-Type', 'text/csv; charset=utf-8')
  @Header('Content-Disposition', 'attachment; filename="dividend_forecast.csv"')
  exportCsv(): string {
    return this.exportService.toCsv(this.forecastService.getLatestBatch().records);
  }

  // ********************************************************
  // 3. Rebuild from the data directory (Admin/System)
  // ********************************************************
  @Post('sync')
  @HttpCode(HttpStatus.ACCEPTED)
  triggerSync(): { message: string } {
    if (this.syncService.isRunning()) {
      return { message: 'A forecast rebuild is already running.' };
    }
    // runs in the background; progress goes to the log
    this.syncService.rebuildFromDataDir().catch((error: unknown) => {
      this.logger.error(`Forecast rebuild failed: ${describeError(error)}`);
    });
    return { message: 'Forecast rebuild started.' };
  }

  @Post('sync/stop')
  @HttpCode(HttpStatus.OK)
  stopSync(): { message: string } {
    return this.syncService.stopSync();
  }

  // ********************************************************
  // 4. Cached ticker result
  // [GET] /forecasts/:ticker
  // ********************************************************
  @Get(':ticker')
  getTicker(@Param('ticker') ticker: string): TickerForecastResult {
    return this.forecastService.getTickerForecast(ticker);
  }
}
