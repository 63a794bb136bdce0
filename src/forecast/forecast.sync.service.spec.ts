import { ConflictException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import fs from 'fs';
import os from 'os';
import path from 'path';
import forecastConfig from '../config/forecast.config';
import { DividendNormalizerService } from '../dividend/dividendNormalizer.service';
import { ForecastExportService } from '../export/forecastExport.service';
import { ForecastService } from './forecast.service';
import { DIVIDEND_DATA_FILE, ForecastSyncService } from './forecast.sync.service';
import { ForecastCascadeService } from './forecastCascade.service';

const CSV = [
  'ticker,name,record_date,dividend_value,period,forecast_type',
  'ACME,Acme Holdings,15.06.2022,5,Q2 2022,0',
  'ACME,Acme Holdings,15.06.2023,6,Q2 2023,0',
  'BLUE,Blue River,20.06.2019,3,Q2 2019,0',
].join('\n');

describe('ForecastSyncService', () => {
  let module: TestingModule;
  let service: ForecastSyncService;
  let forecastService: ForecastService;
  let dataDir: string;
  let outputDir: string;
  let root: string;

  beforeEach(async () => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'forecast-sync-'));
    dataDir = path.join(root, 'data');
    outputDir = path.join(root, 'output');
    fs.mkdirSync(dataDir);

    module = await Test.createTestingModule({
      providers: [
        ForecastSyncService,
        ForecastService,
        ForecastCascadeService,
        DividendNormalizerService,
        ForecastExportService,
        {
          provide: forecastConfig.KEY,
          useValue: {
            years: 2,
            historyYears: 3,
            currentYear: 2024,
            dataDir,
            outputDir,
            cacheTtl: 0,
          },
        },
      ],
    }).compile();

    service = module.get<ForecastSyncService>(ForecastSyncService);
    forecastService = module.get<ForecastService>(ForecastService);
  });

  afterEach(async () => {
    await module.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  const writeData = () => fs.writeFileSync(path.join(dataDir, DIVIDEND_DATA_FILE), CSV);

  it('rebuilds forecasts from the data directory and writes the exports', async () => {
    writeData();

    const report = await service.rebuildFromDataDir();

    expect(report.stopped).toBe(false);
    expect(report.tickers).toBe(2);
    expect(report.rejected_rows).toBe(0);
    expect(report.counters).toEqual(
      expect.objectContaining({ records: 13, forecasts: 10, critical_tickers: 1 }),
    );
    expect(report.files).toEqual({
      csvPath: path.join(outputDir, 'dividend_forecast.csv'),
      jsonPath: path.join(outputDir, 'dividend_forecast.json'),
    });
    expect(fs.existsSync(path.join(outputDir, 'dividend_forecast.csv'))).toBe(true);
    expect(forecastService.getLatestBatch().records).toHaveLength(13);
    expect(service.isRunning()).toBe(false);
  });

  it('refuses a second rebuild while one is running', async () => {
    writeData();

    const first = service.rebuildFromDataDir();
    await expect(service.rebuildFromDataDir()).rejects.toBeInstanceOf(ConflictException);
    await first;
  });

  it('stops between tickers without publishing', async () => {
    writeData();

    const running = service.rebuildFromDataDir();
    expect(service.stopSync()).toEqual({ message: 'Stopping forecast rebuild...' });
    const report = await running;

    expect(report).toEqual({
      stopped: true,
      tickers: 0,
      rejected_rows: 0,
      duplicate_site_forecasts: 0,
      counters: null,
      files: null,
    });
    expect(fs.existsSync(outputDir)).toBe(false);
    expect(() => forecastService.getLatestBatch()).toThrow(NotFoundException);
  });

  it('has nothing to stop when idle', () => {
    expect(service.stopSync()).toEqual({
      message: 'No forecast rebuild is currently running.',
    });
  });

  it('fails without a data file and can run again afterwards', async () => {
    await expect(service.rebuildFromDataDir()).rejects.toBeInstanceOf(NotFoundException);
    expect(service.isRunning()).toBe(false);
  });

  it('logs a failed scheduled rebuild instead of throwing', async () => {
    await expect(service.handleScheduledRebuild()).resolves.toBeUndefined();
  });
});
