import { Injectable, Logger } from '@nestjs/common';
import fs from 'fs';
import path from 'path';
import Papa from 'papaparse';
import {
  PaymentRecord,
  SOURCE_KIND_LABEL,
  STRATEGY_CODE,
  STRATEGY_LABEL,
  StrategyTag,
} from '../dividend/dividend.model';
import { roundAmount } from '../utils/statistics';
import { NO_DATA, formatDate } from '../utils/time-normalize';

export const EXPORT_COLUMNS = [
  'ticker',
  'name',
  'announcement_date',
  'record_date',
  'year',
  'quarter',
  'dividend_value',
  'forecast_type',
  'forecast_type_label',
  'period',
  'strategy_code',
  'strategy_label',
] as const;

export type ForecastExportRow = Record<
  (typeof EXPORT_COLUMNS)[number],
  string | number
>;

export interface ForecastSummary {
  total_records: number;
  by_ticker: Record<string, number>;
  by_source: Record<string, number>;
  by_strategy: Partial<Record<StrategyTag, number>>;
  year_range: { min: number; max: number } | null;
  dividend: { avg: number; min: number; max: number } | null;
  avg_by_strategy: Partial<Record<StrategyTag, number>>;
}

export const CSV_FILE_NAME = 'dividend_forecast.csv';
export const JSON_FILE_NAME = 'dividend_forecast.json';

@Injectable()
export class ForecastExportService {
  private readonly logger = new Logger(ForecastExportService.name);

  toRows(records: readonly PaymentRecord[]): ForecastExportRow[] {
    return records.map((record) => ({
      ticker: record.ticker,
      name: record.name,
      announcement_date: record.announcement_date
        ? formatDate(record.announcement_date)
        : NO_DATA,
      record_date: record.record_date_str,
      year: record.year,
      quarter: record.quarter ?? '',
      dividend_value: record.dividend_value,
      forecast_type: record.source_kind,
      forecast_type_label: SOURCE_KIND_LABEL[record.source_kind],
      period: record.period,
      strategy_code: STRATEGY_CODE[record.strategy_tag],
      strategy_label: STRATEGY_LABEL[record.strategy_tag],
    }));
  }

  toCsv(records: readonly PaymentRecord[]): string {
    return Papa.unparse(this.toRows(records), {
      columns: [...EXPORT_COLUMNS],
    });
  }

  toJson(records: readonly PaymentRecord[]): string {
    return JSON.stringify(this.toRows(records), null, 4);
  }

  /**
   * Record counts per ticker, source and strategy, plus dividend statistics.
   */
  summarize(records: readonly PaymentRecord[]): ForecastSummary {
    const byTicker: Record<string, number> = {};
    const bySource: Record<string, number> = {};
    const byStrategy: Partial<Record<StrategyTag, number>> = {};
    const valuesByStrategy = new Map<StrategyTag, number[]>();

    for (const record of records) {
      byTicker[record.ticker] = (byTicker[record.ticker] ?? 0) + 1;
      const source = SOURCE_KIND_LABEL[record.source_kind];
      bySource[source] = (bySource[source] ?? 0) + 1;
      byStrategy[record.strategy_tag] = (byStrategy[record.strategy_tag] ?? 0) + 1;

      const values = valuesByStrategy.get(record.strategy_tag) ?? [];
      values.push(record.dividend_value);
      valuesByStrategy.set(record.strategy_tag, values);
    }

    const avgByStrategy: Partial<Record<StrategyTag, number>> = {};
    for (const [tag, values] of valuesByStrategy) {
      avgByStrategy[tag] = roundAmount(
        values.reduce((sum, v) => sum + v, 0) / values.length,
      );
    }

    const years = records.map((record) => record.year);
    const dividends = records.map((record) => record.dividend_value);

    return {
      total_records: records.length,
      by_ticker: byTicker,
      by_source: bySource,
      by_strategy: byStrategy,
      year_range:
        years.length > 0
          ? { min: Math.min(...years), max: Math.max(...years) }
          : null,
      dividend:
        dividends.length > 0
          ? {
              avg: roundAmount(
                dividends.reduce((sum, v) => sum + v, 0) / dividends.length,
              ),
              min: Math.min(...dividends),
              max: Math.max(...dividends),
            }
          : null,
      avg_by_strategy: avgByStrategy,
    };
  }

  async writeFiles(
    outputDir: string,
    records: readonly PaymentRecord[],
  ): Promise<{ csvPath: string; jsonPath: string }> {
    await fs.promises.mkdir(outputDir, { recursive: true });
    const csvPath = path.join(outputDir, CSV_FILE_NAME);
    const jsonPath = path.join(outputDir, JSON_FILE_NAME);

    await fs.promises.writeFile(csvPath, this.toCsv(records), 'utf8');
    await fs.promises.writeFile(jsonPath, this.toJson(records), 'utf8');

    this.logger.log(`Saved ${records.length} records to ${csvPath} and ${jsonPath}`);
    return { csvPath, jsonPath };
  }
}
