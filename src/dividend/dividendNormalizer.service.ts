import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import fs from 'fs';
import Papa from 'papaparse';
import {
  PaymentRecord,
  Quarter,
  SiteForecast,
  SourceKind,
  StrategyTag,
  siteForecastKey,
} from './dividend.model';
import { TickerDataset } from '../forecast/forecast.type';
import { formatPeriod, isQuarter, quarterOfDate } from '../utils/quarter';
import { NO_DATA, formatDate, parseDate } from '../utils/time-normalize';

export type RawDividendRow = Record<string, string | undefined>;

export interface NormalizationIssue {
  row: number | null;
  ticker: string | null;
  reason: string;
}

export interface NormalizationResult {
  datasets: TickerDataset[];
  actual_count: number;
  site_forecast_count: number;
  rejected: NormalizationIssue[];
  // site forecasts replaced by a later row for the same (year, quarter)
  duplicates: NormalizationIssue[];
}

// shapes accepted from the HTTP body
export interface PaymentInput {
  record_date?: string | null;
  announcement_date?: string | null;
  dividend_value: number;
  year?: number | null;
  quarter?: number | null;
}

export interface SiteForecastInput {
  year: number;
  quarter: number;
  record_date?: string | null;
  dividend_value: number;
}

export interface TickerInput {
  ticker: string;
  name?: string | null;
  history?: PaymentInput[];
  site_forecasts?: SiteForecastInput[];
}

interface RecordFields {
  ticker: string;
  name: string;
  record_date: Date | null;
  announcement_date: Date | null;
  dividend_value: number;
  year: number;
  quarter: Quarter | null;
  source_kind: SourceKind;
}

interface TickerBucket {
  ticker: string;
  name: string;
  history: PaymentRecord[];
  site_forecasts: Map<string, SiteForecast>;
}

type RowOutcome =
  | { ok: true; fields: RecordFields }
  | { ok: false; reason: string };

// ===== Utility Functions =====

export function cleanString(str: string | null | undefined): string {
  if (!str) return '';
  return str
    .replace(/^['"`]|['"`]$/g, '') // quotes
    .replace(/\r?\n|\r/g, '') // line breaks
    .trim();
}

/**
 * Keeps digits, dots and commas only; a comma is a decimal separator.
 * Empty, "n/a" and unparsable values become 0.
 */
export function parseDividendValue(value: string | null | undefined): number {
  const cleaned = cleanString(value);
  if (!cleaned || cleaned.toLowerCase() === 'n/a') return 0;
  const numeric = cleaned.replace(/[^\d.,]/g, '').replace(',', '.');
  const parsed = Number(numeric);
  return numeric === '' || isNaN(parsed) ? 0 : parsed;
}

const QUARTER_PATTERNS = [
  /\bQ\s*([1-4])\b/i, // Q1, q 2
  /\b([1-4])\s*Q\b/i, // 1Q, 3 Q
  /quarter\s*([1-4])\b/i,
];

export function quarterFromPeriod(period: string): Quarter | null {
  for (const pattern of QUARTER_PATTERNS) {
    const match = period.match(pattern);
    const quarter = match ? Number(match[1]) : null;
    if (isQuarter(quarter)) return quarter;
  }
  return null;
}

export function yearFromPeriod(period: string): number | null {
  const match = period.match(/(\d{4})/);
  return match ? Number(match[1]) : null;
}

const FORECAST_MARKER = /forecast|прогноз/i;

@Injectable()
export class DividendNormalizerService {
  private readonly logger = new Logger(DividendNormalizerService.name);

  // ********************************************************
  // 1. CSV input
  // ********************************************************

  parseCsv(content: string): RawDividendRow[] {
    const parseResult = Papa.parse<RawDividendRow>(content, {
      header: true,
      skipEmptyLines: true,
      transformHeader: (header: string) => cleanString(header),
      transform: (value: string) => cleanString(value),
    });

    if (parseResult.errors.length > 0) {
      this.logger.warn(
        `CSV parsing reported ${parseResult.errors.length} problems: ${parseResult.errors
          .map((e) => `row ${e.row ?? '?'}: ${e.message}`)
          .join('; ')}`,
      );
    }
    return parseResult.data;
  }

  async normalizeFile(
    filePath: string,
    referenceDate: Date = new Date(),
  ): Promise<NormalizationResult> {
    this.logger.log(`Reading dividend data from ${filePath}`);
    if (!fs.existsSync(filePath)) {
      throw new NotFoundException(`Dividend data file not found: ${filePath}`);
    }

    const fileBuffer = await fs.promises.readFile(filePath);
    let csvContent = fileBuffer.toString('utf8');
    if (csvContent.includes('�')) {
      this.logger.warn('Detected encoding issues, trying latin1...');
      csvContent = fileBuffer.toString('latin1');
    }
    return this.normalizeRows(this.parseCsv(csvContent), referenceDate);
  }

  // ********************************************************
  // 2. Row cleaning
  // ********************************************************

  /**
   * Cleans raw rows into per-ticker datasets, tickers in first-seen order.
   * Rows repeating (ticker, record date, value) are dropped, first one wins.
   */
  normalizeRows(
    rows: RawDividendRow[],
    referenceDate: Date = new Date(),
  ): NormalizationResult {
    const buckets = new Map<string, TickerBucket>();
    const seen = new Set<string>();
    const rejected: NormalizationIssue[] = [];
    const duplicates: NormalizationIssue[] = [];
    let actualCount = 0;
    let siteCount = 0;

    rows.forEach((row, index) => {
      const rowNumber = index + 1;
      const outcome = this.parseRow(row, referenceDate);
      if (!outcome.ok) {
        this.logger.warn(`Row ${rowNumber}: ${outcome.reason}, skipping`);
        rejected.push({
          row: rowNumber,
          ticker: cleanString(row.ticker) || null,
          reason: outcome.reason,
        });
        return;
      }

      const { fields } = outcome;
      const dedupKey = `${fields.ticker}|${formatDate(fields.record_date)}|${fields.dividend_value}`;
      if (seen.has(dedupKey)) return;
      seen.add(dedupKey);

      const bucket = this.bucketFor(buckets, fields.ticker, fields.name);
      if (fields.source_kind === SourceKind.ACTUAL) {
        bucket.history.push(this.buildRecord(fields));
        actualCount++;
        return;
      }

      const issue = this.addSiteForecast(bucket, fields, rowNumber);
      if (issue === 'rejected') {
        rejected.push({
          row: rowNumber,
          ticker: fields.ticker,
          reason: 'Site forecast without a quarter',
        });
        return;
      }
      if (issue === 'duplicate') {
        duplicates.push({
          row: rowNumber,
          ticker: fields.ticker,
          reason: `Duplicate site forecast for ${siteForecastKey(fields.year, fields.quarter ?? 0)}`,
        });
      }
      siteCount++;
    });

    this.logger.log(
      `Normalized ${actualCount} actual payments and ${siteCount} site forecasts for ${buckets.size} tickers (${rejected.length} rows rejected)`,
    );

    return {
      datasets: [...buckets.values()],
      actual_count: actualCount,
      site_forecast_count: siteCount,
      rejected,
      duplicates,
    };
  }

  // ********************************************************
  // 3. Structured input (HTTP)
  // ********************************************************

  normalizeTickerInput(input: TickerInput): {
    dataset: TickerDataset;
    rejected: NormalizationIssue[];
    duplicates: NormalizationIssue[];
  } {
    const ticker = cleanString(input.ticker);
    const name = cleanString(input.name) || ticker;
    const bucket: TickerBucket = {
      ticker,
      name,
      history: [],
      site_forecasts: new Map(),
    };
    const rejected: NormalizationIssue[] = [];
    const duplicates: NormalizationIssue[] = [];
    const reject = (row: number, reason: string) => {
      this.logger.warn(`${ticker} entry ${row}: ${reason}, skipping`);
      rejected.push({ row, ticker, reason });
    };

    (input.history ?? []).forEach((payment, index) => {
      const recordDate = parseDate(payment.record_date);
      if (payment.record_date && !recordDate) {
        return reject(index + 1, `Unparsable record date "${payment.record_date}"`);
      }
      if (!Number.isFinite(payment.dividend_value) || payment.dividend_value < 0) {
        return reject(index + 1, `Invalid dividend value ${payment.dividend_value}`);
      }
      const quarter = payment.quarter ?? (recordDate ? quarterOfDate(recordDate) : null);
      if (quarter !== null && !isQuarter(quarter)) {
        return reject(index + 1, `Invalid quarter ${quarter}`);
      }
      const year = payment.year ?? recordDate?.getUTCFullYear() ?? null;
      if (year === null) {
        return reject(index + 1, 'Payment without a year or record date');
      }
      bucket.history.push(
        this.buildRecord({
          ticker,
          name,
          record_date: recordDate,
          announcement_date: parseDate(payment.announcement_date),
          dividend_value: payment.dividend_value,
          year,
          quarter,
          source_kind: SourceKind.ACTUAL,
        }),
      );
    });

    (input.site_forecasts ?? []).forEach((forecast, index) => {
      const recordDate = parseDate(forecast.record_date);
      if (forecast.record_date && !recordDate) {
        return reject(index + 1, `Unparsable site forecast date "${forecast.record_date}"`);
      }
      if (!isQuarter(forecast.quarter)) {
        return reject(index + 1, `Invalid site forecast quarter ${forecast.quarter}`);
      }
      const outcome = this.addSiteForecast(
        bucket,
        {
          ticker,
          name,
          record_date: recordDate,
          announcement_date: null,
          dividend_value: forecast.dividend_value,
          year: forecast.year,
          quarter: forecast.quarter,
          source_kind: SourceKind.SITE_FORECAST,
        },
        index + 1,
      );
      if (outcome === 'duplicate') {
        duplicates.push({
          row: index + 1,
          ticker,
          reason: `Duplicate site forecast for ${siteForecastKey(forecast.year, forecast.quarter)}`,
        });
      }
    });

    return { dataset: bucket, rejected, duplicates };
  }

  // ********************************************************
  // Helpers
  // ********************************************************

  private parseRow(row: RawDividendRow, referenceDate: Date): RowOutcome {
    const ticker = cleanString(row.ticker);
    if (!ticker) return { ok: false, reason: 'Missing ticker' };

    const rawDate = cleanString(row.record_date);
    const recordDate = rawDate === NO_DATA ? null : parseDate(rawDate);
    if (rawDate && rawDate !== NO_DATA && rawDate.toLowerCase() !== 'n/a' && !recordDate) {
      return { ok: false, reason: `Unparsable record date "${rawDate}"` };
    }

    const period = cleanString(row.period);
    const rawValue = cleanString(row.dividend_value);

    const rawQuarter = cleanString(row.quarter);
    let quarter: Quarter | null = null;
    if (rawQuarter) {
      const parsed = Number(rawQuarter);
      if (!isQuarter(parsed)) {
        return { ok: false, reason: `Invalid quarter "${rawQuarter}"` };
      }
      quarter = parsed;
    } else {
      quarter = quarterFromPeriod(period) ?? (recordDate ? quarterOfDate(recordDate) : null);
    }

    const rawYear = cleanString(row.year);
    const year =
      (rawYear && /^\d{4}$/.test(rawYear) ? Number(rawYear) : null) ??
      yearFromPeriod(period) ??
      recordDate?.getUTCFullYear() ??
      null;
    if (year === null) return { ok: false, reason: 'Missing year' };

    return {
      ok: true,
      fields: {
        ticker,
        name: cleanString(row.name) || ticker,
        record_date: recordDate,
        announcement_date: parseDate(cleanString(row.announcement_date)),
        dividend_value: parseDividendValue(rawValue),
        year,
        quarter,
        source_kind: this.classifySource(row, period, rawValue, recordDate, referenceDate),
      },
    };
  }

  // 0 = actual, 1 = third-party forecast
  private classifySource(
    row: RawDividendRow,
    period: string,
    rawValue: string,
    recordDate: Date | null,
    referenceDate: Date,
  ): SourceKind {
    const explicit = cleanString(row.forecast_type);
    if (explicit === '0') return SourceKind.ACTUAL;
    if (explicit === '1') return SourceKind.SITE_FORECAST;

    if (FORECAST_MARKER.test(period) || FORECAST_MARKER.test(rawValue)) {
      return SourceKind.SITE_FORECAST;
    }
    if (rawValue.includes('(')) return SourceKind.SITE_FORECAST;
    if (recordDate && recordDate.getTime() > referenceDate.getTime()) {
      return SourceKind.SITE_FORECAST;
    }
    return SourceKind.ACTUAL;
  }

  private addSiteForecast(
    bucket: TickerBucket,
    fields: RecordFields,
    rowNumber: number,
  ): 'added' | 'duplicate' | 'rejected' {
    if (fields.quarter === null) {
      this.logger.warn(
        `Row ${rowNumber}: site forecast for ${fields.ticker} ${fields.year} has no quarter, skipping`,
      );
      return 'rejected';
    }

    const key = siteForecastKey(fields.year, fields.quarter);
    const duplicate = bucket.site_forecasts.has(key);
    if (duplicate) {
      // the later row replaces the earlier one
      this.logger.warn(
        `Row ${rowNumber}: duplicate site forecast for ${fields.ticker} ${key}, keeping the later row`,
      );
    }
    bucket.site_forecasts.set(key, {
      year: fields.year,
      quarter: fields.quarter,
      record_date: fields.record_date,
      dividend_value: fields.dividend_value,
    });
    return duplicate ? 'duplicate' : 'added';
  }

  private bucketFor(
    buckets: Map<string, TickerBucket>,
    ticker: string,
    name: string,
  ): TickerBucket {
    const existing = buckets.get(ticker);
    if (existing) return existing;
    const bucket: TickerBucket = {
      ticker,
      name,
      history: [],
      site_forecasts: new Map(),
    };
    buckets.set(ticker, bucket);
    return bucket;
  }

  private buildRecord(fields: RecordFields): PaymentRecord {
    const actual = fields.source_kind === SourceKind.ACTUAL;
    return Object.freeze({
      ticker: fields.ticker,
      name: fields.name,
      record_date: fields.record_date,
      record_date_str: formatDate(fields.record_date),
      dividend_value: fields.dividend_value,
      period: formatPeriod(fields.year, fields.quarter),
      source_kind: fields.source_kind,
      year: fields.year,
      quarter: fields.quarter,
      month: fields.record_date ? fields.record_date.getUTCMonth() + 1 : null,
      announcement_date: fields.announcement_date,
      strategy_tag: actual ? StrategyTag.ACTUAL : StrategyTag.SITE_RAW,
    });
  }
}
