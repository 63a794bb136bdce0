import { Injectable, Logger } from '@nestjs/common';
import {
  PaymentRecord,
  QUARTERS,
  SiteForecast,
  SourceKind,
  StrategyTag,
  siteForecastKey,
} from '../dividend/dividend.model';
import { isQuarter, quarterOfMonth } from '../utils/quarter';
import { isValidDate } from '../utils/time-normalize';
import { ActivityAssessment, evaluateActivity } from './activityEvaluator';
import {
  AnnualAggregate,
  DateGroupAggregate,
  QuarterlyAggregate,
  aggregateAnnual,
  aggregateByDate,
  aggregateQuarterly,
} from './aggregators';
import {
  ForecastError,
  ForecastValidationError,
  describeError,
} from './forecast.errors';
import {
  ForecastDraft,
  createForecastRecord,
  standardQuarterDate,
  synthesizeForecastDate,
} from './forecast.factory';
import {
  CascadeOptions,
  SkipEvent,
  TickerDataset,
  TickerForecastResult,
} from './forecast.type';

interface CascadeContext {
  readonly dataset: TickerDataset;
  readonly options: CascadeOptions;
  readonly horizon: readonly number[];
  readonly activity: ActivityAssessment;
  readonly quarterly: readonly QuarterlyAggregate[];
  readonly dateGroups: readonly DateGroupAggregate[];
  readonly annual: AnnualAggregate | null;
  readonly forecasts: PaymentRecord[];
  readonly covered: Set<string>;
  readonly skipped: SkipEvent[];
}

interface CascadeStep {
  tag: StrategyTag;
  // a terminal step ends the cascade for the ticker once it has run
  terminal: boolean;
  when: (ctx: CascadeContext) => boolean;
  apply: (ctx: CascadeContext) => void;
}

const hasAnyForecastYet = (ctx: CascadeContext) => ctx.forecasts.length > 0;

function compareActuals(a: PaymentRecord, b: PaymentRecord): number {
  if (a.record_date && b.record_date) {
    return a.record_date.getTime() - b.record_date.getTime();
  }
  if (a.record_date) return -1;
  if (b.record_date) return 1;
  return a.year - b.year;
}

function compareForecasts(a: PaymentRecord, b: PaymentRecord): number {
  return (
    a.year - b.year ||
    (a.quarter ?? 0) - (b.quarter ?? 0) ||
    (a.record_date?.getTime() ?? 0) - (b.record_date?.getTime() ?? 0)
  );
}

@Injectable()
export class ForecastCascadeService {
  private readonly logger = new Logger(ForecastCascadeService.name);

  // ********************************************************
  // Strategy steps, highest priority first
  // ********************************************************
  private readonly steps: readonly CascadeStep[] = [
    {
      // 1. site forecasts for the running year
      tag: StrategyTag.SITE_CURRENT,
      terminal: false,
      when: () => true,
      apply: (ctx) => this.injectCurrentSiteForecasts(ctx),
    },
    {
      // 2. inactive company or all-zero site forecasts
      tag: StrategyTag.CRITICAL_INACTIVE,
      terminal: true,
      when: (ctx) => ctx.activity.apply_critical_scenario,
      apply: (ctx) => this.applyZeroSweep(ctx, StrategyTag.CRITICAL_INACTIVE),
    },
    {
      // 3. site forecasts for the remaining horizon
      tag: StrategyTag.SITE_FUTURE,
      terminal: false,
      when: (ctx) => ctx.activity.site_total > 0,
      apply: (ctx) => this.injectFutureSiteForecasts(ctx),
    },
    {
      // 4. per-quarter averages
      tag: StrategyTag.QUARTERLY_HISTORY,
      terminal: false,
      when: (ctx) => ctx.quarterly.length > 0,
      apply: (ctx) => this.applyQuarterlyHistory(ctx),
    },
    {
      // 5. exact payment dates inside the year
      tag: StrategyTag.DATE_HISTORY,
      terminal: false,
      when: (ctx) => !hasAnyForecastYet(ctx) && ctx.dateGroups.length > 0,
      apply: (ctx) => this.applyDateHistory(ctx),
    },
    {
      // 6. one average for the whole history
      tag: StrategyTag.ANNUAL_HISTORY,
      terminal: false,
      when: (ctx) => !hasAnyForecastYet(ctx) && ctx.annual !== null,
      apply: (ctx) => this.applyAnnualHistory(ctx),
    },
    {
      // 7. nothing usable at all
      tag: StrategyTag.EMERGENCY_FALLBACK,
      terminal: true,
      when: (ctx) => !hasAnyForecastYet(ctx),
      apply: (ctx) => this.applyZeroSweep(ctx, StrategyTag.EMERGENCY_FALLBACK),
    },
  ];

  /**
   * Runs the strategy cascade for one ticker.
   * @returns the ticker's actual payments followed by its forecasts, plus
   * every candidate record that had to be skipped
   */
  forecastTicker(
    dataset: TickerDataset,
    options: CascadeOptions,
  ): TickerForecastResult {
    const skipped: SkipEvent[] = [];
    const history = this.screenHistory(dataset, skipped);
    const actuals = [...history].sort(compareActuals);

    if (options.years <= 0) {
      this.logger.log(`Forecast horizon is empty, no forecasts for ${dataset.ticker}`);
      return {
        ticker: dataset.ticker,
        name: dataset.name,
        critical_scenario: false,
        strategies: [],
        records: actuals,
        forecasts: [],
        skipped,
      };
    }

    const screened: TickerDataset = { ...dataset, history };
    const horizon = Array.from(
      { length: options.years },
      (_, index) => options.currentYear + index + 1,
    );
    const ctx: CascadeContext = {
      dataset: screened,
      options,
      horizon,
      activity: evaluateActivity(
        history,
        dataset.site_forecasts,
        options.currentYear,
        options.historyYears,
      ),
      quarterly: aggregateQuarterly(history),
      dateGroups: aggregateByDate(history),
      annual: aggregateAnnual(history),
      forecasts: [],
      covered: new Set<string>(),
      skipped,
    };

    const strategies: StrategyTag[] = [];
    for (const step of this.steps) {
      if (!step.when(ctx)) continue;
      const before = ctx.forecasts.length;
      step.apply(ctx);
      if (ctx.forecasts.length > before) strategies.push(step.tag);
      if (step.terminal) break;
    }

    const forecasts = [...ctx.forecasts].sort(compareForecasts);
    this.logger.log(
      `Created ${forecasts.length} forecasts for ${dataset.ticker} (${strategies.join(', ')})`,
    );

    return {
      ticker: dataset.ticker,
      name: dataset.name,
      critical_scenario: ctx.activity.apply_critical_scenario,
      strategies,
      records: [...actuals, ...forecasts],
      forecasts,
      skipped,
    };
  }

  // ********************************************************
  // Steps
  // ********************************************************

  private injectCurrentSiteForecasts(ctx: CascadeContext) {
    for (const forecast of this.sortedSiteForecasts(ctx)) {
      if (forecast.year !== ctx.options.currentYear) continue;
      this.emitSiteForecast(ctx, StrategyTag.SITE_CURRENT, forecast);
    }
  }

  private injectFutureSiteForecasts(ctx: CascadeContext) {
    // quarters with their own history get the site value from the quarterly step
    const historyQuarters = new Set<number>(ctx.quarterly.map((a) => a.quarter));

    for (const forecast of this.sortedSiteForecasts(ctx)) {
      if (forecast.year === ctx.options.currentYear) continue;
      if (!ctx.horizon.includes(forecast.year)) {
        this.logger.debug(
          `Ignoring site forecast ${ctx.dataset.ticker} ${siteForecastKey(forecast.year, forecast.quarter)}: outside the forecast horizon`,
        );
        continue;
      }
      if (historyQuarters.has(forecast.quarter)) continue;
      this.emitSiteForecast(ctx, StrategyTag.SITE_FUTURE, forecast);
    }
  }

  private applyZeroSweep(ctx: CascadeContext, tag: StrategyTag) {
    if (tag === StrategyTag.CRITICAL_INACTIVE) {
      this.logger.log(
        `No payments for ${ctx.dataset.ticker} in the last ${ctx.options.historyYears} years or zero site forecasts, applying critical scenario`,
      );
    } else {
      this.logger.log(`Creating emergency forecast for ${ctx.dataset.ticker}`);
    }

    for (const quarter of QUARTERS) {
      for (const year of ctx.horizon) {
        this.tryEmit(ctx, tag, year, quarter, () => ({
          strategy_tag: tag,
          record_date: standardQuarterDate(year, quarter),
          dividend_value: 0,
        }));
      }
    }
  }

  private applyQuarterlyHistory(ctx: CascadeContext) {
    for (const aggregate of ctx.quarterly) {
      this.logger.debug(
        `${ctx.dataset.ticker} Q${aggregate.quarter}: month=${aggregate.month}, day=${aggregate.day}, avg=${aggregate.avg_dividend}`,
      );
      for (const year of ctx.horizon) {
        this.tryEmit(ctx, StrategyTag.QUARTERLY_HISTORY, year, aggregate.quarter, () =>
          this.withSiteOverride(
            ctx,
            year,
            aggregate.quarter,
            StrategyTag.QUARTERLY_HISTORY,
            () => synthesizeForecastDate(year, aggregate.month, aggregate.day),
            aggregate.avg_dividend,
          ),
        );
      }
    }
  }

  private applyDateHistory(ctx: CascadeContext) {
    this.logger.log(
      `Using historical payment dates to forecast ${ctx.dataset.ticker}`,
    );
    for (const group of ctx.dateGroups) {
      for (const year of ctx.horizon) {
        this.tryEmit(ctx, StrategyTag.DATE_HISTORY, year, group.quarter, () =>
          this.withSiteOverride(
            ctx,
            year,
            group.quarter,
            StrategyTag.DATE_HISTORY,
            () => synthesizeForecastDate(year, group.month, group.day),
            group.avg_dividend,
          ),
        );
      }
    }
  }

  private applyAnnualHistory(ctx: CascadeContext) {
    const annual = ctx.annual;
    if (!annual) return;
    this.logger.log(
      `Not enough payment dates for ${ctx.dataset.ticker}, using the annual average ${annual.avg_dividend}`,
    );
    for (const quarter of QUARTERS) {
      for (const year of ctx.horizon) {
        this.tryEmit(ctx, StrategyTag.ANNUAL_HISTORY, year, quarter, () =>
          this.withSiteOverride(
            ctx,
            year,
            quarter,
            StrategyTag.ANNUAL_HISTORY,
            () => standardQuarterDate(year, quarter),
            annual.avg_dividend,
          ),
        );
      }
    }
  }

  // ********************************************************
  // Helpers
  // ********************************************************

  private emitSiteForecast(
    ctx: CascadeContext,
    tag: StrategyTag,
    forecast: SiteForecast,
  ) {
    this.tryEmit(ctx, tag, forecast.year, forecast.quarter, () => ({
      strategy_tag: tag,
      record_date: forecast.record_date,
      dividend_value: forecast.dividend_value,
    }));
  }

  private withSiteOverride(
    ctx: CascadeContext,
    year: number,
    quarter: number,
    tag: StrategyTag,
    fallbackDate: () => Date,
    fallbackValue: number,
  ): ForecastDraft {
    const site = ctx.dataset.site_forecasts.get(siteForecastKey(year, quarter));
    if (site) {
      return {
        strategy_tag: StrategyTag.SITE_DERIVED,
        record_date: site.record_date ?? fallbackDate(),
        dividend_value: site.dividend_value,
      };
    }
    return {
      strategy_tag: tag,
      record_date: fallbackDate(),
      dividend_value: fallbackValue,
    };
  }

  /**
   * Adds one forecast unless its (year, quarter) is already taken. Any error
   * while building it drops just this record.
   */
  private tryEmit(
    ctx: CascadeContext,
    step: StrategyTag,
    year: number,
    quarter: number,
    build: () => ForecastDraft,
  ): boolean {
    const { ticker } = ctx.dataset;
    const key = siteForecastKey(year, quarter);
    if (ctx.covered.has(key)) {
      this.logger.debug(`${ticker} ${key} is already forecast, ${step} skipped`);
      return false;
    }

    try {
      const record = createForecastRecord(ctx.dataset, year, quarter, build());
      ctx.forecasts.push(record);
      ctx.covered.add(key);
      return true;
    } catch (error) {
      const reason = describeError(error);
      this.logger.error(
        `Failed to build ${step} forecast for ${ticker} Q${quarter} ${year}: ${reason}`,
      );
      ctx.skipped.push({
        ticker,
        strategy: step,
        year,
        quarter,
        kind: error instanceof ForecastError ? error.code : 'CONSTRUCTION_ERROR',
        reason,
      });
      return false;
    }
  }

  private sortedSiteForecasts(ctx: CascadeContext): SiteForecast[] {
    return [...ctx.dataset.site_forecasts.values()].sort(
      (a, b) => a.year - b.year || a.quarter - b.quarter,
    );
  }

  // drops history rows that would poison the aggregates
  private screenHistory(
    dataset: TickerDataset,
    skipped: SkipEvent[],
  ): PaymentRecord[] {
    const accepted: PaymentRecord[] = [];
    for (const record of dataset.history) {
      try {
        this.validateHistoryRecord(record);
        accepted.push(record);
      } catch (error) {
        const reason = describeError(error);
        this.logger.warn(`Skipping history row of ${dataset.ticker}: ${reason}`);
        skipped.push({
          ticker: dataset.ticker,
          strategy: StrategyTag.ACTUAL,
          year: Number.isInteger(record.year) ? record.year : null,
          quarter: record.quarter,
          kind: error instanceof ForecastError ? error.code : 'VALIDATION_ERROR',
          reason,
        });
      }
    }
    return accepted;
  }

  private validateHistoryRecord(record: PaymentRecord) {
    if (record.source_kind !== SourceKind.ACTUAL) {
      throw new ForecastValidationError('History may only hold actual payments', {
        source_kind: record.source_kind,
      });
    }
    if (!Number.isFinite(record.dividend_value) || record.dividend_value < 0) {
      throw new ForecastValidationError(
        `Invalid dividend value: ${record.dividend_value}`,
      );
    }
    if (!Number.isInteger(record.year)) {
      throw new ForecastValidationError(`Invalid year: ${record.year}`);
    }
    if (record.record_date !== null && !isValidDate(record.record_date)) {
      throw new ForecastValidationError('Malformed record date');
    }
    if (record.quarter !== null && !isQuarter(record.quarter)) {
      throw new ForecastValidationError(`Invalid quarter: ${record.quarter}`);
    }
    if (record.month !== null) quarterOfMonth(record.month);
  }
}
