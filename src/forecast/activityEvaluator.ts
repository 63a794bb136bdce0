import {
  PaymentRecord,
  SiteForecastMap,
  SourceKind,
} from '../dividend/dividend.model';

export interface ActivityAssessment {
  trailing_sum: number;
  site_total: number;
  site_count: number;
  inactive_history: boolean;
  zero_site_forecasts: boolean;
  apply_critical_scenario: boolean;
}

export function sumSiteForecasts(siteForecasts: SiteForecastMap): number {
  let total = 0;
  for (const forecast of siteForecasts.values()) {
    total += forecast.dividend_value;
  }
  return total;
}

/**
 * Decides whether the ticker gets the zero-forecast (critical) treatment:
 * nothing paid within the last `historyYears` years, or site forecasts that
 * exist but add up to zero. Years without records count as zero years; a
 * ticker without any actual record is not judged inactive.
 */
export function evaluateActivity(
  history: readonly PaymentRecord[],
  siteForecasts: SiteForecastMap,
  currentYear: number,
  historyYears: number,
): ActivityAssessment {
  const windowStart = currentYear - historyYears;
  const actuals = history.filter(
    (record) => record.source_kind === SourceKind.ACTUAL,
  );
  const trailingSum = actuals
    .filter((record) => record.year >= windowStart)
    .reduce((sum, record) => sum + record.dividend_value, 0);

  const siteTotal = sumSiteForecasts(siteForecasts);
  // no actual rows at all is missing data, handled by the emergency step
  const inactiveHistory = actuals.length > 0 && trailingSum === 0;
  const zeroSiteForecasts = siteForecasts.size > 0 && siteTotal === 0;

  return {
    trailing_sum: trailingSum,
    site_total: siteTotal,
    site_count: siteForecasts.size,
    inactive_history: inactiveHistory,
    zero_site_forecasts: zeroSiteForecasts,
    apply_critical_scenario: inactiveHistory || zeroSiteForecasts,
  };
}

export const shouldApplyCriticalScenario = (
  history: readonly PaymentRecord[],
  siteForecasts: SiteForecastMap,
  currentYear: number,
  historyYears: number,
) =>
  evaluateActivity(history, siteForecasts, currentYear, historyYears)
    .apply_critical_scenario;
