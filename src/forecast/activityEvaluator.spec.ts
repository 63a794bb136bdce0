import {
  evaluateActivity,
  shouldApplyCriticalScenario,
  sumSiteForecasts,
} from './activityEvaluator';
import {
  payment,
  siteForecast,
  siteForecasts,
} from '../testing/payment.fixtures';

describe('activityEvaluator', () => {
  it('keeps a company that paid inside the window active', () => {
    const result = evaluateActivity(
      [payment('X', '2021-06-15', 0), payment('X', '2022-06-15', 5)],
      new Map(),
      2024,
      3,
    );
    expect(result).toEqual({
      trailing_sum: 5,
      site_total: 0,
      site_count: 0,
      inactive_history: false,
      zero_site_forecasts: false,
      apply_critical_scenario: false,
    });
  });

  it('flags a company whose payments all predate the window', () => {
    const history = [payment('X', '2019-06-15', 4), payment('X', '2020-06-15', 4)];
    expect(shouldApplyCriticalScenario(history, new Map(), 2024, 3)).toBe(true);
    // 2020 is inside a four year window
    expect(shouldApplyCriticalScenario(history, new Map(), 2024, 4)).toBe(false);
  });

  it('flags site forecasts that are all zero', () => {
    const result = evaluateActivity(
      [payment('X', '2023-06-15', 5)],
      siteForecasts(siteForecast(2025, 1, 0), siteForecast(2025, 2, 0)),
      2024,
      3,
    );
    expect(result.zero_site_forecasts).toBe(true);
    expect(result.apply_critical_scenario).toBe(true);
  });

  it('does not judge a ticker without any actual rows as inactive', () => {
    const result = evaluateActivity([], new Map(), 2024, 3);
    expect(result.inactive_history).toBe(false);
    expect(result.apply_critical_scenario).toBe(false);
  });

  it('sums site forecast values', () => {
    expect(
      sumSiteForecasts(siteForecasts(siteForecast(2025, 1, 1.5), siteForecast(2025, 3, 2))),
    ).toBe(3.5);
  });
});
