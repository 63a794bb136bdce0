import { registerAs } from '@nestjs/config';

const toInt = (value: string | undefined, fallback: number) => {
  if (value === undefined || value === '') return fallback;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? fallback : parsed;
};

export default registerAs('forecast', () => ({
  years: toInt(process.env.FORECAST_YEARS, 10),
  historyYears: toInt(process.env.FORECAST_HISTORY_YEARS, 3),
  // null means "the calendar year at run time"
  currentYear: process.env.FORECAST_CURRENT_YEAR
    ? toInt(process.env.FORECAST_CURRENT_YEAR, new Date().getUTCFullYear())
    : null,
  dataDir: process.env.FORECAST_DATA_DIR || './data',
  outputDir: process.env.FORECAST_OUTPUT_DIR || './output',
  cacheTtl: toInt(process.env.FORECAST_CACHE_TTL, 3600),
}));
