#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ForecastSyncService } from './forecast/forecast.sync.service';

// one-shot rebuild: data dir CSV in, export files out
async function main() {
  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    const report = await app.get(ForecastSyncService).rebuildFromDataDir();
    console.log(
      `✅ Forecast complete: ${report.tickers} tickers, ${report.counters?.forecasts ?? 0} forecasts, ${report.rejected_rows} rejected rows`,
    );
    if (report.files) {
      console.log(`📄 ${report.files.csvPath}`);
      console.log(`📄 ${report.files.jsonPath}`);
    }
  } finally {
    await app.close();
  }
}

main().catch((e) => {
  console.error('💥 Forecast failed:', e);
  process.exit(1);
});
