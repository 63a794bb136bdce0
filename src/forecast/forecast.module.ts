import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import forecastConfig from '../config/forecast.config';
import { DividendModule } from '../dividend/dividend.module';
import { ExportModule } from '../export/export.module';
import { ForecastController } from './forecast.controller';
import { ForecastService } from './forecast.service';
import { ForecastSyncService } from './forecast.sync.service';
import { ForecastCascadeService } from './forecastCascade.service';

@Module({
  imports: [
    ConfigModule.forFeature(forecastConfig),
    DividendModule,
    ExportModule,
  ],
  controllers: [ForecastController],
  providers: [ForecastCascadeService, ForecastService, ForecastSyncService],
  exports: [ForecastService, ForecastSyncService],
})
export class ForecastModule {}
