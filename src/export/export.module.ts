import { Module } from '@nestjs/common';
import { ForecastExportService } from './forecastExport.service';

@Module({
  providers: [ForecastExportService],
  exports: [ForecastExportService],
})
export class ExportModule {}
