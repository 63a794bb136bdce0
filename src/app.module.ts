import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import forecastConfig from './config/forecast.config';
import { validate } from './config/env.validation';
import { ForecastModule } from './forecast/forecast.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [forecastConfig],
      validate,
    }),
    ScheduleModule.forRoot(),
    ForecastModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
