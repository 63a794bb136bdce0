import { Module } from '@nestjs/common';
import { DividendNormalizerService } from './dividendNormalizer.service';

@Module({
  providers: [DividendNormalizerService],
  exports: [DividendNormalizerService],
})
export class DividendModule {}
