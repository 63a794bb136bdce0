import 'reflect-metadata';
import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import {
  PaymentInput,
  SiteForecastInput,
  TickerInput,
} from '../dividend/dividendNormalizer.service';

// DTOs for POST /forecasts
export class PaymentInputDto implements PaymentInput {
  @IsOptional()
  @IsString()
  record_date?: string | null;

  @IsOptional()
  @IsString()
  announcement_date?: string | null;

  @IsNumber()
  @Min(0)
  dividend_value!: number;

  @IsOptional()
  @IsInt()
  year?: number | null;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(4)
  quarter?: number | null;
}

export class SiteForecastInputDto implements SiteForecastInput {
  @IsInt()
  year!: number;

  @IsInt()
  @Min(1)
  @Max(4)
  quarter!: number;

  @IsOptional()
  @IsString()
  record_date?: string | null;

  @IsNumber()
  @Min(0)
  dividend_value!: number;
}

export class TickerInputDto implements TickerInput {
  @IsString()
  @IsNotEmpty()
  ticker!: string;

  @IsOptional()
  @IsString()
  name?: string | null;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PaymentInputDto)
  history?: PaymentInputDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SiteForecastInputDto)
  site_forecasts?: SiteForecastInputDto[];
}

export class RunForecastDto {
  @IsOptional()
  @IsInt()
  current_year?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(50)
  years?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  history_years?: number;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => TickerInputDto)
  tickers!: TickerInputDto[];
}
