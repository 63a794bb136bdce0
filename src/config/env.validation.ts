import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import {
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  CORS_ORIGIN?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(50)
  FORECAST_YEARS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  FORECAST_HISTORY_YEARS?: number;

  @IsOptional()
  @IsInt()
  @Min(1900)
  @Max(2999)
  FORECAST_CURRENT_YEAR?: number;

  @IsOptional()
  @IsString()
  FORECAST_DATA_DIR?: string;

  @IsOptional()
  @IsString()
  FORECAST_OUTPUT_DIR?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  FORECAST_CACHE_TTL?: number;
}

// used by ConfigModule.forRoot to reject a broken .env at startup
export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(
      `Invalid environment: ${errors
        .map((error) => Object.values(error.constraints ?? {}).join(', '))
        .join('; ')}`,
    );
  }
  return validatedConfig;
}
