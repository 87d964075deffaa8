import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

const toBoolean = ({ obj, key }: { obj: Record<string, unknown>; key: string }) =>
  obj[key] === true || obj[key] === 'true' || obj[key] === '1';

export class EnvironmentVariables {
  @IsUrl({ require_tld: false })
  CLICKHOUSE_HOST: string = 'http://localhost:8123';

  @IsString()
  CLICKHOUSE_USER: string = 'default';

  @IsString()
  CLICKHOUSE_PASSWORD: string = '';

  @IsString()
  CLICKHOUSE_DATABASE: string = 'snapshots';

  @IsUrl({ require_tld: false })
  QUOTES_API_BASE_URL: string = 'https://pro-api.coinmarketcap.com/v1';

  @IsOptional()
  @IsString()
  QUOTES_API_KEY?: string;

  @IsString()
  QUOTES_CONVERT: string = 'USD';

  @IsInt()
  @Min(100)
  HTTP_TIMEOUT_MS: number = 10_000;

  @IsInt()
  @Min(0)
  @Max(10)
  HTTP_MAX_RETRIES: number = 3;

  @IsInt()
  @Min(1)
  @Max(5000)
  EXTRACT_PAGE_SIZE: number = 200;

  @IsInt()
  @Min(1)
  EXTRACT_MAX_PAGES: number = 50;

  @IsInt()
  @Min(0)
  EXTRACT_PAGE_DELAY_MS: number = 250;

  @IsInt()
  @Min(1)
  LOADER_BATCH_SIZE: number = 1000;

  @IsInt()
  @Min(0)
  @Max(10)
  LOADER_MAX_RETRIES: number = 3;

  @IsInt()
  @Min(0)
  LOADER_RETRY_DELAY_MS: number = 500;

  @IsInt()
  @Min(1)
  DEFAULT_LOOKBACK_HOURS: number = 1;

  @IsInt()
  @Min(1)
  JOB_TIMEOUT_SECONDS: number = 300;

  @Transform(toBoolean)
  @IsBoolean()
  BACKFILL_ADVANCES_WATERMARK: boolean = false;

  @IsIn(LOG_LEVELS)
  LOG_LEVEL: LogLevelName = 'log';
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }
  return validatedConfig;
}
