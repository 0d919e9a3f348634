import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

const toBoolean = ({ value }: { value: unknown }): boolean =>
  value === true || value === 'true';

/**
 * Environment variables read at startup
 */
export class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 4010;

  @IsIn(['mock', 'typeorm'])
  STORAGE_TYPE: 'mock' | 'typeorm' = 'mock';

  @IsOptional()
  @IsString()
  KASSA_CONFIG_SECRET?: string;

  @IsString()
  DB_HOST: string = 'localhost';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  DB_PORT: number = 5432;

  @IsString()
  DB_USERNAME: string = 'kassa';

  @IsString()
  DB_PASSWORD: string = 'kassa';

  @IsString()
  DB_NAME: string = 'kassa';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  DB_POOL_SIZE: number = 10;

  @Transform(toBoolean)
  @IsBoolean()
  DB_LOGGING: boolean = false;

  @Transform(toBoolean)
  @IsBoolean()
  DB_SYNCHRONIZE: boolean = false;

  @Transform(toBoolean)
  @IsBoolean()
  OUTBOX_ENABLED: boolean = false;

  @Type(() => Number)
  @IsInt()
  @Min(100)
  OUTBOX_POLL_INTERVAL_MS: number = 5000;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  STRIPE_TOLERANCE_SECONDS: number = 300;
}

/**
 * Validate process.env for ConfigModule; throws with every failed constraint
 */
export function validateEnv(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return validated;
}
