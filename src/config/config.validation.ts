import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsIn,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'verbose'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

export class EnvironmentVariables {
  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV: Environment = Environment.Development;

  @IsNumber()
  @Min(1)
  @Max(65535)
  @IsOptional()
  PORT: number = 3000;

  @IsString()
  @IsOptional()
  API_PREFIX: string = 'v1';

  @IsString()
  @IsOptional()
  API_KEY?: string;

  @IsString()
  @IsOptional()
  APP_VERSION?: string;

  // Database
  @IsString()
  @IsOptional()
  DATABASE_HOST: string = 'localhost';

  @IsNumber()
  @Min(1)
  @Max(65535)
  @IsOptional()
  DATABASE_PORT: number = 5432;

  @IsString()
  @IsOptional()
  DATABASE_USERNAME: string = 'postgres';

  @IsString()
  @IsOptional()
  DATABASE_PASSWORD: string = 'postgres';

  @IsString()
  @IsOptional()
  DATABASE_NAME: string = 'content_api';

  @IsString()
  @IsOptional()
  DATABASE_SYNCHRONIZE: string = 'false';

  @IsString()
  @IsOptional()
  DATABASE_LOGGING: string = 'false';

  // Slugs
  @IsNumber()
  @Min(1)
  @Max(1000)
  @IsOptional()
  SLUG_MAX_ATTEMPTS: number = 50;

  @IsNumber()
  @Min(1)
  @Max(10)
  @IsOptional()
  SLUG_COMMIT_RETRIES: number = 3;

  // Pagination
  @IsNumber()
  @Min(1)
  @IsOptional()
  PAGINATION_DEFAULT_LIMIT: number = 100;

  @IsNumber()
  @Min(1)
  @Max(1000)
  @IsOptional()
  PAGINATION_MAX_LIMIT: number = 100;

  // Logging
  @IsIn(LOG_LEVELS)
  @IsOptional()
  LOG_LEVEL: LogLevelName = 'info';

  // CORS
  @IsString()
  @IsOptional()
  CORS_ORIGINS: string = 'http://localhost:3000';
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors.map((error) => {
      const constraints = error.constraints;
      if (constraints) {
        return Object.values(constraints).join(', ');
      }
      return `${error.property} has invalid value`;
    });

    throw new Error(`Configuration validation failed:\n${errorMessages.join('\n')}`);
  }

  return validatedConfig;
}
