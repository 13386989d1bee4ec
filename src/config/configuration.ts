import { registerAs } from '@nestjs/config';

export const appConfig = registerAs('app', () => ({
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3000', 10),
  apiPrefix: process.env.API_PREFIX || 'v1',
  apiKey: process.env.API_KEY || '',
  version: process.env.APP_VERSION || process.env.npm_package_version || '1.0.0',
}));

export const databaseConfig = registerAs('database', () => ({
  host: process.env.DATABASE_HOST || 'localhost',
  port: parseInt(process.env.DATABASE_PORT || '5432', 10),
  username: process.env.DATABASE_USERNAME || 'postgres',
  password: process.env.DATABASE_PASSWORD || 'postgres',
  database: process.env.DATABASE_NAME || 'content_api',
  synchronize: process.env.DATABASE_SYNCHRONIZE === 'true',
  logging: process.env.DATABASE_LOGGING === 'true',
}));

export const slugConfig = registerAs('slug', () => ({
  maxAttempts: parseInt(process.env.SLUG_MAX_ATTEMPTS || '50', 10),
  commitRetries: parseInt(process.env.SLUG_COMMIT_RETRIES || '3', 10),
}));

export const paginationConfig = registerAs('pagination', () => ({
  defaultLimit: parseInt(process.env.PAGINATION_DEFAULT_LIMIT || '100', 10),
  maxLimit: parseInt(process.env.PAGINATION_MAX_LIMIT || '100', 10),
}));

export const logConfig = registerAs('log', () => ({
  level: process.env.LOG_LEVEL || 'info',
}));

export const corsConfig = registerAs('cors', () => ({
  origins: (process.env.CORS_ORIGINS || 'http://localhost:3000').split(','),
}));

export const swaggerConfig = registerAs('swagger', () => ({
  enabled:
    process.env.SWAGGER_ENABLED !== undefined
      ? process.env.SWAGGER_ENABLED === 'true'
      : process.env.NODE_ENV !== 'production',
}));

export default () => ({
  app: appConfig(),
  database: databaseConfig(),
  slug: slugConfig(),
  pagination: paginationConfig(),
  log: logConfig(),
  cors: corsConfig(),
  swagger: swaggerConfig(),
});
