import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, RequestMethod } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import helmet from 'helmet';

import { AppModule } from './app.module';
import { toNestLogLevels } from './config/log-levels';
import { createValidationPipe } from './common/pipes/validation.pipe';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule, {
    logger: toNestLogLevels(process.env.LOG_LEVEL || 'info'),
  });

  const configService = app.get(ConfigService);

  const port = configService.get<number>('app.port', 3000);
  const nodeEnv = configService.get<string>('app.nodeEnv', 'development');
  const apiPrefix = configService.get<string>('app.apiPrefix', 'v1');

  // Security middleware
  app.use(helmet());

  const corsOrigins = configService.get<string[]>('cors.origins', ['http://localhost:3000']);
  app.enableCors({
    origin: corsOrigins,
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Actor-Id', 'X-API-Key', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
    credentials: true,
  });

  // Docs stay outside the versioned prefix
  app.setGlobalPrefix(apiPrefix, {
    exclude: [
      { path: 'api/docs', method: RequestMethod.ALL },
      { path: 'api/docs/(.*)', method: RequestMethod.ALL },
    ],
  });

  app.useGlobalPipes(createValidationPipe());

  const swaggerEnabled = configService.get<boolean>('swagger.enabled', nodeEnv !== 'production');
  if (swaggerEnabled) {
    const swaggerConfig = new DocumentBuilder()
      .setTitle('Content API')
      .setDescription(
        `
## Overview
CRUD endpoints for users, articles, categories and tags.

## Slugs
Articles, categories and tags get a URL-safe slug derived from their title or
name. Collisions are resolved by appending \`-2\`, \`-3\`, ... and a cosmetic
rename keeps the existing slug.

## Authentication
Requests are authenticated upstream by a gateway, which forwards the user id in
\`X-Actor-Id\`. When \`API_KEY\` is set, the gateway must also send \`X-API-Key\`.

## Roles
admin > editor > author > viewer. Authors manage their own articles; editors
manage every article, category and tag; admins manage users.
        `.trim(),
      )
      .setVersion('1.0')
      .addApiKey(
        {
          type: 'apiKey',
          name: 'X-API-Key',
          in: 'header',
          description: 'Shared gateway key. Set the API_KEY environment variable to enable.',
        },
        'api-key',
      )
      .addTag('Articles', 'Articles and their tags')
      .addTag('Categories', 'Article categories')
      .addTag('Tags', 'Article tags')
      .addTag('Users', 'User accounts')
      .addTag('Slugs', 'Slug previews')
      .addTag('Health', 'Health check endpoints')
      .addServer(`http://localhost:${port}`, 'Local Development')
      .build();

    const document = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup('api/docs', app, document, {
      swaggerOptions: {
        persistAuthorization: true,
        tagsSorter: 'alpha',
        operationsSorter: 'alpha',
      },
    });

    logger.log(`Swagger documentation available at http://localhost:${port}/api/docs`);
  }

  // Graceful shutdown
  app.enableShutdownHooks();

  await app.listen(port);

  logger.log(`Application is running on: http://localhost:${port}`);
  logger.log(`API endpoint: http://localhost:${port}/${apiPrefix}`);
  logger.log(`Environment: ${nodeEnv}`);
}

const bootstrapLogger = new Logger('Bootstrap');
bootstrap().catch((error: unknown) => {
  bootstrapLogger.error('Failed to start application', error instanceof Error ? error.stack : error);
  process.exit(1);
});
