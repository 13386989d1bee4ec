import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';

import { SlugService } from './slug.service';
import { SlugsController } from './slugs.controller';
import { SLUG_RESOLVER_OPTIONS, SlugResolverOptions } from './slug.constants';

@Module({
  imports: [ConfigModule],
  controllers: [SlugsController],
  providers: [
    {
      provide: SLUG_RESOLVER_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): SlugResolverOptions => ({
        maxAttempts: configService.get<number>('slug.maxAttempts', 50),
        commitRetries: configService.get<number>('slug.commitRetries', 3),
        fallback: 'untitled',
      }),
    },
    SlugService,
  ],
  exports: [SlugService],
})
export class SlugsModule {}
