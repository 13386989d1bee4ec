import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';

import { User } from '@/database/entities/user.entity';
import { ActorGuard } from './guards/actor.guard';
import { ApiKeyGuard } from './guards/api-key.guard';
import { RolesGuard } from './guards/roles.guard';

/**
 * Guards behind `@Authenticated()`, available to every feature module.
 */
@Global()
@Module({
  imports: [ConfigModule, TypeOrmModule.forFeature([User])],
  providers: [ApiKeyGuard, ActorGuard, RolesGuard],
  exports: [ApiKeyGuard, ActorGuard, RolesGuard, TypeOrmModule],
})
export class CommonModule {}
