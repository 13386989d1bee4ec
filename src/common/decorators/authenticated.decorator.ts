import { applyDecorators, UseGuards } from '@nestjs/common';
import { ApiForbiddenResponse, ApiHeader, ApiUnauthorizedResponse } from '@nestjs/swagger';

import { UserRole } from '@/database/entities/user.entity';
import { ApiKeyGuard } from '@/common/guards/api-key.guard';
import { ActorGuard } from '@/common/guards/actor.guard';
import { RolesGuard } from '@/common/guards/roles.guard';
import { MinRole } from './roles.decorator';

/**
 * Requires a gateway-authenticated, active user holding at least `role`.
 *
 * Usage:
 * ```typescript
 * @Post()
 * @Authenticated(UserRole.EDITOR)
 * async create(@CurrentUser() actor: User) { ... }
 * ```
 */
export function Authenticated(role: UserRole = UserRole.VIEWER) {
  return applyDecorators(
    MinRole(role),
    UseGuards(ApiKeyGuard, ActorGuard, RolesGuard),
    ApiHeader({
      name: 'X-Actor-Id',
      description: 'Id of the user authenticated by the gateway',
      required: true,
    }),
    ApiUnauthorizedResponse({ description: 'Missing or unknown actor' }),
    ApiForbiddenResponse({ description: `Inactive user or role below ${role}` }),
  );
}
