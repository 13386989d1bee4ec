import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';

import { UserRole } from '@/database/entities/user.entity';
import { ActorRequest } from '@/common/types/actor-request';
import { MIN_ROLE_KEY } from '@/common/decorators/roles.decorator';
import { hasRole } from '@/common/utils/roles.utils';

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const minimum = this.reflector.getAllAndOverride<UserRole | undefined>(MIN_ROLE_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    if (!minimum) {
      return true;
    }

    const { actor } = context.switchToHttp().getRequest<ActorRequest>();
    if (!actor || !hasRole(actor.role, minimum)) {
      throw new ForbiddenException(`Requires role ${minimum} or higher`);
    }

    return true;
  }
}
