import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { User } from '@/database/entities/user.entity';
import { ActorRequest } from '@/common/types/actor-request';

/**
 * Parameter decorator for the user resolved by `ActorGuard`. Only valid on
 * handlers guarded with `@Authenticated()`.
 */
export const CurrentUser = createParamDecorator((_data: unknown, ctx: ExecutionContext): User => {
  const { actor } = ctx.switchToHttp().getRequest<ActorRequest>();
  if (!actor) {
    throw new UnauthorizedException('Authentication required');
  }
  return actor;
});
