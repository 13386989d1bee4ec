import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';

import { User } from '@/database/entities/user.entity';
import { ACTOR_ID_HEADER, ActorRequest } from '@/common/types/actor-request';
import { isValidUUID } from '@/common/utils/validation.utils';

/**
 * Resolves the user the gateway authenticated (forwarded as `X-Actor-Id`)
 * and attaches it to the request.
 */
@Injectable()
export class ActorGuard implements CanActivate {
  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<ActorRequest>();
    const actorId = request.headers[ACTOR_ID_HEADER];

    if (typeof actorId !== 'string' || !isValidUUID(actorId)) {
      throw new UnauthorizedException('Authentication required');
    }

    const actor = await this.userRepository.findOne({ where: { id: actorId } });
    if (!actor) {
      throw new UnauthorizedException('Authentication required');
    }

    if (!actor.isActive) {
      throw new ForbiddenException('Inactive user');
    }

    request.actor = actor;
    return true;
  }
}
