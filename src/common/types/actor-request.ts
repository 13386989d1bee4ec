import { Request } from 'express';
import { User } from '@/database/entities/user.entity';

export const ACTOR_ID_HEADER = 'x-actor-id';
export const API_KEY_HEADER = 'x-api-key';

/**
 * Express request after {@link ActorGuard} has resolved the calling user
 */
export interface ActorRequest extends Request {
  actor?: User;
}
