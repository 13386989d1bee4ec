import { UserRole } from '@/database/entities/user.entity';

const ROLE_RANK: Record<UserRole, number> = {
  [UserRole.VIEWER]: 0,
  [UserRole.AUTHOR]: 1,
  [UserRole.EDITOR]: 2,
  [UserRole.ADMIN]: 3,
};

/**
 * Roles are ordered admin > editor > author > viewer; a role satisfies every
 * requirement at or below its own rank.
 */
export function hasRole(role: UserRole, minimum: UserRole): boolean {
  return ROLE_RANK[role] >= ROLE_RANK[minimum];
}
