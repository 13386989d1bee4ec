import { ExecutionContext, ForbiddenException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';

import { User, UserRole } from '@/database/entities/user.entity';
import { RolesGuard } from './roles.guard';

function contextFor(actor: User | undefined): ExecutionContext {
  return new ExecutionContextHost([{ actor }, {}], RolesGuard, contextFor);
}

describe('RolesGuard', () => {
  let reflector: Reflector;
  let guard: RolesGuard;

  beforeEach(() => {
    reflector = new Reflector();
    guard = new RolesGuard(reflector);
  });

  const userWithRole = (role: UserRole): User =>
    Object.assign(new User(), { id: 'u1', role, isActive: true });

  it('should allow any request when no role is required', () => {
    jest.spyOn(reflector, 'getAllAndOverride').mockReturnValue(undefined);

    expect(guard.canActivate(contextFor(undefined))).toBe(true);
  });

  it('should allow roles at or above the minimum', () => {
    jest.spyOn(reflector, 'getAllAndOverride').mockReturnValue(UserRole.EDITOR);

    expect(guard.canActivate(contextFor(userWithRole(UserRole.EDITOR)))).toBe(true);
    expect(guard.canActivate(contextFor(userWithRole(UserRole.ADMIN)))).toBe(true);
  });

  it('should reject roles below the minimum', () => {
    jest.spyOn(reflector, 'getAllAndOverride').mockReturnValue(UserRole.EDITOR);

    expect(() => guard.canActivate(contextFor(userWithRole(UserRole.AUTHOR)))).toThrow(
      ForbiddenException,
    );
    expect(() => guard.canActivate(contextFor(userWithRole(UserRole.VIEWER)))).toThrow(
      ForbiddenException,
    );
  });

  it('should reject requests without an actor', () => {
    jest.spyOn(reflector, 'getAllAndOverride').mockReturnValue(UserRole.VIEWER);

    expect(() => guard.canActivate(contextFor(undefined))).toThrow(ForbiddenException);
  });
});
