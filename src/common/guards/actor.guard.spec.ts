import { ForbiddenException, UnauthorizedException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';

import { User, UserRole } from '@/database/entities/user.entity';
import { ActorGuard } from './actor.guard';

describe('ActorGuard', () => {
  let guard: ActorGuard;
  let findOne: jest.Mock;

  const actorId = '550e8400-e29b-41d4-a716-446655440000';

  const requestWith = (headers: Record<string, string>): { headers: Record<string, string>; actor?: User } => ({
    headers,
  });

  beforeEach(async () => {
    findOne = jest.fn();

    const module: TestingModule = await Test.createTestingModule({
      providers: [ActorGuard, { provide: getRepositoryToken(User), useValue: { findOne } }],
    }).compile();

    guard = module.get<ActorGuard>(ActorGuard);
  });

  it('should attach the active user named by X-Actor-Id', async () => {
    const user = Object.assign(new User(), { id: actorId, role: UserRole.AUTHOR, isActive: true });
    findOne.mockResolvedValueOnce(user);
    const request = requestWith({ 'x-actor-id': actorId });

    await expect(guard.canActivate(new ExecutionContextHost([request, {}]))).resolves.toBe(true);
    expect(request.actor).toBe(user);
    expect(findOne).toHaveBeenCalledWith({ where: { id: actorId } });
  });

  it('should reject a missing or malformed header', async () => {
    await expect(
      guard.canActivate(new ExecutionContextHost([requestWith({}), {}])),
    ).rejects.toBeInstanceOf(UnauthorizedException);
    await expect(
      guard.canActivate(new ExecutionContextHost([requestWith({ 'x-actor-id': 'nope' }), {}])),
    ).rejects.toBeInstanceOf(UnauthorizedException);
    expect(findOne).not.toHaveBeenCalled();
  });

  it('should reject an unknown user', async () => {
    findOne.mockResolvedValueOnce(null);

    await expect(
      guard.canActivate(new ExecutionContextHost([requestWith({ 'x-actor-id': actorId }), {}])),
    ).rejects.toBeInstanceOf(UnauthorizedException);
  });

  it('should forbid an inactive user', async () => {
    findOne.mockResolvedValueOnce(
      Object.assign(new User(), { id: actorId, role: UserRole.ADMIN, isActive: false }),
    );

    await expect(
      guard.canActivate(new ExecutionContextHost([requestWith({ 'x-actor-id': actorId }), {}])),
    ).rejects.toBeInstanceOf(ForbiddenException);
  });
});
