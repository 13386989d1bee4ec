import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { ConflictException, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';

import { Article, RefreshToken, User, UserRole } from '@/database/entities';
import { ReferentialViolationException } from '@/common/exceptions/referential-violation.exception';
import { UsersService } from './users.service';
import { PASSWORD_HASHER } from './password-hasher';

describe('UsersService', () => {
  let service: UsersService;
  let manager: {
    findOne: jest.Mock;
    create: jest.Mock;
    save: jest.Mock;
    delete: jest.Mock;
  };
  let queryRunner: {
    connect: jest.Mock;
    startTransaction: jest.Mock;
    commitTransaction: jest.Mock;
    rollbackTransaction: jest.Mock;
    release: jest.Mock;
    manager: typeof manager;
  };
  let passwordHasher: { hash: jest.Mock };

  const createdAt = new Date('2024-01-01T00:00:00Z');

  const existingUser = (): Partial<User> => ({
    id: 'u1',
    username: 'jane',
    email: 'jane@example.com',
    passwordHash: 'scrypt$old',
    role: UserRole.AUTHOR,
    isActive: true,
    createdAt,
    updatedAt: createdAt,
  });

  beforeEach(async () => {
    manager = {
      findOne: jest.fn().mockResolvedValue(null),
      create: jest.fn().mockImplementation((_target: unknown, data: Partial<User>) => data),
      save: jest.fn().mockImplementation(async (entity: Partial<User>) => ({
        id: 'u1',
        createdAt,
        updatedAt: createdAt,
        ...entity,
      })),
      delete: jest.fn(),
    };

    queryRunner = {
      connect: jest.fn(),
      startTransaction: jest.fn(),
      commitTransaction: jest.fn(),
      rollbackTransaction: jest.fn(),
      release: jest.fn(),
      manager,
    };

    passwordHasher = {
      hash: jest.fn().mockResolvedValue('scrypt$new'),
    };

    const mockConfigService = {
      get: jest.fn().mockImplementation((_key: string, defaultValue?: unknown) => defaultValue),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UsersService,
        { provide: getRepositoryToken(User), useValue: { findOne: jest.fn(), find: jest.fn() } },
        { provide: PASSWORD_HASHER, useValue: passwordHasher },
        { provide: ConfigService, useValue: mockConfigService },
        {
          provide: DataSource,
          useValue: { createQueryRunner: jest.fn().mockReturnValue(queryRunner) },
        },
      ],
    }).compile();

    service = module.get<UsersService>(UsersService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('create', () => {
    it('should store the hashed password and never return it', async () => {
      const result = await service.create({
        username: 'jane',
        email: 'jane@example.com',
        password: 'test-password',
      });

      expect(passwordHasher.hash).toHaveBeenCalledWith('test-password');
      expect(manager.create).toHaveBeenCalledWith(User, {
        username: 'jane',
        email: 'jane@example.com',
        passwordHash: 'scrypt$new',
        role: UserRole.AUTHOR,
        isActive: true,
      });
      expect(result).toEqual({
        id: 'u1',
        username: 'jane',
        email: 'jane@example.com',
        role: UserRole.AUTHOR,
        isActive: true,
        createdAt,
        updatedAt: createdAt,
      });
    });

    it('should refuse a taken email without writing', async () => {
      // username free, email taken
      manager.findOne.mockResolvedValueOnce(null).mockResolvedValueOnce({ id: 'u9' });

      const error = await service
        .create({ username: 'jane', email: 'jane@example.com', password: 'test-password' })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ConflictException);
      expect(error instanceof ConflictException && error.getResponse()).toEqual({
        message: 'A user with this email already exists',
        error: 'Conflict',
        details: { field: 'email', value: 'jane@example.com' },
      });
      expect(manager.save).not.toHaveBeenCalled();
      expect(queryRunner.rollbackTransaction).toHaveBeenCalled();
    });
  });

  describe('update', () => {
    it('should re-hash a changed password', async () => {
      manager.findOne.mockResolvedValueOnce(existingUser());

      await service.update('u1', { password: 'new-test-password' });

      expect(passwordHasher.hash).toHaveBeenCalledWith('new-test-password');
      expect(manager.save).toHaveBeenCalledWith(
        expect.objectContaining({ passwordHash: 'scrypt$new' }),
      );
    });

    it('should not check uniqueness for unchanged values', async () => {
      manager.findOne.mockResolvedValueOnce(existingUser());

      await service.update('u1', { username: 'jane', role: UserRole.EDITOR });

      expect(manager.findOne).toHaveBeenCalledTimes(1);
      expect(manager.save).toHaveBeenCalledWith(expect.objectContaining({ role: UserRole.EDITOR }));
    });
  });

  describe('remove', () => {
    it('should refuse to delete a user who authors articles', async () => {
      manager.findOne.mockResolvedValueOnce(existingUser()).mockResolvedValueOnce({ id: 'a1' });

      await expect(service.remove('u1')).rejects.toBeInstanceOf(ReferentialViolationException);
      expect(manager.delete).not.toHaveBeenCalled();
      expect(queryRunner.rollbackTransaction).toHaveBeenCalled();
    });

    it('should delete refresh tokens before the user', async () => {
      manager.findOne.mockResolvedValueOnce(existingUser()).mockResolvedValueOnce(null);

      await service.remove('u1');

      expect(manager.findOne).toHaveBeenNthCalledWith(2, Article, {
        where: { authorId: 'u1' },
        select: { id: true },
      });
      expect(manager.delete).toHaveBeenNthCalledWith(1, RefreshToken, { userId: 'u1' });
      expect(manager.delete).toHaveBeenNthCalledWith(2, User, { id: 'u1' });
      expect(queryRunner.commitTransaction).toHaveBeenCalled();
    });

    it('should return 404 for an unknown user', async () => {
      await expect(service.remove('missing')).rejects.toBeInstanceOf(NotFoundException);
    });
  });
});
