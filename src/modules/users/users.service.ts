import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { DataSource, EntityManager, Not, Repository } from 'typeorm';

import { Article, RefreshToken, User, UserRole } from '@/database/entities';
import { runInTransaction } from '@/database/transaction';
import { fieldConflict, toConflict } from '@/common/exceptions/conflict';
import { ReferentialViolationException } from '@/common/exceptions/referential-violation.exception';
import { PaginationQueryDto } from '@/common/dto/pagination.dto';
import { PageLimits, resolvePage } from '@/common/utils/pagination.utils';
import { PASSWORD_HASHER, PasswordHasher } from './password-hasher';
import { CreateUserDto, UpdateUserDto, UserResponseDto } from './dto/user.dto';

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);
  private readonly pageLimits: PageLimits;

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    @Inject(PASSWORD_HASHER)
    private readonly passwordHasher: PasswordHasher,
    private readonly configService: ConfigService,
    private readonly dataSource: DataSource,
  ) {
    this.pageLimits = {
      defaultLimit: this.configService.get<number>('pagination.defaultLimit', 100),
      maxLimit: this.configService.get<number>('pagination.maxLimit', 100),
    };
  }

  /**
   * Creates a user. A taken username or email fails with a conflict before
   * anything is written.
   */
  async create(dto: CreateUserDto): Promise<UserResponseDto> {
    const passwordHash = await this.passwordHasher.hash(dto.password);

    try {
      const user = await runInTransaction(this.dataSource, async (manager) => {
        await this.assertIdentityFree(manager, dto.username, dto.email);

        return manager.save(
          manager.create(User, {
            username: dto.username,
            email: dto.email,
            passwordHash,
            role: dto.role ?? UserRole.AUTHOR,
            isActive: dto.isActive ?? true,
          }),
        );
      });

      this.logger.log(`Created user ${user.id} (${user.role})`);
      return this.toResponseDto(user);
    } catch (error) {
      throw toConflict(error, 'user');
    }
  }

  async update(id: string, dto: UpdateUserDto): Promise<UserResponseDto> {
    const passwordHash =
      dto.password != null ? await this.passwordHasher.hash(dto.password) : undefined;

    try {
      const user = await runInTransaction(this.dataSource, async (manager) => {
        const user = await this.requireUser(manager, id);

        const username = dto.username != null && dto.username !== user.username
          ? dto.username
          : undefined;
        const email = dto.email != null && dto.email !== user.email ? dto.email : undefined;
        await this.assertIdentityFree(manager, username, email, id);

        if (username !== undefined) {
          user.username = username;
        }
        if (email !== undefined) {
          user.email = email;
        }
        if (passwordHash !== undefined) {
          user.passwordHash = passwordHash;
        }
        if (dto.role != null) {
          user.role = dto.role;
        }
        if (dto.isActive != null) {
          user.isActive = dto.isActive;
        }

        return manager.save(user);
      });

      this.logger.log(`Updated user ${id}`);
      return this.toResponseDto(user);
    } catch (error) {
      throw toConflict(error, 'user');
    }
  }

  /**
   * Deletes a user and their refresh tokens. Refused while the user still
   * authors articles.
   */
  async remove(id: string): Promise<void> {
    await runInTransaction(this.dataSource, async (manager) => {
      await this.requireUser(manager, id);

      const authored = await manager.findOne(Article, {
        where: { authorId: id },
        select: { id: true },
      });
      if (authored) {
        throw new ReferentialViolationException('user', id, 'articles');
      }

      await manager.delete(RefreshToken, { userId: id });
      await manager.delete(User, { id });
    });

    this.logger.log(`Deleted user ${id}`);
  }

  async findOne(id: string): Promise<UserResponseDto> {
    const user = await this.userRepository.findOne({ where: { id } });
    if (!user) {
      throw new NotFoundException(`User ${id} not found`);
    }
    return this.toResponseDto(user);
  }

  async findAll(query: PaginationQueryDto): Promise<UserResponseDto[]> {
    const { skip, take } = resolvePage(query, this.pageLimits);
    const users = await this.userRepository.find({ order: { username: 'ASC' }, skip, take });
    return users.map((user) => this.toResponseDto(user));
  }

  private async requireUser(manager: EntityManager, id: string): Promise<User> {
    const user = await manager.findOne(User, { where: { id } });
    if (!user) {
      throw new NotFoundException(`User ${id} not found`);
    }
    return user;
  }

  private async assertIdentityFree(
    manager: EntityManager,
    username: string | undefined,
    email: string | undefined,
    excludeId?: string,
  ): Promise<void> {
    const notSelf = excludeId ? { id: Not(excludeId) } : {};

    if (username !== undefined) {
      const existing = await manager.findOne(User, {
        where: { username, ...notSelf },
        select: { id: true },
      });
      if (existing) {
        throw fieldConflict('user', 'username', username);
      }
    }

    if (email !== undefined) {
      const existing = await manager.findOne(User, {
        where: { email, ...notSelf },
        select: { id: true },
      });
      if (existing) {
        throw fieldConflict('user', 'email', email);
      }
    }
  }

  private toResponseDto(user: User): UserResponseDto {
    return {
      id: user.id,
      username: user.username,
      email: user.email,
      role: user.role,
      isActive: user.isActive,
      createdAt: user.createdAt,
      updatedAt: user.updatedAt,
    };
  }
}
