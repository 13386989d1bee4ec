import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule } from '@nestjs/config';

import { User } from '@/database/entities';
import { UsersController } from './users.controller';
import { UsersService } from './users.service';
import { PASSWORD_HASHER, ScryptPasswordHasher } from './password-hasher';

@Module({
  imports: [ConfigModule, TypeOrmModule.forFeature([User])],
  controllers: [UsersController],
  providers: [UsersService, { provide: PASSWORD_HASHER, useClass: ScryptPasswordHasher }],
  exports: [UsersService],
})
export class UsersModule {}
