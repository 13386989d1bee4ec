import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule } from '@nestjs/config';

import { Tag } from '@/database/entities';
import { SlugsModule } from '@/modules/slugs/slugs.module';
import { TagsController } from './tags.controller';
import { TagsService } from './tags.service';

@Module({
  imports: [ConfigModule, TypeOrmModule.forFeature([Tag]), SlugsModule],
  controllers: [TagsController],
  providers: [TagsService],
})
export class TagsModule {}
