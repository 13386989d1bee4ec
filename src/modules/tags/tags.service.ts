import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { DataSource, EntityManager, Not, Repository } from 'typeorm';

import { ArticleTag, Tag } from '@/database/entities';
import { runInTransaction } from '@/database/transaction';
import { SlugService } from '@/modules/slugs/slug.service';
import { SluggedEntity } from '@/modules/slugs/slug.constants';
import { fieldConflict, toConflict } from '@/common/exceptions/conflict';
import { PaginationQueryDto } from '@/common/dto/pagination.dto';
import { PageLimits, resolvePage } from '@/common/utils/pagination.utils';
import { CreateTagDto, TagResponseDto, UpdateTagDto } from './dto/tag.dto';

@Injectable()
export class TagsService {
  private readonly logger = new Logger(TagsService.name);
  private readonly pageLimits: PageLimits;

  constructor(
    @InjectRepository(Tag)
    private readonly tagRepository: Repository<Tag>,
    private readonly slugService: SlugService,
    private readonly configService: ConfigService,
    private readonly dataSource: DataSource,
  ) {
    this.pageLimits = {
      defaultLimit: this.configService.get<number>('pagination.defaultLimit', 100),
      maxLimit: this.configService.get<number>('pagination.maxLimit', 100),
    };
  }

  async create(dto: CreateTagDto): Promise<TagResponseDto> {
    try {
      const tag = await this.slugService.withUniqueSlug(SluggedEntity.TAG, () =>
        runInTransaction(this.dataSource, async (manager) => {
          await this.assertNameFree(manager, dto.name);
          const slug = await this.slugService.resolveSlug(SluggedEntity.TAG, dto.name, {
            manager,
          });
          return manager.save(manager.create(Tag, { name: dto.name, slug }));
        }),
      );

      this.logger.log(`Created tag ${tag.id} (${tag.slug})`);
      return this.toResponseDto(tag);
    } catch (error) {
      throw toConflict(error, 'tag');
    }
  }

  async update(id: string, dto: UpdateTagDto): Promise<TagResponseDto> {
    try {
      const tag = await this.slugService.withUniqueSlug(SluggedEntity.TAG, () =>
        runInTransaction(this.dataSource, async (manager) => {
          const tag = await this.requireTag(manager, id);

          if (dto.name != null && dto.name !== tag.name) {
            await this.assertNameFree(manager, dto.name, id);
            tag.slug = await this.slugService.resolveSlugForUpdate(
              SluggedEntity.TAG,
              id,
              tag.slug,
              dto.name,
              manager,
            );
            tag.name = dto.name;
          }

          return manager.save(tag);
        }),
      );

      this.logger.log(`Updated tag ${id}`);
      return this.toResponseDto(tag);
    } catch (error) {
      throw toConflict(error, 'tag');
    }
  }

  /**
   * Deletes a tag and its article links. The articles themselves are kept.
   */
  async remove(id: string): Promise<void> {
    await runInTransaction(this.dataSource, async (manager) => {
      await this.requireTag(manager, id);
      await manager.delete(ArticleTag, { tagId: id });
      await manager.delete(Tag, { id });
    });

    this.logger.log(`Deleted tag ${id}`);
  }

  async findOne(id: string): Promise<TagResponseDto> {
    const tag = await this.tagRepository.findOne({ where: { id } });
    if (!tag) {
      throw new NotFoundException(`Tag ${id} not found`);
    }
    return this.toResponseDto(tag);
  }

  async findBySlug(slug: string): Promise<TagResponseDto> {
    const tag = await this.tagRepository.findOne({ where: { slug } });
    if (!tag) {
      throw new NotFoundException(`Tag with slug "${slug}" not found`);
    }
    return this.toResponseDto(tag);
  }

  async findAll(query: PaginationQueryDto): Promise<TagResponseDto[]> {
    const { skip, take } = resolvePage(query, this.pageLimits);
    const tags = await this.tagRepository.find({ order: { name: 'ASC' }, skip, take });
    return tags.map((tag) => this.toResponseDto(tag));
  }

  private async requireTag(manager: EntityManager, id: string): Promise<Tag> {
    const tag = await manager.findOne(Tag, { where: { id } });
    if (!tag) {
      throw new NotFoundException(`Tag ${id} not found`);
    }
    return tag;
  }

  private async assertNameFree(
    manager: EntityManager,
    name: string,
    excludeId?: string,
  ): Promise<void> {
    const existing = await manager.findOne(Tag, {
      where: excludeId ? { name, id: Not(excludeId) } : { name },
      select: { id: true },
    });
    if (existing) {
      throw fieldConflict('tag', 'name', name);
    }
  }

  private toResponseDto(tag: Tag): TagResponseDto {
    return {
      id: tag.id,
      name: tag.name,
      slug: tag.slug,
      createdAt: tag.createdAt,
      updatedAt: tag.updatedAt,
    };
  }
}
