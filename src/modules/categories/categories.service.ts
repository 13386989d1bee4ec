import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { DataSource, EntityManager, Not, Repository } from 'typeorm';

import { Article, Category } from '@/database/entities';
import { runInTransaction } from '@/database/transaction';
import { SlugService } from '@/modules/slugs/slug.service';
import { SluggedEntity } from '@/modules/slugs/slug.constants';
import { fieldConflict, toConflict } from '@/common/exceptions/conflict';
import { PaginationQueryDto } from '@/common/dto/pagination.dto';
import { PageLimits, resolvePage } from '@/common/utils/pagination.utils';
import { CategoryResponseDto, CreateCategoryDto, UpdateCategoryDto } from './dto/category.dto';

@Injectable()
export class CategoriesService {
  private readonly logger = new Logger(CategoriesService.name);
  private readonly pageLimits: PageLimits;

  constructor(
    @InjectRepository(Category)
    private readonly categoryRepository: Repository<Category>,
    private readonly slugService: SlugService,
    private readonly configService: ConfigService,
    private readonly dataSource: DataSource,
  ) {
    this.pageLimits = {
      defaultLimit: this.configService.get<number>('pagination.defaultLimit', 100),
      maxLimit: this.configService.get<number>('pagination.maxLimit', 100),
    };
  }

  async create(dto: CreateCategoryDto): Promise<CategoryResponseDto> {
    try {
      const category = await this.slugService.withUniqueSlug(SluggedEntity.CATEGORY, () =>
        runInTransaction(this.dataSource, async (manager) => {
          await this.assertNameFree(manager, dto.name);
          const slug = await this.slugService.resolveSlug(SluggedEntity.CATEGORY, dto.name, {
            manager,
          });

          return manager.save(
            manager.create(Category, {
              name: dto.name,
              slug,
              description: dto.description ?? null,
            }),
          );
        }),
      );

      this.logger.log(`Created category ${category.id} (${category.slug})`);
      return this.toResponseDto(category);
    } catch (error) {
      throw toConflict(error, 'category');
    }
  }

  async update(id: string, dto: UpdateCategoryDto): Promise<CategoryResponseDto> {
    try {
      const category = await this.slugService.withUniqueSlug(SluggedEntity.CATEGORY, () =>
        runInTransaction(this.dataSource, async (manager) => {
          const category = await this.requireCategory(manager, id);

          if (dto.name != null && dto.name !== category.name) {
            await this.assertNameFree(manager, dto.name, id);
            category.slug = await this.slugService.resolveSlugForUpdate(
              SluggedEntity.CATEGORY,
              id,
              category.slug,
              dto.name,
              manager,
            );
            category.name = dto.name;
          }

          if (dto.description !== undefined) {
            category.description = dto.description;
          }

          return manager.save(category);
        }),
      );

      this.logger.log(`Updated category ${id}`);
      return this.toResponseDto(category);
    } catch (error) {
      throw toConflict(error, 'category');
    }
  }

  /**
   * Deletes a category. Articles filed under it stay, uncategorized.
   */
  async remove(id: string): Promise<void> {
    await runInTransaction(this.dataSource, async (manager) => {
      await this.requireCategory(manager, id);
      await manager.update(Article, { categoryId: id }, { categoryId: null });
      await manager.delete(Category, { id });
    });

    this.logger.log(`Deleted category ${id}`);
  }

  async findOne(id: string): Promise<CategoryResponseDto> {
    const category = await this.categoryRepository.findOne({ where: { id } });
    if (!category) {
      throw new NotFoundException(`Category ${id} not found`);
    }
    return this.toResponseDto(category);
  }

  async findBySlug(slug: string): Promise<CategoryResponseDto> {
    const category = await this.categoryRepository.findOne({ where: { slug } });
    if (!category) {
      throw new NotFoundException(`Category with slug "${slug}" not found`);
    }
    return this.toResponseDto(category);
  }

  async findAll(query: PaginationQueryDto): Promise<CategoryResponseDto[]> {
    const { skip, take } = resolvePage(query, this.pageLimits);
    const categories = await this.categoryRepository.find({
      order: { name: 'ASC' },
      skip,
      take,
    });
    return categories.map((category) => this.toResponseDto(category));
  }

  private async requireCategory(manager: EntityManager, id: string): Promise<Category> {
    const category = await manager.findOne(Category, { where: { id } });
    if (!category) {
      throw new NotFoundException(`Category ${id} not found`);
    }
    return category;
  }

  private async assertNameFree(
    manager: EntityManager,
    name: string,
    excludeId?: string,
  ): Promise<void> {
    const existing = await manager.findOne(Category, {
      where: excludeId ? { name, id: Not(excludeId) } : { name },
      select: { id: true },
    });
    if (existing) {
      throw fieldConflict('category', 'name', name);
    }
  }

  private toResponseDto(category: Category): CategoryResponseDto {
    return {
      id: category.id,
      name: category.name,
      slug: category.slug,
      description: category.description,
      createdAt: category.createdAt,
      updatedAt: category.updatedAt,
    };
  }
}
