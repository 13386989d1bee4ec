import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { DataSource, EntityManager, FindOptionsWhere, In, Repository } from 'typeorm';

import { Article, ArticleStatus, ArticleTag, Category, Tag, User } from '@/database/entities';
import { runInTransaction } from '@/database/transaction';
import { SlugService } from '@/modules/slugs/slug.service';
import { SluggedEntity } from '@/modules/slugs/slug.constants';
import { uniqueIds } from '@/common/utils/validation.utils';
import { PageLimits, resolvePage } from '@/common/utils/pagination.utils';
import {
  ArticleQueryDto,
  ArticleResponseDto,
  CreateArticleDto,
  UpdateArticleDto,
} from './dto/article.dto';
import { assertCanModifyArticle, nextPublishedAt } from './article.policy';

interface ArticleWithTags {
  article: Article;
  tags: Tag[];
}

@Injectable()
export class ArticlesService {
  private readonly logger = new Logger(ArticlesService.name);
  private readonly pageLimits: PageLimits;

  constructor(
    @InjectRepository(Article)
    private readonly articleRepository: Repository<Article>,
    private readonly slugService: SlugService,
    private readonly configService: ConfigService,
    private readonly dataSource: DataSource,
  ) {
    this.pageLimits = {
      defaultLimit: this.configService.get<number>('pagination.defaultLimit', 100),
      maxLimit: this.configService.get<number>('pagination.maxLimit', 100),
    };
  }

  /**
   * Creates an article owned by `authorId` with a slug derived from its title.
   */
  async create(dto: CreateArticleDto, authorId: string): Promise<ArticleResponseDto> {
    const { article, tags } = await this.slugService.withUniqueSlug(SluggedEntity.ARTICLE, () =>
      runInTransaction(this.dataSource, async (manager) => {
        const author = await manager.findOne(User, {
          where: { id: authorId },
          select: { id: true },
        });
        if (!author) {
          throw new NotFoundException(`User ${authorId} not found`);
        }

        if (dto.categoryId) {
          await this.requireCategory(manager, dto.categoryId);
        }

        const tagIds = uniqueIds(dto.tagIds ?? []);
        const tags = await this.requireTags(manager, tagIds);
        const slug = await this.slugService.resolveSlug(SluggedEntity.ARTICLE, dto.title, {
          manager,
        });
        const status = dto.status ?? ArticleStatus.DRAFT;

        const article = manager.create(Article, {
          title: dto.title,
          slug,
          excerpt: dto.excerpt ?? null,
          contentMd: dto.contentMd ?? null,
          contentHtml: dto.contentHtml ?? null,
          status,
          authorId,
          categoryId: dto.categoryId ?? null,
          publishedAt: nextPublishedAt(null, status, new Date()),
          metadata: dto.metadata ?? {},
        });
        const saved = await manager.save(article);
        await this.insertTagLinks(manager, saved.id, tagIds);

        return { article: saved, tags };
      }),
    );

    this.logger.log(`Created article ${article.id} (${article.slug})`);
    return this.toResponseDto(article, tags);
  }

  /**
   * Partial update. When `actor` is given, authors may only touch their own
   * articles. A null title, status, metadata or tag list counts as absent;
   * a null category detaches it.
   */
  async update(id: string, dto: UpdateArticleDto, actor?: User): Promise<ArticleResponseDto> {
    const { article, tags } = await this.slugService.withUniqueSlug(SluggedEntity.ARTICLE, () =>
      runInTransaction(this.dataSource, async (manager) => {
        const article = await this.requireArticle(manager, id);
        if (actor) {
          assertCanModifyArticle(actor, article);
        }

        if (dto.title != null && dto.title !== article.title) {
          article.slug = await this.slugService.resolveSlugForUpdate(
            SluggedEntity.ARTICLE,
            article.id,
            article.slug,
            dto.title,
            manager,
          );
          article.title = dto.title;
        }

        if (dto.excerpt !== undefined) {
          article.excerpt = dto.excerpt;
        }
        if (dto.contentMd !== undefined) {
          article.contentMd = dto.contentMd;
        }
        if (dto.contentHtml !== undefined) {
          article.contentHtml = dto.contentHtml;
        }
        if (dto.metadata != null) {
          article.metadata = dto.metadata;
        }

        if (dto.categoryId === null) {
          article.categoryId = null;
        } else if (dto.categoryId !== undefined) {
          await this.requireCategory(manager, dto.categoryId);
          article.categoryId = dto.categoryId;
        }

        if (dto.status != null) {
          article.publishedAt = nextPublishedAt(article.publishedAt, dto.status, new Date());
          article.status = dto.status;
        }

        const saved = await manager.save(article);

        if (dto.tagIds == null) {
          const tagsByArticle = await this.loadTags(manager, [saved.id]);
          return { article: saved, tags: tagsByArticle.get(saved.id) ?? [] };
        }

        const tagIds = uniqueIds(dto.tagIds);
        const tags = await this.requireTags(manager, tagIds);
        await manager.delete(ArticleTag, { articleId: saved.id });
        await this.insertTagLinks(manager, saved.id, tagIds);
        return { article: saved, tags };
      }),
    );

    this.logger.log(`Updated article ${article.id}`);
    return this.toResponseDto(article, tags);
  }

  async remove(id: string, actor?: User): Promise<void> {
    await runInTransaction(this.dataSource, async (manager) => {
      const article = await this.requireArticle(manager, id);
      if (actor) {
        assertCanModifyArticle(actor, article);
      }

      await manager.delete(ArticleTag, { articleId: id });
      await manager.delete(Article, { id });
    });

    this.logger.log(`Deleted article ${id}`);
  }

  async findOne(id: string): Promise<ArticleResponseDto> {
    const article = await this.articleRepository.findOne({ where: { id } });
    if (!article) {
      throw new NotFoundException(`Article ${id} not found`);
    }
    return this.withTags(article);
  }

  async findBySlug(slug: string): Promise<ArticleResponseDto> {
    const article = await this.articleRepository.findOne({ where: { slug } });
    if (!article) {
      throw new NotFoundException(`Article with slug "${slug}" not found`);
    }
    return this.withTags(article);
  }

  /**
   * Lists articles matching every given filter, newest first.
   */
  async findAll(query: ArticleQueryDto): Promise<ArticleResponseDto[]> {
    const where: FindOptionsWhere<Article> = {};
    if (query.status) {
      where.status = query.status;
    }
    if (query.authorId) {
      where.authorId = query.authorId;
    }
    if (query.categoryId) {
      where.categoryId = query.categoryId;
    }

    const { skip, take } = resolvePage(query, this.pageLimits);
    const articles = await this.articleRepository.find({
      where,
      order: { createdAt: 'DESC' },
      skip,
      take,
    });

    const tagsByArticle = await this.loadTags(
      this.articleRepository.manager,
      articles.map((article) => article.id),
    );
    return articles.map((article) =>
      this.toResponseDto(article, tagsByArticle.get(article.id) ?? []),
    );
  }

  private async withTags(article: Article): Promise<ArticleResponseDto> {
    const tagsByArticle = await this.loadTags(this.articleRepository.manager, [article.id]);
    return this.toResponseDto(article, tagsByArticle.get(article.id) ?? []);
  }

  private async requireArticle(manager: EntityManager, id: string): Promise<Article> {
    const article = await manager.findOne(Article, { where: { id } });
    if (!article) {
      throw new NotFoundException(`Article ${id} not found`);
    }
    return article;
  }

  private async requireCategory(manager: EntityManager, id: string): Promise<void> {
    const category = await manager.findOne(Category, { where: { id }, select: { id: true } });
    if (!category) {
      throw new NotFoundException(`Category ${id} not found`);
    }
  }

  /**
   * Loads the given tags, failing with the ids that do not exist.
   */
  private async requireTags(manager: EntityManager, tagIds: string[]): Promise<Tag[]> {
    if (tagIds.length === 0) {
      return [];
    }

    const tags = await manager.find(Tag, { where: { id: In(tagIds) } });
    if (tags.length !== tagIds.length) {
      const found = new Set(tags.map((tag) => tag.id));
      const missing = tagIds.filter((tagId) => !found.has(tagId));
      throw new NotFoundException({
        message: `Tags not found: ${missing.join(', ')}`,
        error: 'Not Found',
        details: { field: 'tagIds', missing },
      });
    }

    return this.sortTags(tags);
  }

  private async insertTagLinks(
    manager: EntityManager,
    articleId: string,
    tagIds: string[],
  ): Promise<void> {
    if (tagIds.length === 0) {
      return;
    }
    await manager.insert(
      ArticleTag,
      tagIds.map((tagId) => ({ articleId, tagId })),
    );
  }

  /**
   * Tags of each article, keyed by article id. Two flat queries rather than
   * a join through the association table.
   */
  private async loadTags(
    manager: EntityManager,
    articleIds: string[],
  ): Promise<Map<string, Tag[]>> {
    const result = new Map<string, Tag[]>();
    if (articleIds.length === 0) {
      return result;
    }

    const links = await manager.find(ArticleTag, { where: { articleId: In(articleIds) } });
    if (links.length === 0) {
      return result;
    }

    const tags = await manager.find(Tag, {
      where: { id: In(uniqueIds(links.map((link) => link.tagId))) },
    });
    const tagsById = new Map(tags.map((tag) => [tag.id, tag]));

    for (const link of links) {
      const tag = tagsById.get(link.tagId);
      if (!tag) {
        continue;
      }
      const list = result.get(link.articleId) ?? [];
      list.push(tag);
      result.set(link.articleId, list);
    }

    for (const [articleId, list] of result) {
      result.set(articleId, this.sortTags(list));
    }
    return result;
  }

  private sortTags(tags: Tag[]): Tag[] {
    return [...tags].sort((a, b) => a.name.localeCompare(b.name));
  }

  private toResponseDto(article: Article, tags: Tag[]): ArticleResponseDto {
    return {
      id: article.id,
      title: article.title,
      slug: article.slug,
      excerpt: article.excerpt,
      contentMd: article.contentMd,
      contentHtml: article.contentHtml,
      status: article.status,
      authorId: article.authorId,
      categoryId: article.categoryId,
      publishedAt: article.publishedAt,
      metadata: article.metadata,
      tags: tags.map((tag) => ({ id: tag.id, name: tag.name, slug: tag.slug })),
      createdAt: article.createdAt,
      updatedAt: article.updatedAt,
    };
  }
}
