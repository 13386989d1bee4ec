import { Test, TestingModule } from '@nestjs/testing';
import { ConflictException } from '@nestjs/common';
import { DataSource, QueryFailedError } from 'typeorm';

import { Article } from '@/database/entities';
import { SlugService } from './slug.service';
import { SLUG_RESOLVER_OPTIONS, SluggedEntity } from './slug.constants';

function uniqueViolation(constraint: string, column: string, value: string): QueryFailedError {
  const driverError = Object.assign(
    new Error(`duplicate key value violates unique constraint "${constraint}"`),
    {
      code: '23505',
      constraint,
      detail: `Key (${column})=(${value}) already exists.`,
    },
  );
  return new QueryFailedError('INSERT INTO ...', [], driverError);
}

describe('SlugService', () => {
  let service: SlugService;
  let findOne: jest.Mock;

  beforeEach(async () => {
    findOne = jest.fn().mockResolvedValue(null);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SlugService,
        {
          provide: DataSource,
          useValue: { manager: { findOne } },
        },
        {
          provide: SLUG_RESOLVER_OPTIONS,
          useValue: { maxAttempts: 3, commitRetries: 3, fallback: 'untitled' },
        },
      ],
    }).compile();

    service = module.get<SlugService>(SlugService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('resolveSlug', () => {
    it('should return the base when it is free', async () => {
      await expect(service.resolveSlug(SluggedEntity.ARTICLE, 'Hello World')).resolves.toBe(
        'hello-world',
      );

      expect(findOne).toHaveBeenCalledTimes(1);
      expect(findOne).toHaveBeenCalledWith(Article, {
        where: { slug: 'hello-world' },
        select: { id: true, slug: true },
      });
    });

    it('should take the first free suffix', async () => {
      findOne
        .mockResolvedValueOnce({ id: 'a1', slug: 'hello-world' })
        .mockResolvedValueOnce({ id: 'a2', slug: 'hello-world-2' })
        .mockResolvedValueOnce(null);

      await expect(service.resolveSlug(SluggedEntity.ARTICLE, 'Hello World')).resolves.toBe(
        'hello-world-3',
      );
      expect(findOne).toHaveBeenCalledTimes(3);
    });

    it('should treat a slug held by the excluded row as free', async () => {
      findOne.mockResolvedValueOnce({ id: 'self', slug: 'hello-world' });

      await expect(
        service.resolveSlug(SluggedEntity.ARTICLE, 'Hello World', { excludeId: 'self' }),
      ).resolves.toBe('hello-world');
    });

    it('should fall back when the name has no slug-worthy characters', async () => {
      await expect(service.resolveSlug(SluggedEntity.TAG, '!!!')).resolves.toBe('untitled');
    });

    it('should raise a conflict once every candidate is taken', async () => {
      findOne.mockResolvedValue({ id: 'other', slug: 'taken' });

      await expect(service.resolveSlug(SluggedEntity.CATEGORY, 'News')).rejects.toBeInstanceOf(
        ConflictException,
      );
      expect(findOne).toHaveBeenCalledTimes(3);
    });
  });

  describe('resolveSlugForUpdate', () => {
    it('should keep the current slug for a cosmetic rename', async () => {
      const slug = await service.resolveSlugForUpdate(
        SluggedEntity.ARTICLE,
        'a1',
        'hello-world-2',
        'Hello   World!',
      );

      expect(slug).toBe('hello-world-2');
      expect(findOne).not.toHaveBeenCalled();
    });

    it('should resolve a new slug when the base changes', async () => {
      const slug = await service.resolveSlugForUpdate(
        SluggedEntity.ARTICLE,
        'a1',
        'hello-world',
        'Goodbye World',
      );

      expect(slug).toBe('goodbye-world');
      expect(findOne).toHaveBeenCalledTimes(1);
    });
  });

  describe('withUniqueSlug', () => {
    it('should re-run the work after a slug collision at commit', async () => {
      const work = jest
        .fn()
        .mockRejectedValueOnce(uniqueViolation('uq_articles_slug', 'slug', 'hello-world'))
        .mockResolvedValueOnce('saved');

      await expect(service.withUniqueSlug(SluggedEntity.ARTICLE, work)).resolves.toBe('saved');
      expect(work).toHaveBeenCalledTimes(2);
    });

    it('should give up with a conflict after the configured retries', async () => {
      const work = jest
        .fn()
        .mockRejectedValue(uniqueViolation('uq_articles_slug', 'slug', 'hello-world'));

      await expect(service.withUniqueSlug(SluggedEntity.ARTICLE, work)).rejects.toBeInstanceOf(
        ConflictException,
      );
      expect(work).toHaveBeenCalledTimes(3);
    });

    it('should not retry violations of other indexes', async () => {
      const error = uniqueViolation('uq_categories_name', 'name', 'News');
      const work = jest.fn().mockRejectedValue(error);

      await expect(service.withUniqueSlug(SluggedEntity.CATEGORY, work)).rejects.toBe(error);
      expect(work).toHaveBeenCalledTimes(1);
    });

    it('should retry a slug collision reported under another index name', async () => {
      const work = jest
        .fn()
        .mockRejectedValueOnce(uniqueViolation('articles_pkey', 'slug', 'hello-world'))
        .mockResolvedValueOnce('saved');

      await expect(service.withUniqueSlug(SluggedEntity.ARTICLE, work)).resolves.toBe('saved');
      expect(work).toHaveBeenCalledTimes(2);
    });

    it('should pass other errors through', async () => {
      const error = new Error('connection lost');
      const work = jest.fn().mockRejectedValue(error);

      await expect(service.withUniqueSlug(SluggedEntity.TAG, work)).rejects.toBe(error);
      expect(work).toHaveBeenCalledTimes(1);
    });
  });
});
