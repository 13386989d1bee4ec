import { EntityTarget } from 'typeorm';
import {
  Article,
  Category,
  Tag,
  ARTICLE_SLUG_MAX_LENGTH,
  CATEGORY_SLUG_MAX_LENGTH,
  TAG_SLUG_MAX_LENGTH,
} from '@/database/entities';

export const SLUG_RESOLVER_OPTIONS = Symbol('SLUG_RESOLVER_OPTIONS');

export interface SlugResolverOptions {
  /** Candidates probed (`base`, `base-2`, ...) before giving up */
  maxAttempts: number;
  /** Times a resolve-and-persist unit of work is re-run after a commit-time slug clash */
  commitRetries: number;
  /** Base used when a display name has no slug-worthy characters */
  fallback: string;
}

export enum SluggedEntity {
  ARTICLE = 'article',
  CATEGORY = 'category',
  TAG = 'tag',
}

export interface SluggedRow {
  id: string;
  slug: string;
}

export interface SlugNamespace {
  target: EntityTarget<SluggedRow>;
  maxLength: number;
  uniqueIndex: string;
}

export const SLUG_NAMESPACES: Record<SluggedEntity, SlugNamespace> = {
  [SluggedEntity.ARTICLE]: {
    target: Article,
    maxLength: ARTICLE_SLUG_MAX_LENGTH,
    uniqueIndex: 'uq_articles_slug',
  },
  [SluggedEntity.CATEGORY]: {
    target: Category,
    maxLength: CATEGORY_SLUG_MAX_LENGTH,
    uniqueIndex: 'uq_categories_slug',
  },
  [SluggedEntity.TAG]: {
    target: Tag,
    maxLength: TAG_SLUG_MAX_LENGTH,
    uniqueIndex: 'uq_tags_slug',
  },
};
