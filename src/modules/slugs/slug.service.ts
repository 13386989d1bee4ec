import { ConflictException, Inject, Injectable, Logger } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';

import { getUniqueViolation, isViolationOf } from '@/database/database-errors';
import {
  SLUG_NAMESPACES,
  SLUG_RESOLVER_OPTIONS,
  SlugResolverOptions,
  SluggedEntity,
} from './slug.constants';
import { slugify, slugMatchesBase, truncateSlug, withSuffix } from './slug.utils';

export interface ResolveSlugOptions {
  /** Row being updated; a slug held by this row counts as free */
  excludeId?: string;
  /** Manager of the surrounding transaction, if any */
  manager?: EntityManager;
}

/**
 * Derives URL-safe slugs and keeps them unique within each entity type.
 *
 * Probing is first-fit (`base`, `base-2`, `base-3`, ...). The probe and the
 * insert are not atomic, so callers wrap the whole resolve-and-persist step
 * in {@link SlugService.withUniqueSlug}, which re-runs it when the unique
 * index rejects the slug at commit time.
 */
@Injectable()
export class SlugService {
  private readonly logger = new Logger(SlugService.name);

  constructor(
    private readonly dataSource: DataSource,
    @Inject(SLUG_RESOLVER_OPTIONS)
    private readonly options: SlugResolverOptions,
  ) {}

  /**
   * Normalized base slug for a display name, before any collision suffix
   */
  baseSlug(entity: SluggedEntity, displayName: string): string {
    const { maxLength } = SLUG_NAMESPACES[entity];
    return slugify(displayName, maxLength) || truncateSlug(this.options.fallback, maxLength);
  }

  async resolveSlug(
    entity: SluggedEntity,
    displayName: string,
    options: ResolveSlugOptions = {},
  ): Promise<string> {
    const { target, maxLength } = SLUG_NAMESPACES[entity];
    const manager = options.manager ?? this.dataSource.manager;
    const base = this.baseSlug(entity, displayName);

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      const candidate = withSuffix(base, attempt, maxLength);
      const existing = await manager.findOne(target, {
        where: { slug: candidate },
        select: { id: true, slug: true },
      });

      if (!existing || existing.id === options.excludeId) {
        return candidate;
      }
    }

    this.logger.warn(
      `No free ${entity} slug for base "${base}" after ${this.options.maxAttempts} attempts`,
    );
    throw new ConflictException({
      message: `Could not find a free ${entity} slug for "${base}"`,
      error: 'Conflict',
      details: { field: 'slug', value: base, attempts: this.options.maxAttempts },
    });
  }

  /**
   * Slug for a row whose display name changed. The current slug is kept
   * when it already derives from the new name's base, so cosmetic edits
   * ("Hello World" to "hello   world") do not churn URLs.
   */
  async resolveSlugForUpdate(
    entity: SluggedEntity,
    id: string,
    currentSlug: string,
    displayName: string,
    manager?: EntityManager,
  ): Promise<string> {
    const { maxLength } = SLUG_NAMESPACES[entity];
    const base = this.baseSlug(entity, displayName);

    if (slugMatchesBase(currentSlug, base, maxLength)) {
      return currentSlug;
    }

    return this.resolveSlug(entity, displayName, { excludeId: id, manager });
  }

  /**
   * Runs a resolve-and-persist unit of work, re-running it when a concurrent
   * writer took the same slug between the probe and the commit.
   */
  async withUniqueSlug<T>(entity: SluggedEntity, work: () => Promise<T>): Promise<T> {
    const { uniqueIndex } = SLUG_NAMESPACES[entity];

    for (let attempt = 1; ; attempt++) {
      try {
        return await work();
      } catch (error) {
        const violation = getUniqueViolation(error);
        if (!violation || !isViolationOf(violation, uniqueIndex, 'slug')) {
          throw error;
        }

        if (attempt >= this.options.commitRetries) {
          this.logger.warn(
            `Giving up on ${entity} slug after ${attempt} commit-time collisions`,
          );
          throw new ConflictException({
            message: `The ${entity} slug is already in use`,
            error: 'Conflict',
            details: { field: 'slug', value: violation.value, attempts: attempt },
          });
        }

        this.logger.debug(
          `Slug collision on ${entity} at commit (attempt ${attempt}), retrying`,
        );
      }
    }
  }
}
