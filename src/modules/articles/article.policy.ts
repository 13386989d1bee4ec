import { ForbiddenException } from '@nestjs/common';

import { Article, ArticleStatus } from '@/database/entities/article.entity';
import { User, UserRole } from '@/database/entities/user.entity';
import { hasRole } from '@/common/utils/roles.utils';

/**
 * `published_at` after moving to `status`. Set on the first transition into
 * published and never overwritten, so unpublishing and republishing keeps
 * the original date.
 */
export function nextPublishedAt(
  current: Date | null,
  status: ArticleStatus,
  now: Date,
): Date | null {
  if (current) {
    return current;
  }
  return status === ArticleStatus.PUBLISHED ? now : null;
}

/**
 * Editors and admins may change any article; authors only their own.
 */
export function canModifyArticle(actor: User, article: Pick<Article, 'authorId'>): boolean {
  return hasRole(actor.role, UserRole.EDITOR) || article.authorId === actor.id;
}

export function assertCanModifyArticle(actor: User, article: Article): void {
  if (!canModifyArticle(actor, article)) {
    throw new ForbiddenException('Authors can only modify their own articles');
  }
}
