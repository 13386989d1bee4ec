export * from './user.entity';
export * from './category.entity';
export * from './tag.entity';
export * from './article.entity';
export * from './article-tag.entity';
export * from './refresh-token.entity';

import { User } from './user.entity';
import { Category } from './category.entity';
import { Tag } from './tag.entity';
import { Article } from './article.entity';
import { ArticleTag } from './article-tag.entity';
import { RefreshToken } from './refresh-token.entity';

export const ENTITIES = [User, Category, Tag, Article, ArticleTag, RefreshToken];
