import { Entity, PrimaryColumn, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Article } from './article.entity';
import { Tag } from './tag.entity';

/**
 * Association row between an article and a tag. The pair is the identity;
 * rows are replaced wholesale when an article's tag list changes.
 */
@Entity('article_tags')
export class ArticleTag {
  @PrimaryColumn({ name: 'article_id', type: 'uuid' })
  articleId!: string;

  @PrimaryColumn({ name: 'tag_id', type: 'uuid' })
  @Index('idx_article_tags_tag_id')
  tagId!: string;

  @ManyToOne(() => Article, (article) => article.articleTags, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'article_id' })
  article!: Article;

  @ManyToOne(() => Tag, (tag) => tag.articleTags, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'tag_id' })
  tag!: Tag;
}
