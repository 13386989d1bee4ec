import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  OneToMany,
  JoinColumn,
  Index,
} from 'typeorm';
import { User } from './user.entity';
import { Category } from './category.entity';

export enum ArticleStatus {
  DRAFT = 'draft',
  PUBLISHED = 'published',
  ARCHIVED = 'archived',
}

export const ARTICLE_TITLE_MAX_LENGTH = 160;
export const ARTICLE_SLUG_MAX_LENGTH = 180;

export type ArticleMetadata = Record<string, unknown>;

@Entity('articles')
@Index('idx_articles_status_published_at', ['status', 'publishedAt'])
export class Article {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: ARTICLE_TITLE_MAX_LENGTH })
  title!: string;

  @Column({ type: 'varchar', length: ARTICLE_SLUG_MAX_LENGTH })
  @Index('uq_articles_slug', { unique: true })
  slug!: string;

  @Column({ type: 'text', nullable: true })
  excerpt!: string | null;

  @Column({ name: 'content_md', type: 'text', nullable: true })
  contentMd!: string | null;

  @Column({ name: 'content_html', type: 'text', nullable: true })
  contentHtml!: string | null;

  @Column({ type: 'varchar', length: 16, default: ArticleStatus.DRAFT })
  @Index('idx_articles_status')
  status!: ArticleStatus;

  @Column({ name: 'author_id', type: 'uuid' })
  @Index('idx_articles_author_id')
  authorId!: string;

  // An author who still owns articles cannot be deleted
  @ManyToOne(() => User, (user) => user.articles, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'author_id' })
  author!: User;

  @Column({ name: 'category_id', type: 'uuid', nullable: true })
  @Index('idx_articles_category_id')
  categoryId!: string | null;

  @ManyToOne(() => Category, (category) => category.articles, {
    onDelete: 'SET NULL',
    nullable: true,
  })
  @JoinColumn({ name: 'category_id' })
  category!: Category | null;

  @Column({ name: 'published_at', type: 'timestamptz', nullable: true })
  @Index('idx_articles_published_at')
  publishedAt!: Date | null;

  @Column({ name: 'meta_json', type: 'jsonb', default: () => "'{}'" })
  metadata!: ArticleMetadata;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;

  @OneToMany('ArticleTag', 'article')
  articleTags!: unknown[];
}
