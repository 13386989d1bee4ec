import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';

export const TAG_NAME_MAX_LENGTH = 48;
export const TAG_SLUG_MAX_LENGTH = 64;

@Entity('tags')
export class Tag {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: TAG_NAME_MAX_LENGTH })
  @Index('uq_tags_name', { unique: true })
  name!: string;

  @Column({ type: 'varchar', length: TAG_SLUG_MAX_LENGTH })
  @Index('uq_tags_slug', { unique: true })
  slug!: string;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;

  @OneToMany('ArticleTag', 'tag')
  articleTags!: unknown[];
}
