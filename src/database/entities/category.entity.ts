import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';

export const CATEGORY_NAME_MAX_LENGTH = 64;
export const CATEGORY_SLUG_MAX_LENGTH = 80;

@Entity('categories')
export class Category {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: CATEGORY_NAME_MAX_LENGTH })
  @Index('uq_categories_name', { unique: true })
  name!: string;

  @Column({ type: 'varchar', length: CATEGORY_SLUG_MAX_LENGTH })
  @Index('uq_categories_slug', { unique: true })
  slug!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;

  @OneToMany('Article', 'category')
  articles!: unknown[];
}
