import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';

export enum UserRole {
  ADMIN = 'admin',
  EDITOR = 'editor',
  AUTHOR = 'author',
  VIEWER = 'viewer',
}

export const USERNAME_MAX_LENGTH = 48;

@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: USERNAME_MAX_LENGTH })
  @Index('uq_users_username', { unique: true })
  username!: string;

  @Column({ type: 'varchar', length: 255 })
  @Index('uq_users_email', { unique: true })
  email!: string;

  @Column({ name: 'password_hash', type: 'varchar', length: 255 })
  passwordHash!: string;

  @Column({ type: 'varchar', length: 16, default: UserRole.AUTHOR })
  role!: UserRole;

  @Column({ name: 'is_active', type: 'boolean', default: true })
  isActive!: boolean;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;

  // Relationships use string references to avoid circular imports
  @OneToMany('Article', 'author')
  articles!: unknown[];

  @OneToMany('RefreshToken', 'user')
  refreshTokens!: unknown[];
}
