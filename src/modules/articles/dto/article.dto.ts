import {
  ArrayMaxSize,
  IsArray,
  IsEnum,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  IsUUID,
  MaxLength,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';

import {
  ARTICLE_TITLE_MAX_LENGTH,
  ArticleMetadata,
  ArticleStatus,
} from '@/database/entities/article.entity';
import { PaginationQueryDto } from '@/common/dto/pagination.dto';

export const MAX_TAGS_PER_ARTICLE = 50;

export class CreateArticleDto {
  @ApiProperty({
    description: 'Article title; the slug is derived from it',
    example: 'Hello World',
    maxLength: ARTICLE_TITLE_MAX_LENGTH,
  })
  @IsString()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsNotEmpty({ message: 'title cannot be empty' })
  @MaxLength(ARTICLE_TITLE_MAX_LENGTH)
  title!: string;

  @ApiPropertyOptional({ example: 'A short teaser', nullable: true })
  @IsOptional()
  @IsString()
  @MaxLength(1000)
  excerpt?: string | null;

  @ApiPropertyOptional({ description: 'Markdown source', nullable: true })
  @IsOptional()
  @IsString()
  contentMd?: string | null;

  @ApiPropertyOptional({ description: 'Rendered HTML', nullable: true })
  @IsOptional()
  @IsString()
  contentHtml?: string | null;

  @ApiPropertyOptional({
    enum: ArticleStatus,
    default: ArticleStatus.DRAFT,
    description: `One of: ${Object.values(ArticleStatus).join(', ')}`,
  })
  @IsOptional()
  @IsEnum(ArticleStatus, {
    message: `status must be one of: ${Object.values(ArticleStatus).join(', ')}`,
  })
  status?: ArticleStatus;

  @ApiPropertyOptional({
    description: 'Category id; null detaches the category on update',
    format: 'uuid',
    nullable: true,
  })
  @IsOptional()
  @IsUUID('4', { message: 'categoryId must be a valid UUID v4' })
  categoryId?: string | null;

  @ApiPropertyOptional({
    description: 'Tag ids; on update the list replaces the current tags',
    type: [String],
    example: ['550e8400-e29b-41d4-a716-446655440000'],
  })
  @IsOptional()
  @IsArray({ message: 'tagIds must be an array' })
  @ArrayMaxSize(MAX_TAGS_PER_ARTICLE)
  @IsUUID('4', { each: true, message: 'each tag id must be a valid UUID v4' })
  tagIds?: string[];

  @ApiPropertyOptional({
    description: 'Free-form metadata object',
    example: { readingTimeMinutes: 4 },
  })
  @IsOptional()
  @IsObject()
  metadata?: ArticleMetadata;
}

export class UpdateArticleDto extends PartialType(CreateArticleDto) {}

export class ArticleQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ enum: ArticleStatus })
  @IsOptional()
  @IsEnum(ArticleStatus)
  status?: ArticleStatus;

  @ApiPropertyOptional({ format: 'uuid' })
  @IsOptional()
  @IsUUID('4')
  authorId?: string;

  @ApiPropertyOptional({ format: 'uuid' })
  @IsOptional()
  @IsUUID('4')
  categoryId?: string;
}

export class ArticleTagDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty({ example: 'TypeScript' })
  name!: string;

  @ApiProperty({ example: 'typescript' })
  slug!: string;
}

export class ArticleResponseDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty({ example: 'Hello World' })
  title!: string;

  @ApiProperty({ example: 'hello-world' })
  slug!: string;

  @ApiProperty({ nullable: true, type: String })
  excerpt!: string | null;

  @ApiProperty({ nullable: true, type: String })
  contentMd!: string | null;

  @ApiProperty({ nullable: true, type: String })
  contentHtml!: string | null;

  @ApiProperty({ enum: ArticleStatus })
  status!: ArticleStatus;

  @ApiProperty({ format: 'uuid' })
  authorId!: string;

  @ApiProperty({ format: 'uuid', nullable: true, type: String })
  categoryId!: string | null;

  @ApiProperty({
    nullable: true,
    type: Date,
    description: 'Set on first publication and never moved afterwards',
  })
  publishedAt!: Date | null;

  @ApiProperty({ type: Object })
  metadata!: ArticleMetadata;

  @ApiProperty({ type: [ArticleTagDto] })
  tags!: ArticleTagDto[];

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;
}
