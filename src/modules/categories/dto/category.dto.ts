import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';

import { CATEGORY_NAME_MAX_LENGTH } from '@/database/entities/category.entity';

export class CreateCategoryDto {
  @ApiProperty({ example: 'Engineering', maxLength: CATEGORY_NAME_MAX_LENGTH })
  @IsString()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsNotEmpty({ message: 'name cannot be empty' })
  @MaxLength(CATEGORY_NAME_MAX_LENGTH)
  name!: string;

  @ApiPropertyOptional({ example: 'Posts about how we build things', nullable: true })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  description?: string | null;
}

export class UpdateCategoryDto extends PartialType(CreateCategoryDto) {}

export class CategoryResponseDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty({ example: 'Engineering' })
  name!: string;

  @ApiProperty({ example: 'engineering' })
  slug!: string;

  @ApiProperty({ nullable: true, type: String })
  description!: string | null;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;
}
