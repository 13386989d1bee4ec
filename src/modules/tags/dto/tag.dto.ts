import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty, PartialType } from '@nestjs/swagger';

import { TAG_NAME_MAX_LENGTH } from '@/database/entities/tag.entity';

export class CreateTagDto {
  @ApiProperty({ example: 'TypeScript', maxLength: TAG_NAME_MAX_LENGTH })
  @IsString()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsNotEmpty({ message: 'name cannot be empty' })
  @MaxLength(TAG_NAME_MAX_LENGTH)
  name!: string;
}

export class UpdateTagDto extends PartialType(CreateTagDto) {}

export class TagResponseDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty({ example: 'TypeScript' })
  name!: string;

  @ApiProperty({ example: 'typescript' })
  slug!: string;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;
}
