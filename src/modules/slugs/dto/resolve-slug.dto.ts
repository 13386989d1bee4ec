import { IsEnum, IsNotEmpty, IsOptional, IsString, IsUUID, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { SluggedEntity } from '../slug.constants';

export class ResolveSlugQueryDto {
  @ApiProperty({
    description: 'Entity namespace the slug must be unique in',
    enum: SluggedEntity,
    example: SluggedEntity.ARTICLE,
  })
  @IsEnum(SluggedEntity)
  entity!: SluggedEntity;

  @ApiProperty({
    description: 'Display name or title to derive the slug from',
    example: 'Hello World',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  name!: string;

  @ApiPropertyOptional({
    description: 'Id of the row being edited; its own slug is not a collision',
    example: '550e8400-e29b-41d4-a716-446655440000',
  })
  @IsOptional()
  @IsUUID('4')
  excludeId?: string;
}

export class ResolvedSlugDto {
  @ApiProperty({ enum: SluggedEntity })
  entity!: SluggedEntity;

  @ApiProperty({ example: 'hello-world' })
  base!: string;

  @ApiProperty({ example: 'hello-world-2' })
  slug!: string;
}
