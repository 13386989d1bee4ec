import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';

import { UserRole } from '@/database/entities/user.entity';
import { Authenticated } from '@/common/decorators/authenticated.decorator';
import { PaginationQueryDto } from '@/common/dto/pagination.dto';
import { TagsService } from './tags.service';
import { TagResponseDto, CreateTagDto, UpdateTagDto } from './dto/tag.dto';

@ApiTags('Tags')
@Controller('tags')
export class TagsController {
  constructor(private readonly tagsService: TagsService) {}

  @Get()
  @ApiOperation({ summary: 'List tags ordered by name' })
  @ApiResponse({ status: HttpStatus.OK, type: [TagResponseDto] })
  async findAll(@Query() query: PaginationQueryDto): Promise<TagResponseDto[]> {
    return this.tagsService.findAll(query);
  }

  @Get('slug/:slug')
  @ApiOperation({ summary: 'Get a tag by slug' })
  @ApiParam({ name: 'slug', example: 'typescript' })
  @ApiResponse({ status: HttpStatus.OK, type: TagResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Tag not found' })
  async findBySlug(@Param('slug') slug: string): Promise<TagResponseDto> {
    return this.tagsService.findBySlug(slug);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a tag by id' })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiResponse({ status: HttpStatus.OK, type: TagResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Tag not found' })
  async findOne(
    @Param('id', new ParseUUIDPipe({ version: '4' })) id: string,
  ): Promise<TagResponseDto> {
    return this.tagsService.findOne(id);
  }

  @Post()
  @Authenticated(UserRole.EDITOR)
  @ApiSecurity('api-key')
  @ApiOperation({ summary: 'Create a tag' })
  @ApiResponse({ status: HttpStatus.CREATED, type: TagResponseDto })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Name already in use' })
  async create(@Body() dto: CreateTagDto): Promise<TagResponseDto> {
    return this.tagsService.create(dto);
  }

  @Patch(':id')
  @Authenticated(UserRole.EDITOR)
  @ApiSecurity('api-key')
  @ApiOperation({ summary: 'Update a tag' })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiResponse({ status: HttpStatus.OK, type: TagResponseDto })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Name already in use' })
  async update(
    @Param('id', new ParseUUIDPipe({ version: '4' })) id: string,
    @Body() dto: UpdateTagDto,
  ): Promise<TagResponseDto> {
    return this.tagsService.update(id, dto);
  }

  @Delete(':id')
  @Authenticated(UserRole.EDITOR)
  @ApiSecurity('api-key')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({
    summary: 'Delete a tag',
    description: 'Removes the tag from every article; the articles are kept.',
  })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiResponse({ status: HttpStatus.NO_CONTENT, description: 'Tag deleted' })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Tag not found' })
  async remove(@Param('id', new ParseUUIDPipe({ version: '4' })) id: string): Promise<void> {
    await this.tagsService.remove(id);
  }
}
