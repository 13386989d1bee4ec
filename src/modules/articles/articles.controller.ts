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

import { User, UserRole } from '@/database/entities/user.entity';
import { Authenticated } from '@/common/decorators/authenticated.decorator';
import { CurrentUser } from '@/common/decorators/current-user.decorator';
import { ArticlesService } from './articles.service';
import {
  ArticleQueryDto,
  ArticleResponseDto,
  CreateArticleDto,
  UpdateArticleDto,
} from './dto/article.dto';

@ApiTags('Articles')
@Controller('articles')
export class ArticlesController {
  constructor(private readonly articlesService: ArticlesService) {}

  @Get()
  @ApiOperation({
    summary: 'List articles',
    description: 'Filters combine with AND; results are ordered newest first.',
  })
  @ApiResponse({ status: HttpStatus.OK, type: [ArticleResponseDto] })
  async findAll(@Query() query: ArticleQueryDto): Promise<ArticleResponseDto[]> {
    return this.articlesService.findAll(query);
  }

  @Get('slug/:slug')
  @ApiOperation({ summary: 'Get an article by slug' })
  @ApiParam({ name: 'slug', example: 'hello-world' })
  @ApiResponse({ status: HttpStatus.OK, type: ArticleResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Article not found' })
  async findBySlug(@Param('slug') slug: string): Promise<ArticleResponseDto> {
    return this.articlesService.findBySlug(slug);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an article by id' })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiResponse({ status: HttpStatus.OK, type: ArticleResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Article not found' })
  async findOne(
    @Param('id', new ParseUUIDPipe({ version: '4' })) id: string,
  ): Promise<ArticleResponseDto> {
    return this.articlesService.findOne(id);
  }

  @Post()
  @Authenticated(UserRole.AUTHOR)
  @ApiSecurity('api-key')
  @ApiOperation({
    summary: 'Create an article',
    description: 'The caller becomes the author. The slug is derived from the title.',
  })
  @ApiResponse({ status: HttpStatus.CREATED, type: ArticleResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Category or tag not found' })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'No free slug' })
  async create(
    @Body() dto: CreateArticleDto,
    @CurrentUser() actor: User,
  ): Promise<ArticleResponseDto> {
    return this.articlesService.create(dto, actor.id);
  }

  @Patch(':id')
  @Authenticated(UserRole.AUTHOR)
  @ApiSecurity('api-key')
  @ApiOperation({
    summary: 'Update an article',
    description: 'Authors may only update their own articles.',
  })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiResponse({ status: HttpStatus.OK, type: ArticleResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Article, category or tag not found' })
  async update(
    @Param('id', new ParseUUIDPipe({ version: '4' })) id: string,
    @Body() dto: UpdateArticleDto,
    @CurrentUser() actor: User,
  ): Promise<ArticleResponseDto> {
    return this.articlesService.update(id, dto, actor);
  }

  @Delete(':id')
  @Authenticated(UserRole.AUTHOR)
  @ApiSecurity('api-key')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({
    summary: 'Delete an article',
    description: 'Authors may only delete their own articles. Tag links are removed with it.',
  })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiResponse({ status: HttpStatus.NO_CONTENT, description: 'Article deleted' })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Article not found' })
  async remove(
    @Param('id', new ParseUUIDPipe({ version: '4' })) id: string,
    @CurrentUser() actor: User,
  ): Promise<void> {
    await this.articlesService.remove(id, actor);
  }
}
