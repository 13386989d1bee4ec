import { Controller, Get, HttpStatus, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';

import { UserRole } from '@/database/entities/user.entity';
import { Authenticated } from '@/common/decorators/authenticated.decorator';
import { SlugService } from './slug.service';
import { ResolvedSlugDto, ResolveSlugQueryDto } from './dto/resolve-slug.dto';

@ApiTags('Slugs')
@ApiSecurity('api-key')
@Controller('slugs')
export class SlugsController {
  constructor(private readonly slugService: SlugService) {}

  @Get('resolve')
  @Authenticated(UserRole.AUTHOR)
  @ApiOperation({
    summary: 'Preview a slug',
    description:
      'Returns the slug a create (or, with excludeId, an update) would assign right now. ' +
      'Nothing is reserved; a concurrent write may still take it.',
  })
  @ApiResponse({ status: HttpStatus.OK, type: ResolvedSlugDto })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'All candidates are taken' })
  async resolve(@Query() query: ResolveSlugQueryDto): Promise<ResolvedSlugDto> {
    const slug = await this.slugService.resolveSlug(query.entity, query.name, {
      excludeId: query.excludeId,
    });

    return {
      entity: query.entity,
      base: this.slugService.baseSlug(query.entity, query.name),
      slug,
    };
  }
}
