import {
  Body,
  Controller,
  Delete,
  ForbiddenException,
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
import { PaginationQueryDto } from '@/common/dto/pagination.dto';
import { UsersService } from './users.service';
import { CreateUserDto, UpdateProfileDto, UpdateUserDto, UserResponseDto } from './dto/user.dto';

@ApiTags('Users')
@ApiSecurity('api-key')
@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get('me')
  @Authenticated()
  @ApiOperation({ summary: 'Get the calling user' })
  @ApiResponse({ status: HttpStatus.OK, type: UserResponseDto })
  async me(@CurrentUser() actor: User): Promise<UserResponseDto> {
    return this.usersService.findOne(actor.id);
  }

  @Patch('me')
  @Authenticated()
  @ApiOperation({
    summary: 'Update the calling user',
    description: 'Role and activation can only be changed by an admin.',
  })
  @ApiResponse({ status: HttpStatus.OK, type: UserResponseDto })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Username or email already in use' })
  async updateMe(
    @CurrentUser() actor: User,
    @Body() dto: UpdateProfileDto,
  ): Promise<UserResponseDto> {
    return this.usersService.update(actor.id, dto);
  }

  @Get()
  @Authenticated(UserRole.ADMIN)
  @ApiOperation({ summary: 'List users ordered by username' })
  @ApiResponse({ status: HttpStatus.OK, type: [UserResponseDto] })
  async findAll(@Query() query: PaginationQueryDto): Promise<UserResponseDto[]> {
    return this.usersService.findAll(query);
  }

  @Get(':id')
  @Authenticated(UserRole.ADMIN)
  @ApiOperation({ summary: 'Get a user by id' })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiResponse({ status: HttpStatus.OK, type: UserResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'User not found' })
  async findOne(
    @Param('id', new ParseUUIDPipe({ version: '4' })) id: string,
  ): Promise<UserResponseDto> {
    return this.usersService.findOne(id);
  }

  @Post()
  @Authenticated(UserRole.ADMIN)
  @ApiOperation({ summary: 'Create a user' })
  @ApiResponse({ status: HttpStatus.CREATED, type: UserResponseDto })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Username or email already in use' })
  async create(@Body() dto: CreateUserDto): Promise<UserResponseDto> {
    return this.usersService.create(dto);
  }

  @Patch(':id')
  @Authenticated(UserRole.ADMIN)
  @ApiOperation({ summary: 'Update a user' })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiResponse({ status: HttpStatus.OK, type: UserResponseDto })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Username or email already in use' })
  async update(
    @Param('id', new ParseUUIDPipe({ version: '4' })) id: string,
    @Body() dto: UpdateUserDto,
  ): Promise<UserResponseDto> {
    return this.usersService.update(id, dto);
  }

  @Delete(':id')
  @Authenticated(UserRole.ADMIN)
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({
    summary: 'Delete a user',
    description: 'Refused while the user authors articles. Refresh tokens are removed with the user.',
  })
  @ApiParam({ name: 'id', format: 'uuid' })
  @ApiResponse({ status: HttpStatus.NO_CONTENT, description: 'User deleted' })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'User still authors articles' })
  async remove(
    @Param('id', new ParseUUIDPipe({ version: '4' })) id: string,
    @CurrentUser() actor: User,
  ): Promise<void> {
    if (id === actor.id) {
      throw new ForbiddenException('Admins cannot delete their own account');
    }
    await this.usersService.remove(id);
  }
}
