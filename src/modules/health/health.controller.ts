import { Controller, Get, HttpStatus, Logger, ServiceUnavailableException } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiProperty, ApiPropertyOptional, ApiResponse } from '@nestjs/swagger';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';

export class ComponentHealthDto {
  @ApiProperty({ enum: ['up', 'down'], example: 'up' })
  status!: 'up' | 'down';

  @ApiPropertyOptional({ example: 4 })
  latencyMs?: number;

  @ApiPropertyOptional({ example: 'connect ECONNREFUSED' })
  error?: string;
}

export class HealthStatusDto {
  @ApiProperty({ enum: ['healthy', 'unhealthy'], example: 'healthy' })
  status!: 'healthy' | 'unhealthy';

  @ApiProperty({ example: '2024-01-15T10:30:00.000Z' })
  timestamp!: string;

  @ApiProperty({ description: 'Process uptime in seconds', example: 3600 })
  uptime!: number;

  @ApiProperty({ example: '1.0.0' })
  version!: string;

  @ApiProperty({ type: ComponentHealthDto })
  database!: ComponentHealthDto;
}

export class VersionInfoDto {
  @ApiProperty({ example: '1.0.0' })
  version!: string;

  @ApiProperty({ description: 'Time the answer was generated', example: '2024-01-15T10:30:00.000Z' })
  build!: string;
}

@ApiTags('Health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly configService: ConfigService,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Health check',
    description: 'Reports whether the API can reach its database.',
  })
  @ApiResponse({ status: HttpStatus.OK, type: HealthStatusDto })
  @ApiResponse({ status: HttpStatus.SERVICE_UNAVAILABLE, description: 'Database unreachable' })
  async getHealth(): Promise<HealthStatusDto> {
    const database = await this.checkDatabase();
    const health: HealthStatusDto = {
      status: database.status === 'up' ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: this.appVersion(),
      database,
    };

    if (health.status === 'unhealthy') {
      throw new ServiceUnavailableException({
        message: 'Database unreachable',
        error: 'Service Unavailable',
        details: { database },
      });
    }

    return health;
  }

  @Get('live')
  @ApiOperation({ summary: 'Liveness probe' })
  @ApiResponse({ status: HttpStatus.OK, description: 'Process is up' })
  getLiveness(): { status: string } {
    return { status: 'ok' };
  }

  @Get('ready')
  @ApiOperation({
    summary: 'Readiness probe',
    description: 'Ready once the database answers.',
  })
  @ApiResponse({ status: HttpStatus.OK, description: 'Ready for traffic' })
  @ApiResponse({ status: HttpStatus.SERVICE_UNAVAILABLE, description: 'Not ready' })
  async getReadiness(): Promise<{ status: string; ready: boolean }> {
    const database = await this.checkDatabase();
    if (database.status === 'down') {
      throw new ServiceUnavailableException('Not ready');
    }
    return { status: 'ok', ready: true };
  }

  @Get('version')
  @ApiOperation({ summary: 'API version' })
  @ApiResponse({ status: HttpStatus.OK, type: VersionInfoDto })
  getVersion(): VersionInfoDto {
    return { version: this.appVersion(), build: new Date().toISOString() };
  }

  private appVersion(): string {
    return this.configService.get<string>('app.version', '1.0.0');
  }

  private async checkDatabase(): Promise<ComponentHealthDto> {
    const start = Date.now();
    try {
      await this.dataSource.query('SELECT 1');
      return { status: 'up', latencyMs: Date.now() - start };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(`Database health check failed: ${message}`);
      return { status: 'down', latencyMs: Date.now() - start, error: message };
    }
  }
}
