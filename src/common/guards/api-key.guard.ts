import { Injectable, CanActivate, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import { Request } from 'express';
import { API_KEY_HEADER } from '@/common/types/actor-request';

/**
 * Authenticates the upstream gateway with a shared key. Disabled when
 * `API_KEY` is empty.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly apiKeys: Buffer[];

  constructor(private readonly configService: ConfigService) {
    const apiKeyConfig = this.configService.get<string>('app.apiKey', '');
    // Comma-separated list so keys can be rotated without downtime
    this.apiKeys = apiKeyConfig
      .split(',')
      .map((key) => key.trim())
      .filter((key) => key.length > 0)
      .map((key) => Buffer.from(key));
  }

  canActivate(context: ExecutionContext): boolean {
    if (this.apiKeys.length === 0) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const providedApiKey = request.headers[API_KEY_HEADER];

    if (typeof providedApiKey !== 'string' || providedApiKey.length === 0) {
      throw new UnauthorizedException('API key is required. Provide it in the X-API-Key header.');
    }

    const provided = Buffer.from(providedApiKey);
    const matches = this.apiKeys.some(
      (key) => key.length === provided.length && timingSafeEqual(key, provided),
    );

    if (!matches) {
      throw new UnauthorizedException('Invalid API key.');
    }

    return true;
  }
}
