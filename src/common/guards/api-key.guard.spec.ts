import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';

import { ApiKeyGuard } from './api-key.guard';

function guardWithKeys(apiKey: string): ApiKeyGuard {
  return new ApiKeyGuard(new ConfigService({ app: { apiKey } }));
}

function contextWithKey(key?: string): ExecutionContextHost {
  return new ExecutionContextHost([{ headers: key === undefined ? {} : { 'x-api-key': key } }, {}]);
}

describe('ApiKeyGuard', () => {
  it('should allow every request when no key is configured', () => {
    expect(guardWithKeys('').canActivate(contextWithKey())).toBe(true);
  });

  it('should accept any of the configured keys', () => {
    const guard = guardWithKeys('test-key-one, test-key-two');

    expect(guard.canActivate(contextWithKey('test-key-one'))).toBe(true);
    expect(guard.canActivate(contextWithKey('test-key-two'))).toBe(true);
  });

  it('should reject a missing or wrong key', () => {
    const guard = guardWithKeys('test-key-one');

    expect(() => guard.canActivate(contextWithKey())).toThrow(UnauthorizedException);
    expect(() => guard.canActivate(contextWithKey('test-key-oops'))).toThrow(UnauthorizedException);
    expect(() => guard.canActivate(contextWithKey('short'))).toThrow(UnauthorizedException);
  });
});
