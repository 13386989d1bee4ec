import { validate } from './config.validation';
import { toNestLogLevels } from './log-levels';

describe('config validation', () => {
  it('should apply defaults to an empty environment', () => {
    const config = validate({});

    expect(config.PORT).toBe(3000);
    expect(config.SLUG_MAX_ATTEMPTS).toBe(50);
    expect(config.SLUG_COMMIT_RETRIES).toBe(3);
    expect(config.LOG_LEVEL).toBe('info');
  });

  it('should convert numeric strings', () => {
    const config = validate({ PORT: '8080', SLUG_MAX_ATTEMPTS: '10' });

    expect(config.PORT).toBe(8080);
    expect(config.SLUG_MAX_ATTEMPTS).toBe(10);
  });

  it('should reject values out of range', () => {
    expect(() => validate({ SLUG_COMMIT_RETRIES: '0' })).toThrow(
      'Configuration validation failed',
    );
    expect(() => validate({ LOG_LEVEL: 'chatty' })).toThrow('Configuration validation failed');
  });
});

describe('toNestLogLevels', () => {
  it('should enable the named level and everything more severe', () => {
    expect(toNestLogLevels('error')).toEqual(['error']);
    expect(toNestLogLevels('info')).toEqual(['error', 'warn', 'log']);
    expect(toNestLogLevels('verbose')).toEqual(['error', 'warn', 'log', 'debug', 'verbose']);
  });

  it('should fall back to info for unknown names', () => {
    expect(toNestLogLevels('loud')).toEqual(['error', 'warn', 'log']);
  });
});
