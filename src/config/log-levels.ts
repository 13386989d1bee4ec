import { LogLevel } from '@nestjs/common';
import { LOG_LEVELS, LogLevelName } from './config.validation';

const NEST_LEVELS: Record<LogLevelName, LogLevel> = {
  error: 'error',
  warn: 'warn',
  info: 'log',
  debug: 'debug',
  verbose: 'verbose',
};

function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Nest logger levels enabled by `LOG_LEVEL`: the named level and every more
 * severe one. Unknown names fall back to `info`.
 */
export function toNestLogLevels(level: string): LogLevel[] {
  const name = isLogLevelName(level) ? level : 'info';
  const threshold = LOG_LEVELS.indexOf(name);
  return LOG_LEVELS.slice(0, threshold + 1).map((levelName) => NEST_LEVELS[levelName]);
}
