import { LogLevel } from '@nestjs/common';

const LOG_LEVELS: readonly LogLevel[] = ['log', 'error', 'warn', 'debug', 'verbose'];

export const DEFAULT_LOG_LEVELS = 'log,error,warn';

/** Comma-separated `LOG_LEVELS` value → Nest log levels; unknown names are dropped */
export function parseLogLevels(raw: string | undefined): LogLevel[] {
  const requested = (raw?.trim() ? raw : DEFAULT_LOG_LEVELS)
    .split(',')
    .map((level) => level.trim());
  return LOG_LEVELS.filter((level) => requested.includes(level));
}
