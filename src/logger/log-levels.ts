import { LogLevel } from '@nestjs/common';

const LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/** Levels enabled for a LOG_LEVEL value; unknown or unset means "log". */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const normalized = level?.trim().toLowerCase();
  const index = LEVELS.findIndex((l) => l === normalized);
  return LEVELS.slice(0, (index === -1 ? LEVELS.indexOf('log') : index) + 1);
}
