import type { LogLevel } from '@nestjs/common';

const LEVELS: Record<string, LogLevel[]> = {
  fatal: ['fatal'],
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  info: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug'],
  trace: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
};

/** Maps LOG_LEVEL onto the levels Nest's logger prints. Unknown values fall back to info. */
export const resolveLogLevels = (level: string | undefined): LogLevel[] =>
  LEVELS[(level ?? 'info').trim().toLowerCase()] ?? LEVELS.info;
