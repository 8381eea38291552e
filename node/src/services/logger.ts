// src/services/logger.ts: structured logging for backend
import { Logger } from 'tslog';

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export const logger = new Logger({
  name: 'hr-agent',
  minLevel: LEVELS[(process.env.LOG_LEVEL ?? 'info').toLowerCase()] ?? 3,
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: process.env.NODE_ENV === 'test' ? 'hidden' : 'pretty',
});
