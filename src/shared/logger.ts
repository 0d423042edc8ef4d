import pino from 'pino';
import { LOG_LEVELS } from '../config/schema.js';
import type { LogLevel } from '../config/schema.js';

export function initialLevel(): LogLevel {
  // An unknown LOG_LEVEL is reported by config validation, not by pino at import time.
  const fromEnv = LOG_LEVELS.find(level => level === process.env['LOG_LEVEL']);
  return fromEnv ?? (process.env['NODE_ENV'] === 'test' ? 'silent' : 'info');
}

// stdout belongs to the stdio transport; logs always go to stderr.
export const logger = pino(
  {
    name: 'rspec-runner-mcp',
    level: initialLevel(),
  },
  pino.destination({ dest: 2, sync: true }),
);
