/**
 * Logger
 * 
 * Pino-based structured logger shared by every package.
 */

import { pino, type LevelWithSilent } from 'pino';

const NODE_ENV = process.env['NODE_ENV'] ?? 'development';
const LOG_LEVEL = process.env['LOG_LEVEL'] ?? (NODE_ENV === 'test' ? 'silent' : 'info');

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'scenecut',
    env: NODE_ENV,
  },
  // stderr keeps stdout free for CLI output
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname,service,env',
      destination: 2,
    },
  } : undefined,
});

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Change the root logger level. Children inherit the level they saw at creation.
 */
export function setLogLevel(level: LevelWithSilent): void {
  logger.level = level;
}
