import pino, { type Level, type Logger } from 'pino';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

const PINO_LEVELS: Record<LogLevelName, Level> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal',
};

export const logger: Logger = pino({ level: 'info' });

export function setLogLevel(level: LogLevelName, target: Logger = logger): void {
  target.level = PINO_LEVELS[level];
}

/**
 * dry-run 模式下的日志都带上 [DRY RUN] 前缀
 */
export function dryRunLogger(base: Logger): Logger {
  return base.child({}, { msgPrefix: '[DRY RUN] ' });
}

export type { Logger };
