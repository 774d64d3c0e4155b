import { DateTime } from 'luxon';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// Console logger filtered by level, "2024-01-01 12:00:00 - INFO - message"
export function createConsoleLogger(level: LogLevel = 'INFO'): Logger {
  const threshold = LEVEL_RANK[level];

  const write = (lvl: LogLevel, message: string): void => {
    if (LEVEL_RANK[lvl] < threshold) return;
    const line = `${DateTime.now().toFormat('yyyy-MM-dd HH:mm:ss')} - ${lvl} - ${message}`;
    if (lvl === 'ERROR') {
      console.error(line);
    } else if (lvl === 'WARNING') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message) => write('DEBUG', message),
    info: (message) => write('INFO', message),
    warn: (message) => write('WARNING', message),
    error: (message) => write('ERROR', message)
  };
}
