/**
 * Simple structured logger for attack-workbook.
 * Writes to stderr with level filtering so stdout stays free for command output.
 */

import chalk from 'chalk';

import type { LogLevel } from '../types/config.js';

export type { LogLevel };

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

export function formatMessage(level: LogLevel, component: string, message: string): string {
  const timestamp = new Date().toISOString().substring(11, 23);
  const levelTag = LEVEL_COLORS[level](level.toUpperCase().padEnd(5));
  return `${timestamp} ${levelTag} [${component}] ${message}`;
}

export interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

export function createLogger(component: string): Logger {
  const write = (level: LogLevel, message: string, data?: unknown): void => {
    if (!shouldLog(level)) return;
    if (data === undefined) {
      console.error(formatMessage(level, component, message));
    } else {
      console.error(formatMessage(level, component, message), data);
    }
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}
