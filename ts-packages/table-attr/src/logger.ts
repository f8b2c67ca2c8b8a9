/**
 * Level-filtered logging to stderr. stdout is reserved for the document.
 */

import type { LogLevel } from './config.js';

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export type LogSink = (line: string) => void;

const PREFIX = '[pandoc-table-attr]';

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

const defaultSink: LogSink = (line: string) => {
  console.error(line);
};

export function createLogger(level: LogLevel, sink: LogSink = defaultSink): Logger {
  const log = (messageLevel: Exclude<LogLevel, 'silent'>, message: string) => {
    if (SEVERITY[messageLevel] <= SEVERITY[level]) {
      sink(`${PREFIX} ${messageLevel}: ${message}`);
    }
  };

  return {
    error: message => log('error', message),
    warn: message => log('warn', message),
    info: message => log('info', message),
    debug: message => log('debug', message),
  };
}
