import type { LogLevel } from './config';

// stdout carries JSON-RPC, so everything goes to stderr.

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string) => {
    if (RANK[level] < RANK[threshold]) return;
    console.error(`[DOCX MCP] ${new Date().toISOString()} ${level.toUpperCase()} ${scope}: ${message}`);
  };
  return {
    debug: message => write('debug', message),
    info: message => write('info', message),
    warn: message => write('warn', message),
    error: message => write('error', message),
  };
}
