import type { Writable } from 'node:stream';

import { Chalk, chalkStderr, type ChalkInstance } from 'chalk';

import { ENV_DEBUG } from '@/config/constants.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Compact HH:MM:SS.mmm timestamp for log lines.
 */
export function ts(date: Date = new Date()): string {
  const h = String(date.getHours()).padStart(2, '0');
  const m = String(date.getMinutes()).padStart(2, '0');
  const s = String(date.getSeconds()).padStart(2, '0');
  const ms = String(date.getMilliseconds()).padStart(3, '0');
  return `${h}:${m}:${s}.${ms}`;
}

export function isDebugEnabled(): boolean {
  return process.env[ENV_DEBUG] === 'true';
}

function isTty(sink: Writable): boolean {
  return 'isTTY' in sink && sink.isTTY === true;
}

function paintLevel(colors: ChalkInstance, level: LogLevel): string {
  switch (level) {
    case 'debug':
      return colors.gray(level);
    case 'info':
      return colors.blue(level);
    case 'warn':
      return colors.yellow(level);
    case 'error':
      return colors.red(level);
  }
}

/**
 * Create a scoped logger writing one line per entry to stderr (or `sink`).
 *
 * stdout carries the protocol stream, so nothing here ever writes to it.
 */
export function createLogger(scope: string, sink: Writable = process.stderr): Logger {
  const colors = new Chalk({ level: isTty(sink) ? chalkStderr.level : 0 });

  const write = (level: LogLevel, message: string): void => {
    const line = `${colors.gray(ts())} ${paintLevel(colors, level)} ${colors.cyan(`[${scope}]`)} ${message}\n`;
    try {
      sink.write(line);
    } catch {
      // stderr gone; nowhere left to report
    }
  };

  return {
    debug: (message) => {
      if (isDebugEnabled()) {
        write('debug', message);
      }
    },
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}
