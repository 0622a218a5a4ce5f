/**
 * Console logger
 *
 * Timestamped, colour-coded lines. Context objects are appended as JSON.
 */

import type { Logger } from './types/plugin';

const dim = '\x1b[2m';
const reset = '\x1b[0m';
const red = '\x1b[31m';
const yellow = '\x1b[33m';
const cyan = '\x1b[36m';
const gray = '\x1b[90m';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_STYLE: Record<LogLevel, { label: string; colour: string }> = {
  debug: { label: 'DEBUG', colour: gray },
  info: { label: 'INFO ', colour: cyan },
  warn: { label: 'WARN ', colour: yellow },
  error: { label: 'ERROR', colour: red },
};

export interface LoggerOptions {
  /** Emit debug lines */
  debug?: boolean;
  /** Line sink (defaults to console.log / console.error) */
  write?: (level: LogLevel, line: string) => void;
  /** Clock override for tests */
  now?: () => Date;
}

function defaultWrite(level: LogLevel, line: string): void {
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Format one log line
 */
export function formatLogLine(level: LogLevel, message: string, context: Record<string, unknown> | undefined, now: Date): string {
  const timestamp = now.toLocaleTimeString('en-US', { hour12: false });
  const { label, colour } = LEVEL_STYLE[level];
  const suffix = context && Object.keys(context).length > 0 ? ` ${dim}${JSON.stringify(context)}${reset}` : '';

  return `${dim}[${timestamp}]${reset} ${colour}${label}${reset} ${dim}│${reset} ${message}${suffix}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? defaultWrite;
  const now = options.now ?? (() => new Date());

  const log = (level: LogLevel) => (message: string, context?: Record<string, unknown>) => {
    write(level, formatLogLine(level, message, context, now()));
  };

  return {
    debug: options.debug ? log('debug') : () => {},
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
