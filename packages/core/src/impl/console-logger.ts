import type { Logger, LogLevel, LogFields } from '../interfaces/logger';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: 'info') */
  level?: LogLevel;
  /** Component tag printed as `[scope]` */
  scope?: string;
}

/**
 * Logger writing `[scope] message {fields}` lines to the console.
 */
export function createConsoleLogger(options?: ConsoleLoggerOptions): Logger {
  const level = options?.level ?? 'info';
  const scope = options?.scope;
  const threshold = LEVEL_ORDER[level];

  const write = (at: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[at] < threshold) return;
    const line = `${scope ? `[${scope}] ` : ''}${message}${fields && Object.keys(fields).length > 0 ? ` ${safeJson(fields)}` : ''}`;
    switch (at) {
      case 'debug': console.debug(line); break;
      case 'info': console.log(line); break;
      case 'warn': console.warn(line); break;
      case 'error': console.error(line); break;
    }
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (child) => createConsoleLogger({ level, scope: scope ? `${scope}:${child}` : child }),
  };
}

function safeJson(fields: LogFields): string {
  try {
    return JSON.stringify(fields, (_key, value: unknown) => (value instanceof Error ? value.message : value));
  } catch {
    return '{"fields":"unserializable"}';
  }
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
