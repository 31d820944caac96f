import type { Logger, LogFields, LogLevel } from '../interfaces/logger';

export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  scope: string | undefined;
  message: string;
  fields?: LogFields;
}

/**
 * Logger that keeps every entry for assertions.
 * Children share the parent's entry list.
 */
export class RecordingLogger implements Logger {
  constructor(
    readonly entries: LogEntry[] = [],
    readonly scope?: string
  ) {}

  debug(message: string, fields?: LogFields): void {
    this.entries.push({ level: 'debug', scope: this.scope, message, fields });
  }

  info(message: string, fields?: LogFields): void {
    this.entries.push({ level: 'info', scope: this.scope, message, fields });
  }

  warn(message: string, fields?: LogFields): void {
    this.entries.push({ level: 'warn', scope: this.scope, message, fields });
  }

  error(message: string, fields?: LogFields): void {
    this.entries.push({ level: 'error', scope: this.scope, message, fields });
  }

  child(scope: string): Logger {
    return new RecordingLogger(this.entries, this.scope ? `${this.scope}:${scope}` : scope);
  }

  messages(level?: LogEntry['level']): string[] {
    return this.entries.filter(e => level === undefined || e.level === level).map(e => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
