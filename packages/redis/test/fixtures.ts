import type { RedisCommands } from '../src/index';

/** Redis glob (with backslash escapes) as an anchored RegExp */
function redisGlobToRegExp(pattern: string): RegExp {
  let body = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '\\' && i + 1 < pattern.length) {
      i++;
      body += pattern[i].replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    } else if (ch === '*') {
      body += '.*';
    } else if (ch === '?') {
      body += '.';
    } else {
      body += ch.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${body}$`);
}

/**
 * In-process stand-in for the Redis commands the backend issues.
 * SCAN pages through keys in insertion order, COUNT at a time.
 */
export class FakeRedis implements RedisCommands {
  readonly store = new Map<string, { value: string; ex?: number }>();
  readonly commands: string[] = [];
  offline = false;

  async get(key: string): Promise<string | null> {
    this.run('get');
    return this.store.get(key)?.value ?? null;
  }

  async set(key: string, value: string, options?: { EX: number }): Promise<string> {
    this.run('set');
    this.store.set(key, { value, ex: options?.EX });
    return 'OK';
  }

  async del(key: string): Promise<number> {
    this.run('del');
    return this.store.delete(key) ? 1 : 0;
  }

  async scan(cursor: number, options: { MATCH: string; COUNT: number }): Promise<{ cursor: number; keys: string[] }> {
    this.run('scan');
    const all = [...this.store.keys()];
    const end = cursor + options.COUNT;
    const match = redisGlobToRegExp(options.MATCH);
    return {
      cursor: end >= all.length ? 0 : end,
      keys: all.slice(cursor, end).filter(key => match.test(key)),
    };
  }

  async ping(): Promise<string> {
    this.run('ping');
    return 'PONG';
  }

  async quit(): Promise<string> {
    this.run('quit');
    return 'OK';
  }

  count(command: string): number {
    return this.commands.filter(c => c === command).length;
  }

  private run(command: string): void {
    this.commands.push(command);
    if (this.offline) throw new Error('The client is offline');
  }
}
