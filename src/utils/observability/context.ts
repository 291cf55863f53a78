import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const logContextStorage = new AsyncLocalStorage<LogContext>();

export function withLogContext<T>(context: LogContext, fn: () => T): T {
  const parent = logContextStorage.getStore() ?? {};
  const merged = { ...parent, ...context };
  return logContextStorage.run(merged, fn);
}

export function getLogContext(): LogContext {
  return logContextStorage.getStore() ?? {};
}

function shortId(prefix: string, length: number): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, length)}`;
}

export function createRequestId(prefix = 'req'): string {
  return shortId(prefix, 12);
}

export function createRunId(prefix = 'run'): string {
  return shortId(prefix, 12);
}

/** Session ids travel inside Telegram callback data (64 bytes max), so they stay short. */
export function createSessionId(): string {
  return shortId('dg', 10);
}
