import { promises as fs } from 'fs';
import path from 'path';
import { workflowEnv } from '../../config/env';

export type LogLevel = 'info' | 'warn' | 'error';

export interface ServerLogEntry {
  level: LogLevel;
  category: string;
  message: string;
  details?: unknown;
}

/**
 * Sink for workflow events. Implementations must not throw.
 */
export type EventLogger = (entry: ServerLogEntry) => Promise<void>;

const ensureDirPromises = new Map<string, Promise<void>>();

async function ensureLogDirExists(logDir: string): Promise<void> {
  let pending = ensureDirPromises.get(logDir);
  if (!pending) {
    pending = fs
      .mkdir(logDir, { recursive: true })
      .then(() => undefined)
      .catch((error: unknown) => {
        ensureDirPromises.delete(logDir);
        throw error;
      });
    ensureDirPromises.set(logDir, pending);
  }
  return pending;
}

// UTC calendar day, so one file never spans two dates whatever the host zone.
const utcDay = (date: Date): string => date.toISOString().slice(0, 10);

export function getLogFileName(date: Date = new Date()): string {
  return `server-${utcDay(date)}.log`;
}

export function createServerLogger(logDir: string = workflowEnv.logDir): EventLogger {
  return async (entry) => {
    try {
      await ensureLogDirExists(logDir);
      const now = new Date();
      const details = entry.details === undefined ? null : sanitizeForLog(entry.details);
      const payload = {
        timestamp: now.toISOString(),
        level: entry.level,
        category: entry.category,
        message: entry.message,
        details,
      };
      await fs.appendFile(path.join(logDir, getLogFileName(now)), JSON.stringify(payload) + '\n', 'utf8');
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error('[server-logger] failed to write log entry', error);
    }
  };
}

export const logServerEvent: EventLogger = createServerLogger();

/**
 * Makes a value safe for `JSON.stringify`: errors keep their message, stack and cause,
 * dates and bigints become strings and repeated references become `[Circular]`.
 */
export function sanitizeForLog(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'function' || typeof value === 'symbol') {
    return String(value);
  }
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);

  if (value instanceof Error) {
    return {
      name: value.name || 'Error',
      message: value.message,
      stack: value.stack,
      cause: value.cause === undefined ? undefined : sanitizeForLog(value.cause, seen),
    };
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeForLog(item, seen));
  }
  return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, sanitizeForLog(item, seen)]));
}
