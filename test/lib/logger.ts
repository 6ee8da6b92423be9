import pino from 'pino';
import type { Logger } from '../../src/types.ts';

export interface LogEntry {
  level: 'info' | 'error' | 'warn' | 'debug';
  msg: string;
  fields?: object;
}

export const silentLogger: Logger = pino({ level: 'silent' });

/**
 * Logger that keeps every entry, for asserting on what was reported.
 */
export function createRecordingLogger(): Logger & { entries: LogEntry[]; messages(level?: LogEntry['level']): string[] } {
  const entries: LogEntry[] = [];
  const log =
    (level: LogEntry['level']) =>
    (first: unknown, second?: unknown): void => {
      if (typeof first === 'string') entries.push({ level, msg: first });
      else entries.push({ level, msg: typeof second === 'string' ? second : '', ...(typeof first === 'object' && first !== null && { fields: first }) });
    };
  return {
    entries,
    messages: (level) => entries.filter((entry) => !level || entry.level === level).map((entry) => entry.msg),
    info: log('info'),
    error: log('error'),
    warn: log('warn'),
    debug: log('debug'),
  };
}
