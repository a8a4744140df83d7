import type { RuntimeLogger } from '../types/common.js';

export interface RecordingLogger extends RuntimeLogger {
  lines: Array<{ level: 'debug' | 'info' | 'warn' | 'error'; message: string }>;
}

/** Logger that keeps lines in memory instead of writing to the console. */
export function createRecordingLogger(): RecordingLogger {
  const lines: RecordingLogger['lines'] = [];
  const record =
    (level: 'debug' | 'info' | 'warn' | 'error') =>
    (...args: unknown[]) => {
      lines.push({ level, message: args.map(String).join(' ') });
    };
  return { lines, debug: record('debug'), info: record('info'), warn: record('warn'), error: record('error') };
}
