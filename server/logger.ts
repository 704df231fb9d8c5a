import pino from 'pino';

const logger: pino.Logger = pino({
  name: 'reversal-scanner',
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

// console.* goes through pino so the `[tag] message` lines scattered across
// services come out as structured JSON alongside the event records below.
function formatArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (a instanceof Error) return a.stack || a.message;
      if (typeof a === 'object' && a !== null) {
        try {
          return JSON.stringify(a);
        } catch {
          return String(a);
        }
      }
      return String(a);
    })
    .join(' ');
}

console.log = (...args: unknown[]) => logger.info(formatArgs(args));
console.error = (...args: unknown[]) => logger.error(formatArgs(args));
console.warn = (...args: unknown[]) => logger.warn(formatArgs(args));
console.info = (...args: unknown[]) => logger.info(formatArgs(args));
console.debug = (...args: unknown[]) => logger.debug(formatArgs(args));

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Emits one event record, e.g. `scan.finished` with its counters. */
export function logStructured(level: LogLevel, event: string, fields: Record<string, unknown> = {}): void {
  logger[level]({ event, ...fields }, event);
}

export default logger;
