/**
 * Structured Logger
 *
 * Pino-based JSON logging for container platforms.
 * - GCP-style severity mapping on every line
 * - insertId for log ordering within same timestamp
 * - stack_trace extraction for error reporting
 * - 'message' key for structured logging compatibility
 *
 * @version 1.0.0
 */

import pino from 'pino';
import packageJson from '../../package.json';

const SEVERITY: Record<string, string> = {
  trace: 'DEBUG',
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
  fatal: 'CRITICAL',
};

const SERVICE_NAME = 'maintenance-assistant';

/** Monotonic counter for insertId */
let insertIdCounter = 0;

function resolveLogLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.NODE_ENV === 'test') return 'silent';
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

function createLogger(): pino.Logger {
  const isDev = process.env.NODE_ENV === 'development';
  const level = resolveLogLevel();
  const base = { service: SERVICE_NAME, version: packageJson.version };

  if (!isDev) {
    return pino({
      level,
      messageKey: 'message',
      base,
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
      formatters: {
        level(label: string) {
          return {
            severity: SEVERITY[label] || 'DEFAULT',
            level: label,
          };
        },
        log(obj: Record<string, unknown>) {
          const result: Record<string, unknown> = {
            ...obj,
            'logging.googleapis.com/insertId': `${Date.now()}-${insertIdCounter++}`,
          };

          const err = obj.err;
          if (err instanceof Error && err.stack) {
            result['stack_trace'] = err.stack;
          }

          return result;
        },
      },
    });
  }

  return pino({
    level,
    base,
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: {
      target: 'pino/file',
      options: { destination: 1 },
    },
  });
}

const pinoLogger = createLogger();

type LogMethodName = 'warn' | 'error' | 'info' | 'debug' | 'fatal';
type LogMethod = (msgOrObj: unknown, ...args: unknown[]) => void;

export type Logger = {
  warn: LogMethod;
  error: LogMethod;
  info: LogMethod;
  debug: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
  level: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Console-compatible wrapper.
 *
 * Accepts pino's `(obj, msg)` as well as `('msg', extra)`; a trailing
 * argument becomes structured context (`err` for errors, `extra` otherwise).
 */
function createWrappedLogger(instance: pino.Logger): Logger {
  function wrapMethod(method: LogMethodName): LogMethod {
    return (msgOrObj: unknown, ...args: unknown[]) => {
      const [first] = args;

      if (isRecord(msgOrObj) && typeof first === 'string') {
        instance[method](msgOrObj, first);
        return;
      }

      if (typeof msgOrObj === 'string' && args.length > 0) {
        if (first instanceof Error) {
          instance[method]({ err: first }, msgOrObj);
        } else {
          instance[method]({ extra: first }, msgOrObj);
        }
        return;
      }

      if (typeof msgOrObj === 'string') {
        instance[method](msgOrObj);
        return;
      }

      instance[method](isRecord(msgOrObj) ? msgOrObj : { value: msgOrObj });
    };
  }

  return {
    warn: wrapMethod('warn'),
    error: wrapMethod('error'),
    info: wrapMethod('info'),
    debug: wrapMethod('debug'),
    fatal: wrapMethod('fatal'),
    child: (bindings: Record<string, unknown>) => createWrappedLogger(instance.child(bindings)),
    get level() {
      return instance.level;
    },
    set level(val: string) {
      instance.level = val;
    },
  };
}

export const logger: Logger = createWrappedLogger(pinoLogger);
