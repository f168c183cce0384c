/**
 * Structured Logger
 *
 * Pino-based logging for the metrics usage service.
 * - Production: JSON lines on stdout with a `severity` field for log routers
 * - Development: pino/file transport to stdout
 * - Level from LOG_LEVEL (default: debug in development, info otherwise)
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

const SERVICE_NAME = 'metrics-usage';

export function getDefaultLogLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

function createLogger(): pino.Logger {
  const isDev = process.env.NODE_ENV === 'development';
  const base = {
    service: SERVICE_NAME,
    version: packageJson.version,
  };

  if (!isDev) {
    return pino({
      level: getDefaultLogLevel(),
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
          const err = obj.err;
          if (err instanceof Error && err.stack) {
            return { ...obj, stack_trace: err.stack };
          }
          return obj;
        },
      },
    });
  }

  return pino({
    level: getDefaultLogLevel(),
    base,
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: {
      target: 'pino/file',
      options: { destination: 1 },
    },
  });
}

const pinoLogger = createLogger();

type LogMethod = (msgOrObj: unknown, ...args: unknown[]) => void;

type WrappedLogger = {
  warn: LogMethod;
  error: LogMethod;
  info: LogMethod;
  debug: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => WrappedLogger;
  level: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accepts both pino-style `(obj, 'msg')` and console-style `('msg', extra)` calls.
 * A trailing Error in console-style calls is logged under `err`.
 */
function createWrappedLogger(instance: pino.Logger): WrappedLogger {
  function wrapMethod(method: 'warn' | 'error' | 'info' | 'debug' | 'fatal'): LogMethod {
    return (msgOrObj: unknown, ...args: unknown[]) => {
      const [first] = args;

      if (isRecord(msgOrObj) && typeof first === 'string') {
        instance[method](msgOrObj, first);
        return;
      }

      if (typeof msgOrObj === 'string') {
        if (args.length === 0) {
          instance[method](msgOrObj);
        } else if (first instanceof Error) {
          instance[method]({ err: first }, msgOrObj);
        } else {
          instance[method]({ extra: first }, msgOrObj);
        }
        return;
      }

      if (msgOrObj instanceof Error) {
        instance[method]({ err: msgOrObj }, msgOrObj.message);
        return;
      }

      instance[method]({ extra: msgOrObj });
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

export const logger: WrappedLogger = createWrappedLogger(pinoLogger);

export type Logger = WrappedLogger;
