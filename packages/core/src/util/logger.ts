/**
 * Structured logging on pino.
 *
 * Output goes to stderr so that commands printing JSON on stdout stay
 * pipeable. The level comes from SPECREFINE_LOG_LEVEL; runs under Vitest
 * default to 'silent'.
 */

import { pino, type Logger as PinoLogger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'silent',
];

export interface LogContext {
  file?: string;
  stage?: string;
  schema?: string;
  durationMs?: number;
  [key: string]: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.SPECREFINE_LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.VITEST ? 'silent' : 'info';
}

function createBaseLogger(level: LogLevel): PinoLogger {
  return pino(
    {
      level,
      base: { service: 'specrefine' },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    process.stderr
  );
}

let baseLogger = createBaseLogger(defaultLevel());

/** Replace the process-wide base logger level (CLI --verbose, tests). */
export function setLogLevel(level: LogLevel): void {
  baseLogger = createBaseLogger(level);
}

/**
 * Component logger. Its pino child is built once and rebuilt only after
 * setLogLevel() replaces the base logger, so loggers created at module
 * load follow the new level.
 */
export class Logger {
  private base: PinoLogger;
  private instance: PinoLogger;

  constructor(
    private readonly component: string,
    private readonly bindings: LogContext = {}
  ) {
    this.base = baseLogger;
    this.instance = this.createChild();
  }

  private createChild(): PinoLogger {
    return baseLogger.child({ component: this.component, ...this.bindings });
  }

  private get target(): PinoLogger {
    if (this.base !== baseLogger) {
      this.base = baseLogger;
      this.instance = this.createChild();
    }
    return this.instance;
  }

  child(bindings: LogContext): Logger {
    return new Logger(this.component, { ...this.bindings, ...bindings });
  }

  debug(message: string, context: LogContext = {}): void {
    this.target.debug(context, message);
  }

  info(message: string, context: LogContext = {}): void {
    this.target.info(context, message);
  }

  warn(message: string, context: LogContext = {}): void {
    this.target.warn(context, message);
  }

  error(message: string, context: LogContext & { error?: unknown } = {}): void {
    const { error, ...rest } = context;
    if (error === undefined) {
      this.target.error(rest, message);
      return;
    }
    const err =
      error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { message: String(error) };
    this.target.error({ ...rest, err }, message);
  }
}

export function createLogger(component: string): Logger {
  return new Logger(component);
}
