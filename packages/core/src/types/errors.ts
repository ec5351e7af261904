/**
 * Error hierarchy for specrefine.
 *
 * Transforms never throw on malformed documents; these errors cover what sits
 * around them: configuration, unreadable input files and pipeline failures.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

export interface ErrorContext {
  /** File the error relates to, when there is one */
  file?: string;
  /** Dotted config key (e.g. 'reconciliation.confidenceThreshold') */
  configPath?: string;
  /** Pipeline stage name */
  stage?: string;
  value?: unknown;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface RefineryErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

export abstract class RefineryError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: RefineryErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serialize for logs and reports.
   * The stack is only included in 'dev'; secret-looking context values are
   * redacted in 'prod'.
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

const SENSITIVE_KEYS = new Set(['password', 'apiKey', 'secret', 'token']);

function redactContext(context?: ErrorContext): ErrorContext | undefined {
  if (!context) return context;
  const redact = (val: unknown): unknown => {
    if (Array.isArray(val)) return val.map(redact);
    if (val !== null && typeof val === 'object') {
      const out: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(val)) {
        out[k] = SENSITIVE_KEYS.has(k) ? '[REDACTED]' : redact(v);
      }
      return out;
    }
    return val;
  };
  const redacted: ErrorContext = { ...context };
  if ('value' in redacted) {
    redacted.value = redact(redacted.value);
  }
  return redacted;
}

/**
 * Invalid configuration: unreadable config file, a value out of range,
 * or a pattern that does not compile.
 */
export class ConfigurationError extends RefineryError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    severity?: Severity;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      severity: params.severity,
      cause: params.cause,
    });
  }

  get configPath(): string | undefined {
    return this.context?.configPath;
  }
}

/**
 * An input document that could not be read or parsed as JSON.
 */
export class ParseError extends RefineryError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    severity?: Severity;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.PARSE_ERROR,
      context: params.context,
      severity: params.severity,
      cause: params.cause,
    });
  }

  get file(): string | undefined {
    return this.context?.file;
  }
}

/** Anything thrown that is not already a RefineryError. */
export class InternalError extends RefineryError {
  constructor(params: { message: string; context?: ErrorContext; cause?: Error }) {
    super({
      message: params.message,
      errorCode: ErrorCode.INTERNAL_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }
}

export function isRefineryError(error: unknown): error is RefineryError {
  return error instanceof RefineryError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
