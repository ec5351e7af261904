/**
 * ErrorPresenter - pure presentation layer for RefineryError instances
 * - No business logic; formats into environment-specific view objects
 */

import { ErrorCode } from './codes.js';
import type { RefineryError, SerializedError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

const EXCERPT_LIMIT = 120;

const WORKAROUNDS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.CONFIGURATION_ERROR]:
    'Check the named key in the config file, or remove it to use the default',
  [ErrorCode.INVALID_PATTERN]:
    'Patterns are JavaScript regular expressions; escape literal dots and braces',
  [ErrorCode.PARSE_ERROR]: 'Make sure the file holds a single JSON object',
  [ErrorCode.IO_ERROR]: 'Check that the path exists and is readable',
};

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: RefineryError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error),
      excerpt: this.#formatExcerpt(error.context?.value),
      workaround: WORKAROUNDS[error.errorCode],
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout.columns || 80,
    };
  }

  formatForProduction(error: RefineryError): SerializedError {
    return error.toJSON('prod');
  }

  #formatLocation(error: RefineryError): string | undefined {
    const context = error.context;
    if (!context) return undefined;
    const parts = [
      context.file,
      context.configPath && `config ${context.configPath}`,
      context.stage && `stage ${context.stage}`,
    ].filter((part): part is string => Boolean(part));
    return parts.length > 0 ? `Location: ${parts.join(', ')}` : undefined;
  }

  #formatExcerpt(value: unknown): string | undefined {
    if (value === undefined) return undefined;
    const text = typeof value === 'string' ? value : JSON.stringify(value);
    if (this._env === 'prod' || text === undefined) return undefined;
    return text.length > EXCERPT_LIMIT
      ? `${text.slice(0, EXCERPT_LIMIT)}…`
      : text;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}
