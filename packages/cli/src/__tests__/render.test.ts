import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ConfigurationError, ErrorCode } from '@specrefine/core';

import {
  renderCLIView,
  renderCliError,
  stripAnsi,
  toRefineryError,
} from '../render.js';

beforeEach(() => {
  vi.stubEnv('NO_COLOR', '');
  vi.stubEnv('FORCE_COLOR', '');
  vi.stubEnv('NODE_ENV', 'test');
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('renderCLIView', () => {
  const view = {
    title: 'Error E300: bad',
    code: ErrorCode.CONFIGURATION_ERROR,
    location: 'Location: specrefine.yaml',
    excerpt: '12',
    workaround: 'Check the path exists and is readable',
    colors: false,
    terminalWidth: 80,
  };

  it('renders one line per part', () => {
    expect(renderCLIView(view)).toBe(
      [
        '✖ Error E300: bad',
        'Location: specrefine.yaml',
        'Value: 12',
        'Hint: Check the path exists and is readable',
      ].join('\n')
    );
  });

  it('wraps long lines to the terminal width', () => {
    const text = renderCLIView({
      ...view,
      location: undefined,
      excerpt: undefined,
      terminalWidth: 20,
    });

    expect(text).toBe(
      ['✖ Error E300: bad', 'Hint: Check the path', 'exists and is', 'readable'].join(
        '\n'
      )
    );
  });

  it('colors the title when asked', () => {
    const text = renderCLIView({ ...view, colors: true });

    expect(text.split('\n')[0]).toBe(
      '\u001B[31m\u001B[1m✖ Error E300: bad\u001B[0m\u001B[0m'
    );
    expect(stripAnsi(text)).toBe(renderCLIView(view));
  });
});

describe('renderCliError', () => {
  it('renders a RefineryError with its exit code', () => {
    const rendered = renderCliError(
      new ConfigurationError({
        message: '--workers must be a positive integer',
        context: { configPath: '--workers', value: '0' },
      }),
      { colors: false, terminalWidth: 200 }
    );

    expect(rendered).toEqual({
      text: [
        '✖ Error E300: --workers must be a positive integer',
        'Location: config --workers',
        'Value: 0',
        'Hint: Check the named key in the config file, or remove it to use the default',
      ].join('\n'),
      exitCode: 50,
      code: ErrorCode.CONFIGURATION_ERROR,
    });
  });

  it('wraps anything else as an internal error', () => {
    const rendered = renderCliError(new Error('disk on fire'), {
      colors: false,
      terminalWidth: 200,
    });

    expect(rendered).toEqual({
      text: '✖ Error E500: disk on fire',
      exitCode: 99,
      code: ErrorCode.INTERNAL_ERROR,
    });
  });

  it('hides values in production', () => {
    vi.stubEnv('NODE_ENV', 'production');
    const rendered = renderCliError(
      new ConfigurationError({ message: 'bad', context: { value: 'test-secret' } }),
      { colors: false, terminalWidth: 200 }
    );

    expect(rendered.text).toBe(
      [
        '✖ Error E300: bad',
        'Hint: Check the named key in the config file, or remove it to use the default',
      ].join('\n')
    );
  });
});

describe('toRefineryError', () => {
  it('keeps RefineryErrors and wraps other throwables', () => {
    const error = new ConfigurationError({ message: 'x' });

    expect(toRefineryError(error)).toBe(error);
    expect(toRefineryError('plain').message).toBe('plain');
    expect(toRefineryError(new Error('')).message).toBe('Unexpected error');
  });
});
