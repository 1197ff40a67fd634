import { describe, it, expect } from 'vitest';
import { ErrorCode, type CLIErrorView } from '@sinkbench/core';

import { renderCLIView, stripAnsi, wrapText } from './render.js';

describe('renderCLIView', () => {
  const view: CLIErrorView = {
    title: 'Error E400: Unknown browser: edge',
    code: ErrorCode.CONFIGURATION_ERROR,
    location: 'Setting: browser',
    workaround: 'Use chromium, firefox or webkit',
    cause: 'ENOENT',
    colors: false,
    terminalWidth: 30,
  };

  it('renders the title, location, cause and workaround wrapped to the terminal width', () => {
    expect(renderCLIView(view).split('\n')).toEqual([
      '❌ Error E400: Unknown browser: edge',
      '📍 Setting: browser',
      'Cause: ENOENT',
      '💡 Use chromium, firefox or',
      'webkit',
    ]);
  });

  it('omits the optional sections', () => {
    expect(
      renderCLIView({
        title: 'Error E500: boom',
        code: ErrorCode.INTERNAL_ERROR,
        colors: false,
        terminalWidth: 80,
      })
    ).toBe('❌ Error E500: boom');
  });

  it('colors the title red and bold when enabled', () => {
    const out = renderCLIView({ ...view, colors: true });
    expect(out.startsWith('\u001B[31m\u001B[1m❌ Error E400')).toBe(true);
    expect(stripAnsi(out).split('\n')[0]).toBe('❌ Error E400: Unknown browser: edge');
  });
});

describe('wrapText', () => {
  it('keeps over-long words whole', () => {
    expect(wrapText('a verylongword b', 5)).toEqual(['a', 'verylongword', 'b']);
  });
});
