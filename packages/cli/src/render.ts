import type { CLIErrorView } from '@sinkbench/core';

const RESET = '\u001B[0m';
const TITLE_STYLE = '\u001B[31m\u001B[1m';
const DEFAULT_WIDTH = 80;

const ANSI_SGR = /\u001B\[[0-9;]*m/g;

function paint(text: string, style: string, enabled: boolean): string {
  return enabled ? `${style}${text}${RESET}` : text;
}

/** Greedy word wrap; a word longer than `width` gets a line of its own. */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = '';
  for (const word of text.split(/\s+/).filter((part) => part.length > 0)) {
    const candidate = line ? `${line} ${word}` : word;
    if (candidate.length > width && line) {
      lines.push(line);
      line = word;
    } else {
      line = candidate;
    }
  }
  if (line) lines.push(line);
  return lines;
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth > 0 ? view.terminalWidth : DEFAULT_WIDTH;
  const sections: ReadonlyArray<readonly [string, string | undefined]> = [
    ['📍', view.location],
    ['Cause:', view.cause],
    ['💡', view.workaround],
  ];

  const lines = [paint(`❌ ${view.title}`, TITLE_STYLE, view.colors)];
  for (const [label, body] of sections) {
    if (body) lines.push(...wrapText(`${label} ${body}`, width));
  }
  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  return input.replace(ANSI_SGR, '');
}
