import type { CLIErrorView } from '@passmith/core';

const RESET = '\u001B[0m';
const BOLD = '\u001B[1m';
const SEVERITY_COLOR = {
  error: '\u001B[31m',
  warn: '\u001B[33m',
  info: '\u001B[36m',
} as const;

/** Greedy word wrap; a single word longer than `width` keeps its own line. */
function wrap(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = '';
  for (const word of text.split(/\s+/)) {
    if (line === '') {
      line = word;
    } else if (line.length + 1 + word.length > width) {
      lines.push(line);
      line = word;
    } else {
      line += ` ${word}`;
    }
  }
  if (line !== '') lines.push(line);
  return lines;
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const title = view.colors
    ? `${SEVERITY_COLOR[view.severity]}${BOLD}${view.title}${RESET}`
    : view.title;

  const lines = [title];
  if (view.location) lines.push(...wrap(view.location, width));
  if (view.workaround) lines.push(...wrap(`Hint: ${view.workaround}`, width));
  return lines.join('\n');
}
