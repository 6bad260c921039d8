import type { CLIErrorView, ResolutionDiagnostic } from '@episodic/core';
import { formatDiagnostic } from '@episodic/core';

const INDENT = '  ';
const GUTTER = `${INDENT}| `;
const MIN_WIDTH = 20;

interface Palette {
  error(text: string): string;
  warning(text: string): string;
  marker(text: string): string;
}

function sgr(codes: string): (text: string) => string {
  return (text) => `\u001B[${codes}m${text}\u001B[0m`;
}

const PLAIN: Palette = {
  error: (text) => text,
  warning: (text) => text,
  marker: (text) => text,
};

const COLORED: Palette = {
  error: sgr('1;31'),
  warning: sgr('33'),
  marker: sgr('1;33'),
};

function paletteFor(useColor: boolean): Palette {
  return useColor ? COLORED : PLAIN;
}

/**
 * Greedy word wrap with every line prefixed by `indent`. A word longer
 * than the room left keeps a line to itself.
 */
export function wrapIndented(
  text: string,
  width: number,
  indent = INDENT
): string[] {
  const room = Math.max(width - indent.length, 1);
  const lines: string[] = [];
  let current = '';
  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (current && current.length + 1 + word.length > room) {
      lines.push(indent + current);
      current = word;
    } else {
      current = current ? `${current} ${word}` : word;
    }
  }
  if (current) lines.push(indent + current);
  return lines;
}

/**
 * Title on the first line, then the indented details: location, the
 * expression in a gutter (with a caret under the failing column) and a hint.
 */
export function renderCLIView(view: CLIErrorView): string {
  const palette = paletteFor(view.colors);
  const width = Math.max(view.terminalWidth || 80, MIN_WIDTH);
  const lines = [palette.error(view.title)];

  if (view.location) lines.push(...wrapIndented(view.location, width));
  if (view.excerpt) {
    lines.push(GUTTER + view.excerpt);
    if (view.caret !== undefined) {
      lines.push(GUTTER + ' '.repeat(view.caret) + palette.marker('^'));
    }
  }
  if (view.workaround) {
    lines.push(...wrapIndented(`Hint: ${view.workaround}`, width));
  }
  return lines.join('\n');
}

export function renderDiagnostic(
  diagnostic: ResolutionDiagnostic,
  useColor = false
): string {
  const label = paletteFor(useColor).warning('warning');
  return `[episodic] ${label}: ${formatDiagnostic(diagnostic)}`;
}
