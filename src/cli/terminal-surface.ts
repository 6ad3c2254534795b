import { Chalk, type ChalkInstance } from 'chalk';

import type { StyledGrid, StyledSpan } from '../domain/avatar/value-objects/frame.js';

export const CURSOR_HOME = '\u001b[H';
export const CLEAR_SCREEN = '\u001b[2J';
export const CLEAR_TO_END = '\u001b[0J';
export const HIDE_CURSOR = '\u001b[?25l';
export const SHOW_CURSOR = '\u001b[?25h';
export const CLEAR_LINE = '\u001b[2K';
export const CLEAR_LINE_END = '\u001b[K';

/** The slice of a tty `WriteStream` the CLI writes through. */
export interface TerminalStream {
  readonly isTTY?: boolean;
  write(chunk: string): boolean;
}

/** Truecolor when the stream is a terminal, plain text otherwise. */
export function chalkFor(stream: Pick<TerminalStream, 'isTTY'>): ChalkInstance {
  return new Chalk({ level: stream.isTTY ? 3 : 0 });
}

export function spanToAnsi(span: StyledSpan, chalk: ChalkInstance): string {
  let style = chalk;
  if (span.foreground) {
    style = style.rgb(...span.foreground);
  }
  if (span.background) {
    style = style.bgRgb(...span.background);
  }
  if (span.dim) {
    style = style.dim;
  }
  return style(span.text);
}

export function gridToAnsi(grid: StyledGrid, chalk: ChalkInstance, lineSuffix = ''): string {
  return grid.rows.map((row) => row.map((span) => spanToAnsi(span, chalk)).join('') + lineSuffix).join('\n');
}

/** One repaint: home the cursor, draw, and clear whatever the previous frame left behind. */
export function paintFrame(grid: StyledGrid, chalk: ChalkInstance): string {
  return `${CURSOR_HOME}${gridToAnsi(grid, chalk, CLEAR_LINE_END)}${CLEAR_TO_END}`;
}
